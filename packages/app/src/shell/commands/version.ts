import { Effect } from "effect"

import { formatVersionBlock } from "../../core/version.js"
import { BuildInfoService } from "../services/build-info.js"
import { RuntimeEnv } from "../services/runtime-env.js"

export const versionFlow: Effect.Effect<ReadonlyArray<string>, never, BuildInfoService | RuntimeEnv> = Effect.gen(
  function*(_) {
    const build = yield* _(BuildInfoService)
    const env = yield* _(RuntimeEnv)
    const runtime = yield* _(env.runtime)
    return formatVersionBlock(build, runtime)
  }
)
