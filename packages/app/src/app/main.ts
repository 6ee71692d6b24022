#!/usr/bin/env node
import { NodeContext, NodeRuntime } from "@effect/platform-node"
import { Effect, Exit, Layer, pipe } from "effect"

import { EXIT_CODES } from "../core/cli-error.js"
import { BuildInfoLive } from "../shell/services/build-info.js"
import { FileSystemLive } from "../shell/services/file-system.js"
import { GreeterLive } from "../shell/services/greeter.js"
import { ProverbProviderLive } from "../shell/services/proverb-provider.js"
import { ProverbResourceLive } from "../shell/services/proverb-resource.js"
import { RuntimeEnvLive } from "../shell/services/runtime-env.js"
import { program } from "./program.js"

const ProverbsLive = pipe(
  ProverbProviderLive,
  Layer.provide(ProverbResourceLive),
  Layer.provide(FileSystemLive),
  Layer.provide(NodeContext.layer)
)

const AppLive = Layer.mergeAll(
  GreeterLive,
  ProverbsLive,
  Layer.provideMerge(BuildInfoLive, RuntimeEnvLive)
)

// CHANGE: run the CLI through the Node runtime with all live layers
// WHY: provide platform services and live layers in one place
// QUOTE(TZ): n/a
// REF: hello-gopher-cli
// SOURCE: n/a
// FORMAT THEOREM: forall env: provide(env) -> runMain(program) -> exit(code)
// PURITY: SHELL
// EFFECT: Effect<ExitCode, never, never>
// INVARIANT: the process exit code is the one computed by program
// COMPLEXITY: O(1)/O(1)
const main = Effect.provide(program, AppLive)

NodeRuntime.runMain(main, {
  disableErrorReporting: true,
  teardown: (exit, onExit) => {
    onExit(Exit.isSuccess(exit) && typeof exit.value === "number" ? exit.value : EXIT_CODES.systemError)
  }
})
