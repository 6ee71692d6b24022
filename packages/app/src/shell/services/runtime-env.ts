import { Context, Effect, Layer, Option } from "effect"

import type { RuntimeInfo } from "../../core/version.js"

export class RuntimeEnv extends Context.Tag("RuntimeEnv")<
  RuntimeEnv,
  {
    readonly argv: Effect.Effect<ReadonlyArray<string>>
    readonly runtime: Effect.Effect<RuntimeInfo>
    readonly envVar: (key: string) => Effect.Effect<Option.Option<string>>
  }
>() {}

const readProcess = (): NodeJS.Process | undefined => typeof process === "undefined" ? undefined : process

const readEnv = (): NodeJS.ProcessEnv => readProcess()?.env ?? {}

const unknownRuntime: RuntimeInfo = {
  runtimeVersion: "unknown",
  platform: "unknown",
  arch: "unknown"
}

// CHANGE: wrap process access (argv, env, platform) behind a typed Effect service
// WHY: keep shell dependencies injectable and testable
// QUOTE(TZ): n/a
// REF: hello-gopher-cli
// SOURCE: n/a
// FORMAT THEOREM: forall k: envVar(k) -> Option<string>
// PURITY: SHELL
// EFFECT: Effect<RuntimeEnv, never, never>
// INVARIANT: blank environment values are reported as None
// COMPLEXITY: O(1)/O(1)
export const RuntimeEnvLive = Layer.succeed(RuntimeEnv, {
  argv: Effect.sync(() => {
    const proc = readProcess()
    return proc === undefined ? [] : [...proc.argv]
  }),
  runtime: Effect.sync(() => {
    const proc = readProcess()
    return proc === undefined
      ? unknownRuntime
      : { runtimeVersion: proc.version, platform: proc.platform, arch: proc.arch }
  }),
  envVar: (key) =>
    Effect.sync(() =>
      Option.filter(Option.fromNullable(readEnv()[key]), (value) => value.trim().length > 0)
    )
})
