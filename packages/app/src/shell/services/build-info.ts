import { Context, Effect, Layer, Option } from "effect"

import { type BuildInfo, DEFAULT_BUILD_INFO } from "../../core/version.js"
import { RuntimeEnv } from "./runtime-env.js"

export class BuildInfoService extends Context.Tag("BuildInfoService")<BuildInfoService, BuildInfo>() {}

export const BUILD_INFO_ENV = {
  version: "HELLO_GOPHER_VERSION",
  buildDate: "HELLO_GOPHER_BUILD_DATE",
  gitCommit: "HELLO_GOPHER_GIT_COMMIT"
} as const

const readOr = (key: string, fallback: string) =>
  Effect.gen(function*(_) {
    const env = yield* _(RuntimeEnv)
    const value = yield* _(env.envVar(key))
    return Option.getOrElse(value, () => fallback)
  })

/**
 * Build metadata stamped by the packaging step, resolved once at startup.
 *
 * @pure false - reads environment variables via RuntimeEnv
 * @effect RuntimeEnv
 * @invariant unset or blank values fall back to "dev"/"unknown"
 */
export const BuildInfoLive = Layer.effect(
  BuildInfoService,
  Effect.gen(function*(_) {
    const version = yield* _(readOr(BUILD_INFO_ENV.version, DEFAULT_BUILD_INFO.version))
    const buildDate = yield* _(readOr(BUILD_INFO_ENV.buildDate, DEFAULT_BUILD_INFO.buildDate))
    const gitCommit = yield* _(readOr(BUILD_INFO_ENV.gitCommit, DEFAULT_BUILD_INFO.gitCommit))
    return { version, buildDate, gitCommit }
  })
)
