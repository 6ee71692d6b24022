import { TOOL_NAME } from "./help.js"

export interface BuildInfo {
  readonly version: string
  readonly buildDate: string
  readonly gitCommit: string
}

export interface RuntimeInfo {
  readonly runtimeVersion: string
  readonly platform: string
  readonly arch: string
}

export const DEFAULT_BUILD_INFO: BuildInfo = {
  version: "dev",
  buildDate: "unknown",
  gitCommit: "unknown"
}

/**
 * Five-line version block printed by `version` and `--version`.
 *
 * @pure true
 * @invariant result.length = 5
 */
export const formatVersionBlock = (build: BuildInfo, runtime: RuntimeInfo): ReadonlyArray<string> => [
  `${TOOL_NAME} version ${build.version}`,
  `Build date: ${build.buildDate}`,
  `Git commit: ${build.gitCommit}`,
  `Node.js version: ${runtime.runtimeVersion}`,
  `OS/Arch: ${runtime.platform}/${runtime.arch}`
]
