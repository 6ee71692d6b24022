import { Option, Predicate } from "effect"
import { match } from "ts-pattern"

export const EXIT_CODES = {
  success: 0,
  usageError: 1,
  dataError: 2,
  systemError: 3
} as const

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES]

export interface UsageError {
  readonly _tag: "UsageError"
  readonly message: string
  readonly suggestion: Option.Option<string>
}

export interface DataError {
  readonly _tag: "DataError"
  readonly message: string
  readonly cause: Option.Option<string>
  readonly suggestion: Option.Option<string>
}

export interface SystemError {
  readonly _tag: "SystemError"
  readonly message: string
  readonly cause: Option.Option<string>
  readonly suggestion: Option.Option<string>
}

export type CliError = UsageError | DataError | SystemError

const nonEmpty = (value: string | undefined): Option.Option<string> =>
  value === undefined || value.length === 0 ? Option.none() : Option.some(value)

export const usageError = (message: string, suggestion?: string): CliError => ({
  _tag: "UsageError",
  message,
  suggestion: nonEmpty(suggestion)
})

export const dataError = (message: string, cause: string, suggestion?: string): CliError => ({
  _tag: "DataError",
  message,
  cause: nonEmpty(cause),
  suggestion: nonEmpty(suggestion)
})

export const systemError = (message: string, cause: string, suggestion?: string): CliError => ({
  _tag: "SystemError",
  message,
  cause: nonEmpty(cause),
  suggestion: nonEmpty(suggestion)
})

const cliErrorTags: ReadonlyArray<CliError["_tag"]> = ["UsageError", "DataError", "SystemError"]

export const isCliError = (value: unknown): value is CliError =>
  cliErrorTags.some((tag) => Predicate.isTagged(value, tag)) &&
  Predicate.hasProperty(value, "message") &&
  typeof value.message === "string"

const describeUnknown = (value: unknown): string => {
  if (value instanceof Error) {
    return value.message
  }
  return typeof value === "string" ? value : String(value)
}

/**
 * Classifies any failure into the CLI error taxonomy.
 *
 * @pure true
 * @invariant isCliError(e) -> classifyFailure(e) === e
 * @invariant !isCliError(e) -> classifyFailure(e)._tag === "SystemError"
 */
export const classifyFailure = (failure: unknown): CliError =>
  isCliError(failure)
    ? failure
    : systemError(
      "Unexpected internal failure",
      describeUnknown(failure),
      "Re-run with HELLO_GOPHER_LOG_LEVEL=debug and report the output"
    )

// CHANGE: fixed mapping from error kind to process exit code
// WHY: scripts rely on stable exit codes per failure kind
// QUOTE(TZ): "success 0, usage 1, data 2, system 3"
// REF: hello-gopher-cli
// SOURCE: n/a
// FORMAT THEOREM: forall e: exitCodeFor(e) in {1, 2, 3}
// PURITY: CORE
// EFFECT: None (pure)
// INVARIANT: mapping is exhaustive over CliError
// COMPLEXITY: O(1)/O(1)
export const exitCodeFor = (error: CliError): ExitCode =>
  match(error)
    .with({ _tag: "UsageError" }, () => EXIT_CODES.usageError)
    .with({ _tag: "DataError" }, () => EXIT_CODES.dataError)
    .with({ _tag: "SystemError" }, () => EXIT_CODES.systemError)
    .exhaustive()

/**
 * Renders an error the way it is written to stderr.
 *
 * @returns `Error: <message>` and, when present, `Suggestion: <suggestion>`.
 */
export const renderCliError = (error: CliError): ReadonlyArray<string> =>
  Option.match(error.suggestion, {
    onNone: () => [`Error: ${error.message}`],
    onSome: (suggestion) => [`Error: ${error.message}`, `Suggestion: ${suggestion}`]
  })
