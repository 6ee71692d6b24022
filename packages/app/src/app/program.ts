import { Console, Effect, LogLevel, Logger, Option, pipe } from "effect"

import type { ExitCode } from "../core/cli-error.js"
import { type CliEnv, type CliOutcome, readCliArgs, runCli } from "../shell/cli.js"
import { RuntimeEnv } from "../shell/services/runtime-env.js"

export const LOG_LEVEL_ENV = "HELLO_GOPHER_LOG_LEVEL"

const parseLogLevel = (value: string): Option.Option<LogLevel.LogLevel> =>
  Option.fromNullable(
    LogLevel.allLevels.find((level) => level._tag.toLowerCase() === value.trim().toLowerCase())
  )

/**
 * Minimum log level from HELLO_GOPHER_LOG_LEVEL, Info when unset or unknown.
 *
 * @pure false - reads the environment via RuntimeEnv
 * @effect RuntimeEnv
 */
export const readLogLevel = Effect.gen(function*(_) {
  const env = yield* _(RuntimeEnv)
  const raw = yield* _(env.envVar(LOG_LEVEL_ENV))
  return pipe(raw, Option.flatMap(parseLogLevel), Option.getOrElse(() => LogLevel.Info))
})

/**
 * Effect's default logger writes to stdout; diagnostics go to stderr instead so
 * stdout carries only command results.
 */
export const StderrLogger = Logger.replace(Logger.defaultLogger, Logger.withConsoleError(Logger.stringLogger))

const emit = (outcome: CliOutcome): Effect.Effect<void> =>
  Effect.gen(function*(_) {
    yield* _(Effect.forEach(outcome.stdout, (line) => Console.log(line), { discard: true }))
    yield* _(Effect.forEach(outcome.stderr, (line) => Console.error(line), { discard: true }))
  })

/**
 * Compose the CLI as a single effect that yields the process exit code.
 *
 * @returns Effect that prints the outcome and returns its exit code.
 *
 * @pure false - reads argv and writes to the console
 * @effect Greeter, ProverbProvider, BuildInfoService, RuntimeEnv
 * @invariant stdout and stderr are written only here
 * @throws Never - all errors are classified before reaching this point
 */
// CHANGE: wire argument reading, dispatch and console output
// WHY: keep console writes at one boundary so flows stay testable
// QUOTE(TZ): "A single top-level handler writes stderr and decides the exit code"
// REF: hello-gopher-cli
// SOURCE: n/a
// FORMAT THEOREM: forall a: program(a) = emit(runCli(a)).exitCode
// PURITY: SHELL
// EFFECT: Effect<ExitCode, never, CliEnv>
// INVARIANT: exactly one outcome is emitted per run
// COMPLEXITY: O(n)/O(n)
export const program: Effect.Effect<ExitCode, never, CliEnv> = Effect.gen(function*(_) {
  const level = yield* _(readLogLevel)
  const args = yield* _(readCliArgs)
  const outcome = yield* _(
    pipe(runCli(args), Logger.withMinimumLogLevel(level), Effect.provide(StderrLogger))
  )
  yield* _(emit(outcome))
  return outcome.exitCode
})
