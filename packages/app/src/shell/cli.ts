import { Cause, Effect, Either, Match, Option, pipe } from "effect"

import { type CliError, classifyFailure, EXIT_CODES, type ExitCode, exitCodeFor, renderCliError } from "../core/cli-error.js"
import { type CliCommand, parseCommand } from "../core/command.js"
import { rootHelp, verbHelp } from "../core/help.js"
import { greetFlow } from "./commands/greet.js"
import { proverbFlow } from "./commands/proverb.js"
import { versionFlow } from "./commands/version.js"
import type { BuildInfoService } from "./services/build-info.js"
import type { Greeter } from "./services/greeter.js"
import type { ProverbProvider } from "./services/proverb-provider.js"
import { RuntimeEnv } from "./services/runtime-env.js"

export type CliEnv = Greeter | ProverbProvider | BuildInfoService | RuntimeEnv

export interface CliOutcome {
  readonly exitCode: ExitCode
  readonly stdout: ReadonlyArray<string>
  readonly stderr: ReadonlyArray<string>
}

/**
 * Reads the user arguments (argv without the node binary and script path).
 *
 * @pure false - reads process argv via RuntimeEnv
 * @effect RuntimeEnv
 */
export const readCliArgs = Effect.gen(function*(_) {
  const env = yield* _(RuntimeEnv)
  const argv = yield* _(env.argv)
  return argv.slice(2)
})

export const runCommand = (command: CliCommand): Effect.Effect<ReadonlyArray<string>, CliError, CliEnv> =>
  Match.value(command).pipe(
    Match.tag("ShowHelp", ({ topic }) => Effect.succeed(Option.match(topic, { onNone: rootHelp, onSome: verbHelp }))),
    Match.tag("ShowVersion", () => versionFlow),
    Match.tag("Greet", (greet) => greetFlow(greet)),
    Match.tag("Proverb", (proverb) => proverbFlow(proverb)),
    Match.exhaustive
  )

const dispatch = (args: ReadonlyArray<string>): Effect.Effect<ReadonlyArray<string>, CliError, CliEnv> =>
  Either.match(parseCommand(args), {
    onLeft: (error) => Effect.fail(error),
    onRight: (command) => runCommand(command)
  })

const toCliError = (cause: Cause.Cause<CliError>): CliError =>
  Either.match(Cause.failureOrCause(cause), {
    onLeft: (error) => error,
    onRight: (other) => classifyFailure(Cause.squash(other))
  })

const succeeded = (stdout: ReadonlyArray<string>): CliOutcome => ({
  exitCode: EXIT_CODES.success,
  stdout,
  stderr: []
})

const failed = (error: CliError): CliOutcome => ({
  exitCode: exitCodeFor(error),
  stdout: [],
  stderr: renderCliError(error)
})

/**
 * Runs one invocation to completion and reports what to print and how to exit.
 *
 * @pure false - runs the selected verb flow
 * @effect Greeter, ProverbProvider, BuildInfoService, RuntimeEnv
 * @invariant exitCode = 0 iff stderr = []
 * @invariant failures that are not CliError become SystemError (exit code 3)
 * @complexity O(n) where n = |args|
 */
// CHANGE: single dispatcher that owns the error to exit-code mapping
// WHY: exit codes are decided in exactly one place
// QUOTE(TZ): "Any failure that is not a CliError (including defects) becomes a SystemError"
// REF: hello-gopher-cli
// SOURCE: n/a
// FORMAT THEOREM: forall a: runCli(a).exitCode in {0, 1, 2, 3}
// PURITY: SHELL
// EFFECT: Effect<CliOutcome, never, CliEnv>
// INVARIANT: no verb flow writes to stdout/stderr directly
// COMPLEXITY: O(n)/O(n)
export const runCli = (args: ReadonlyArray<string>): Effect.Effect<CliOutcome, never, CliEnv> =>
  pipe(
    dispatch(args),
    Effect.map(succeeded),
    Effect.catchAllCause((cause) =>
      pipe(
        Effect.logDebug("command failed").pipe(Effect.annotateLogs("cause", Cause.pretty(cause))),
        Effect.as(failed(toCliError(cause)))
      )
    )
  )
