import { Effect, pipe } from "effect"

import { type CliError, dataError, usageError } from "../../core/cli-error.js"
import { describeProverbDataError, type ProverbDataError } from "../../core/proverbs.js"
import { ProverbProvider } from "../services/proverb-provider.js"

export interface ProverbInput {
  readonly positional: ReadonlyArray<string>
}

/**
 * Loads the proverb set explicitly, then prints one random proverb.
 *
 * @pure false - reads the proverb resource
 * @effect ProverbProvider
 * @invariant load failures surface as DataError, never as proverb text
 */
export const proverbFlow = (input: ProverbInput): Effect.Effect<ReadonlyArray<string>, CliError, ProverbProvider> =>
  Effect.gen(function*(_) {
    if (input.positional.length > 0) {
      return yield* _(
        Effect.fail(
          usageError(
            `Unexpected argument(s): ${input.positional.join(" ")}`,
            "The proverb command doesn't accept any arguments"
          )
        )
      )
    }

    const provider = yield* _(ProverbProvider)
    const toDataError = (error: ProverbDataError): CliError =>
      dataError(
        "Failed to load proverbs",
        describeProverbDataError(error),
        "This appears to be a data issue. Please check if the application was built correctly"
      )

    yield* _(pipe(provider.loadProverbs, Effect.mapError(toDataError)))
    const draw = yield* _(pipe(provider.randomProverb, Effect.mapError(toDataError)))
    return [draw.proverb]
  })
