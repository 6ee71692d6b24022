import { Effect } from "effect"

import { type CliError, usageError } from "../../core/cli-error.js"
import { Greeter } from "../services/greeter.js"

export interface GreetInput {
  readonly name: string
  readonly positional: ReadonlyArray<string>
}

// CHANGE: greet flow rejects positional arguments and prints one greeting line
// WHY: positional names are a common mistake; point users at --name
// QUOTE(TZ): n/a
// REF: hello-gopher-cli
// SOURCE: n/a
// FORMAT THEOREM: forall n: positional = [] -> output = [greet(n)]
// PURITY: SHELL
// EFFECT: Effect<ReadonlyArray<string>, CliError, Greeter>
// INVARIANT: exactly one output line on success
// COMPLEXITY: O(1)/O(1)
export const greetFlow = (input: GreetInput): Effect.Effect<ReadonlyArray<string>, CliError, Greeter> =>
  Effect.gen(function*(_) {
    if (input.positional.length > 0) {
      return yield* _(
        Effect.fail(
          usageError(
            `Unexpected argument(s): ${input.positional.join(" ")}`,
            "The greet command doesn't accept positional arguments. Use --name flag instead"
          )
        )
      )
    }
    const greeter = yield* _(Greeter)
    return [greeter.greet(input.name)]
  })
