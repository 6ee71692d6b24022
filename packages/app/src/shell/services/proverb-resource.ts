import { Context, Effect, Layer, pipe } from "effect"

import { type ProverbDataError, proverbResourceUnreadable } from "../../core/proverbs.js"
import { FileSystemService } from "./file-system.js"

export class ProverbResource extends Context.Tag("ProverbResource")<
  ProverbResource,
  {
    readonly text: Effect.Effect<string, ProverbDataError>
  }
>() {}

export const BUNDLED_PROVERBS = "../../../resources/proverbs.txt"

// CHANGE: expose the bundled proverb text as a service
// WHY: let tests swap the bundled text without touching the filesystem
// QUOTE(TZ): n/a
// REF: hello-gopher-proverbs
// SOURCE: n/a
// FORMAT THEOREM: forall r: text(r) = contents(resources/proverbs.txt)
// PURITY: SHELL
// EFFECT: Effect<ProverbResource, never, FileSystemService>
// INVARIANT: the file is located beside the module, for both src/ and dist/ builds
// COMPLEXITY: O(n)/O(n)
export const ProverbResourceLive = Layer.effect(
  ProverbResource,
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystemService)
    return {
      text: pipe(
        fs.resolveModuleUrl(BUNDLED_PROVERBS, new URL(import.meta.url)),
        Effect.flatMap((pathValue) => fs.readFileString(pathValue)),
        Effect.mapError((error) => proverbResourceUnreadable(error.path, error.reason))
      )
    }
  })
)

export const proverbResourceFromText = (text: string): Layer.Layer<ProverbResource> =>
  Layer.succeed(ProverbResource, { text: Effect.succeed(text) })
