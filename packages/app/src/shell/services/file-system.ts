import * as FileSystem from "@effect/platform/FileSystem"
import * as Path from "@effect/platform/Path"
import { Context, Effect, Layer, pipe } from "effect"

export interface FileReadError {
  readonly _tag: "FileReadError"
  readonly path: string
  readonly reason: string
}

export const fileReadError = (pathValue: string, reason: string): FileReadError => ({
  _tag: "FileReadError",
  path: pathValue,
  reason
})

export class FileSystemService extends Context.Tag("FileSystemService")<
  FileSystemService,
  {
    readonly readFileString: (pathValue: string) => Effect.Effect<string, FileReadError>
    readonly resolveModuleUrl: (relative: string, base: URL) => Effect.Effect<string, FileReadError>
  }
>() {}

// CHANGE: wrap platform filesystem access behind a service for typed errors and testing
// WHY: enforce shell boundary and avoid raw fs usage in logic
// QUOTE(TZ): n/a
// REF: hello-gopher-proverbs
// SOURCE: n/a
// FORMAT THEOREM: forall p: readable(p) -> readFileString(p) = contents(p)
// PURITY: SHELL
// EFFECT: Effect<FileSystemService, never, FileSystem | Path>
// INVARIANT: platform errors are mapped to FileReadError with the offending path
// COMPLEXITY: O(n)/O(n)
export const FileSystemLive = Layer.effect(
  FileSystemService,
  Effect.gen(function*(_) {
    const fs = yield* _(FileSystem.FileSystem)
    const path = yield* _(Path.Path)

    const readFileString = (pathValue: string): Effect.Effect<string, FileReadError> =>
      pipe(
        fs.readFileString(pathValue, "utf8"),
        Effect.mapError((error) => fileReadError(pathValue, error.message))
      )

    const resolveModuleUrl = (relative: string, base: URL): Effect.Effect<string, FileReadError> =>
      pipe(
        path.fromFileUrl(new URL(relative, base)),
        Effect.mapError((error) => fileReadError(relative, error.message))
      )

    return {
      readFileString,
      resolveModuleUrl
    }
  })
)
