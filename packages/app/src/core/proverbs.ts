import { Array, Either, Match, pipe } from "effect"

export interface ProverbSet {
  readonly entries: Array.NonEmptyReadonlyArray<string>
}

export interface ProverbResourceUnreadable {
  readonly _tag: "ProverbResourceUnreadable"
  readonly path: string
  readonly reason: string
}

export interface ProverbResourceEmpty {
  readonly _tag: "ProverbResourceEmpty"
}

export interface NoValidProverbs {
  readonly _tag: "NoValidProverbs"
  readonly lineCount: number
}

export type ProverbDataError = ProverbResourceUnreadable | ProverbResourceEmpty | NoValidProverbs

export const proverbResourceUnreadable = (path: string, reason: string): ProverbDataError => ({
  _tag: "ProverbResourceUnreadable",
  path,
  reason
})

export const proverbResourceEmpty: ProverbDataError = { _tag: "ProverbResourceEmpty" }

export const noValidProverbs = (lineCount: number): ProverbDataError => ({
  _tag: "NoValidProverbs",
  lineCount
})

export const COMMENT_MARKER = "#"

const isProverbLine = (line: string): boolean => line.length > 0 && !line.startsWith(COMMENT_MARKER)

/**
 * Parses the bundled proverb text into a ProverbSet.
 *
 * @pure true
 * @invariant forall p in result.entries: p === p.trim() && p !== "" && !p.startsWith("#")
 * @postcondition Right(set) implies set.entries.length >= 1
 * @complexity O(n) where n = |text|
 */
// CHANGE: parse proverb resource into an immutable non-empty set
// WHY: an empty set is a load failure, never a silent empty draw
// QUOTE(TZ): n/a
// REF: hello-gopher-proverbs
// SOURCE: n/a
// FORMAT THEOREM: forall t: parse(t) = Left(e) xor nonEmpty(parse(t).entries)
// PURITY: CORE
// EFFECT: None (pure)
// INVARIANT: empty resource and comment-only resource are reported as different errors
// COMPLEXITY: O(n)/O(n)
export const parseProverbs = (text: string): Either.Either<ProverbSet, ProverbDataError> => {
  const trimmed = text.trim()
  if (trimmed.length === 0) {
    return Either.left(proverbResourceEmpty)
  }

  const lines = trimmed.split("\n")
  const entries = pipe(
    lines,
    Array.map((line) => line.trim()),
    Array.filter(isProverbLine)
  )

  return Array.isNonEmptyReadonlyArray(entries)
    ? Either.right({ entries })
    : Either.left(noValidProverbs(lines.length))
}

export const proverbCount = (set: ProverbSet): number => set.entries.length

/**
 * Picks the entry at an index, wrapping indices outside the set.
 *
 * @pure true
 * @invariant forall i >= 0: member(proverbAt(set, i), set.entries)
 */
export const proverbAt = (set: ProverbSet, index: number): string => {
  const size = set.entries.length
  const wrapped = ((Math.trunc(index) % size) + size) % size
  return set.entries[wrapped] ?? Array.headNonEmpty(set.entries)
}

export const describeProverbDataError = (error: ProverbDataError): string =>
  Match.value(error).pipe(
    Match.tag("ProverbResourceUnreadable", (unreadable) =>
      `cannot read proverb resource at ${unreadable.path}: ${unreadable.reason}`),
    Match.tag("ProverbResourceEmpty", () => "embedded proverb data is empty"),
    Match.tag("NoValidProverbs", (invalid) =>
      `no valid proverbs found in embedded data (${invalid.lineCount} line(s), all blank or comments)`),
    Match.exhaustive
  )
