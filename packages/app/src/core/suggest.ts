import { Array, Option, Order, pipe } from "effect"

/**
 * Edit distance between two strings (insertions, deletions, substitutions).
 */
export const levenshteinDistance = (left: string, right: string): number => {
  let previous: ReadonlyArray<number> = Array.makeBy(right.length + 1, (index) => index)

  for (let i = 1; i <= left.length; i++) {
    const current = [i]
    for (let j = 1; j <= right.length; j++) {
      const substitution = (previous[j - 1] ?? 0) + (left.charAt(i - 1) === right.charAt(j - 1) ? 0 : 1)
      const insertion = (current[j - 1] ?? 0) + 1
      const deletion = (previous[j] ?? 0) + 1
      current.push(Math.min(substitution, insertion, deletion))
    }
    previous = current
  }

  return previous[right.length] ?? 0
}

interface Candidate {
  readonly command: string
  readonly distance: number
}

const byDistance: Order.Order<Candidate> = Order.mapInput(Order.number, (candidate) => candidate.distance)

/**
 * Finds the known command closest to the input, within a distance threshold.
 *
 * @pure true
 * @postcondition Some(c) implies c in commands && distance(input, c) <= threshold
 * @complexity O(k * |input| * |c|) where k = |commands|
 */
export const findClosestCommand = (
  input: string,
  commands: ReadonlyArray<string>,
  threshold = 2
): Option.Option<string> =>
  pipe(
    commands,
    Array.map((command): Candidate => ({
      command,
      distance: levenshteinDistance(input.toLowerCase(), command.toLowerCase())
    })),
    Array.filter((candidate) => candidate.distance <= threshold),
    Array.sort(byDistance),
    Array.head,
    Option.map((candidate) => candidate.command)
  )
