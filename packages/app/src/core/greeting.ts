export const DEFAULT_NAME = "Gopher"

/**
 * Builds the greeting line for a name.
 *
 * @pure true
 * @invariant forall n != "": greet(n) = "Hello, " + n + "!"
 * @invariant greet("") = "Hello, Gopher!"
 * @complexity O(|name|)
 */
// CHANGE: greeting synthesis as a pure core function
// WHY: greeting text must not depend on any effect
// QUOTE(TZ): "the empty string becomes Gopher"
// REF: hello-gopher-greet
// SOURCE: n/a
// FORMAT THEOREM: forall n: greet(n).startsWith("Hello, ") && greet(n).endsWith("!")
// PURITY: CORE
// EFFECT: None (pure)
// INVARIANT: whitespace is preserved, only the empty string is defaulted
// COMPLEXITY: O(1)/O(1)
export const greet = (name: string): string => `Hello, ${name.length === 0 ? DEFAULT_NAME : name}!`
