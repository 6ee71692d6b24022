import { Either, Option } from "effect"

import { type CliError, usageError } from "./cli-error.js"
import { isVerb, TOOL_NAME, type Verb, VERBS } from "./help.js"
import { findClosestCommand } from "./suggest.js"

export type CliCommand =
  | { readonly _tag: "ShowHelp"; readonly topic: Option.Option<Verb> }
  | { readonly _tag: "ShowVersion" }
  | { readonly _tag: "Greet"; readonly name: string; readonly positional: ReadonlyArray<string> }
  | { readonly _tag: "Proverb"; readonly positional: ReadonlyArray<string> }

type SwitchKey = "help" | "version"

type FlagKey = SwitchKey | "name"

interface ParsedFlags {
  readonly help: boolean
  readonly version: boolean
  readonly name: Option.Option<string>
  readonly positional: ReadonlyArray<string>
}

const emptyFlags: ParsedFlags = {
  help: false,
  version: false,
  name: Option.none(),
  positional: []
}

const rootFlags = new Map<string, SwitchKey>([
  ["--help", "help"],
  ["-h", "help"],
  ["--version", "version"],
  ["-v", "version"]
])

const helpOnlyFlags = new Map<string, FlagKey>([
  ["--help", "help"],
  ["-h", "help"]
])

const greetFlags = new Map<string, FlagKey>([
  ["--help", "help"],
  ["-h", "help"],
  ["--name", "name"],
  ["-n", "name"]
])

const flagsFor = (verb: Verb | "help"): ReadonlyMap<string, FlagKey> => verb === "greet" ? greetFlags : helpOnlyFlags

const setSwitch = (flags: ParsedFlags, key: SwitchKey): ParsedFlags =>
  key === "help" ? { ...flags, help: true } : { ...flags, version: true }

const isFlagToken = (token: string): boolean => token.startsWith("-") && token !== "-"

const commandPath = (verb: Verb | "help" | undefined): string =>
  verb === undefined ? TOOL_NAME : `${TOOL_NAME} ${verb}`

const unknownFlag = (flag: string, verb: Verb | "help" | undefined): CliError =>
  usageError(`unknown flag: ${flag}`, `Run '${commandPath(verb)} --help' for usage information`)

const missingFlagValue = (flag: string, verb: Verb | "help"): CliError =>
  usageError(`flag needs an argument: ${flag}`, `Run '${commandPath(verb)} --help' for usage information`)

const splitInlineValue = (token: string): readonly [string, Option.Option<string>] => {
  const separator = token.indexOf("=")
  return separator === -1
    ? [token, Option.none()]
    : [token.slice(0, separator), Option.some(token.slice(separator + 1))]
}

// A value-taking short flag may carry its value attached: `-nBob`, `-n=Bob`.
const splitFlagToken = (
  token: string,
  known: ReadonlyMap<string, FlagKey>
): readonly [string, Option.Option<string>] => {
  const short = token.slice(0, 2)
  if (token.startsWith("--") || token.length <= 2 || known.get(short) !== "name") {
    return splitInlineValue(token)
  }
  const attached = token.slice(2)
  return [short, Option.some(attached.startsWith("=") ? attached.slice(1) : attached)]
}

/**
 * Parses the tokens that follow a verb.
 *
 * @pure true
 * @invariant `--` ends flag parsing; later tokens are positional
 * @complexity O(n) where n = |tokens|
 */
const parseVerbFlags = (
  verb: Verb | "help",
  tokens: ReadonlyArray<string>
): Either.Either<ParsedFlags, CliError> => {
  const known = flagsFor(verb)
  let result = emptyFlags

  let index = 0
  while (index < tokens.length) {
    const token = tokens[index]
    if (token === undefined) {
      index += 1
      continue
    }
    if (token === "--") {
      return Either.right({ ...result, positional: [...result.positional, ...tokens.slice(index + 1)] })
    }
    if (!isFlagToken(token)) {
      result = { ...result, positional: [...result.positional, token] }
      index += 1
      continue
    }

    const [flag, inlineValue] = splitFlagToken(token, known)
    const key = known.get(flag)
    if (key === undefined) {
      return Either.left(unknownFlag(flag, verb))
    }
    if (key !== "name") {
      result = setSwitch(result, key)
      index += 1
      continue
    }
    if (Option.isSome(inlineValue)) {
      result = { ...result, name: inlineValue }
      index += 1
      continue
    }

    const value = tokens[index + 1]
    if (value === undefined) {
      return Either.left(missingFlagValue(flag, verb))
    }
    result = { ...result, name: Option.some(value) }
    index += 2
  }

  return Either.right(result)
}

const unknownCommand = (token: string): CliError => {
  const suggestion = Option.match(findClosestCommand(token, [...VERBS, "help"]), {
    onNone: () => `Run '${TOOL_NAME} --help' to see available commands`,
    onSome: (closest) => `Did you mean '${closest}'? Run '${TOOL_NAME} --help' to see available commands`
  })
  return usageError(`Unknown command: ${token}`, suggestion)
}

const resolveHelpTopic = (positional: ReadonlyArray<string>): Either.Either<CliCommand, CliError> => {
  const [topic, ...extra] = positional
  if (topic === undefined) {
    return Either.right({ _tag: "ShowHelp", topic: Option.none() })
  }
  if (extra.length > 0) {
    return Either.left(
      usageError(
        `Unexpected argument(s): ${extra.join(" ")}`,
        `The help command takes at most one command name. Run '${TOOL_NAME} --help' to see available commands`
      )
    )
  }
  return isVerb(topic)
    ? Either.right({ _tag: "ShowHelp", topic: Option.some(topic) })
    : Either.left(usageError(`Unknown help topic: ${topic}`, `Run '${TOOL_NAME} --help' to see available commands`))
}

const toVerbCommand = (verb: Verb, flags: ParsedFlags): CliCommand => {
  if (flags.help) {
    return { _tag: "ShowHelp", topic: Option.some(verb) }
  }
  switch (verb) {
    case "greet":
      return { _tag: "Greet", name: Option.getOrElse(flags.name, () => ""), positional: flags.positional }
    case "proverb":
      return { _tag: "Proverb", positional: flags.positional }
    case "version":
      return { _tag: "ShowVersion" }
  }
}

/**
 * Turns process arguments (without the node binary and script path) into a command.
 *
 * @pure true
 * @invariant args = [] -> ShowHelp(None)
 * @invariant unknown verb or flag -> Left(UsageError)
 * @complexity O(n) where n = |args|
 */
// CHANGE: flat, non-recursive dispatch from argv to a command value
// WHY: parsing stays pure so every argv shape is testable without a runtime
// QUOTE(TZ): n/a
// REF: hello-gopher-cli
// SOURCE: n/a
// FORMAT THEOREM: forall a: parseCommand(a) in Right(CliCommand) | Left(UsageError)
// PURITY: CORE
// EFFECT: None (pure)
// INVARIANT: root flags are only read before the verb; --version never combines with a verb
// COMPLEXITY: O(n)/O(n)
export const parseCommand = (args: ReadonlyArray<string>): Either.Either<CliCommand, CliError> => {
  let root = emptyFlags

  let index = 0
  while (index < args.length) {
    const token = args[index]
    if (token === undefined || !isFlagToken(token)) {
      break
    }
    const key = rootFlags.get(token)
    if (key === undefined) {
      return Either.left(unknownFlag(token, undefined))
    }
    root = setSwitch(root, key)
    index += 1
  }

  const verb = args[index]
  if (verb === undefined) {
    return Either.right(
      root.version && !root.help ? { _tag: "ShowVersion" } : { _tag: "ShowHelp", topic: Option.none() }
    )
  }

  if (verb !== "help" && !isVerb(verb)) {
    return Either.left(unknownCommand(verb))
  }
  if (root.help) {
    return Either.right({ _tag: "ShowHelp", topic: verb === "help" ? Option.none() : Option.some(verb) })
  }
  // --version is a root-only flag; verbs do not accept it
  const versionFlag = args.slice(0, index).find((token) => rootFlags.get(token) === "version")
  if (versionFlag !== undefined) {
    return Either.left(unknownFlag(versionFlag, verb))
  }

  const rest = args.slice(index + 1)
  if (verb === "help") {
    return Either.flatMap(parseVerbFlags("help", rest), (flags) => resolveHelpTopic(flags.positional))
  }
  return Either.map(parseVerbFlags(verb, rest), (flags) => toVerbCommand(verb, flags))
}
