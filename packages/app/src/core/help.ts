export const TOOL_NAME = "hello-gopher"

export type Verb = "greet" | "proverb" | "version"

export const VERBS: ReadonlyArray<Verb> = ["greet", "proverb", "version"]

export const isVerb = (value: string): value is Verb => VERBS.some((verb) => verb === value)

interface VerbDoc {
  readonly summary: string
  readonly description: ReadonlyArray<string>
  readonly flags: ReadonlyArray<string>
  readonly examples: ReadonlyArray<string>
}

const helpFlagLine = (target: string): string => `  -h, --help          help for ${target}`

const verbDocs: Readonly<Record<Verb, VerbDoc>> = {
  greet: {
    summary: "Greet a gopher by name",
    description: [
      "Prints a friendly greeting. Without --name it greets \"Gopher\"."
    ],
    flags: [
      "  -n, --name string   Name to greet (default: Gopher)",
      helpFlagLine("greet")
    ],
    examples: [
      `  ${TOOL_NAME} greet                    # Greet the default gopher`,
      `  ${TOOL_NAME} greet --name Alice       # Greet Alice`,
      `  ${TOOL_NAME} greet -n Bob             # Greet Bob using the short flag`
    ]
  },
  proverb: {
    summary: "Display a random proverb",
    description: [
      "Prints one proverb picked at random from the bundled collection."
    ],
    flags: [helpFlagLine("proverb")],
    examples: [`  ${TOOL_NAME} proverb                  # Display a random proverb`]
  },
  version: {
    summary: "Print version information",
    description: [
      "Prints the version, build date, git commit, Node.js version and platform."
    ],
    flags: [helpFlagLine("version")],
    examples: [`  ${TOOL_NAME} version                  # Show version information`]
  }
}

const padCommand = (name: string): string => name.padEnd(12, " ")

/**
 * Root usage text, one entry per output line.
 *
 * @pure true
 */
export const rootHelp = (): ReadonlyArray<string> => [
  `${TOOL_NAME} greets you by name and shares a random programming proverb.`,
  "",
  "Usage:",
  `  ${TOOL_NAME} [command] [flags]`,
  "",
  "Available Commands:",
  `  ${padCommand("greet")}${verbDocs.greet.summary}`,
  `  ${padCommand("help")}Help about any command`,
  `  ${padCommand("proverb")}${verbDocs.proverb.summary}`,
  `  ${padCommand("version")}${verbDocs.version.summary}`,
  "",
  "Flags:",
  helpFlagLine(TOOL_NAME),
  `  -v, --version       version for ${TOOL_NAME}`,
  "",
  "Examples:",
  ...verbDocs.greet.examples,
  ...verbDocs.proverb.examples,
  `  ${TOOL_NAME} --version                # Show version information`,
  "",
  `Use "${TOOL_NAME} [command] --help" for more information about a command.`
]

export const verbHelp = (verb: Verb): ReadonlyArray<string> => {
  const doc = verbDocs[verb]
  return [
    doc.summary,
    "",
    ...doc.description,
    "",
    "Usage:",
    `  ${TOOL_NAME} ${verb} [flags]`,
    "",
    "Examples:",
    ...doc.examples,
    "",
    "Flags:",
    ...doc.flags
  ]
}
