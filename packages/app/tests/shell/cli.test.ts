import { describe, expect, it } from "@effect/vitest"
import { Effect, pipe } from "effect"

import { rootHelp, verbHelp } from "../../src/core/help.js"
import { proverbResourceUnreadable } from "../../src/core/proverbs.js"
import { runCli } from "../../src/shell/cli.js"
import { proverbResourceFromText } from "../../src/shell/services/proverb-resource.js"
import { failingResource, makeCliLayer, SAMPLE_ENTRIES, throwingGreeter } from "../support/layers.js"

const dataFailureStderr = [
  "Error: Failed to load proverbs",
  "Suggestion: This appears to be a data issue. Please check if the application was built correctly"
]

describe("runCli greet", () => {
  it.effect("greets the default gopher", () =>
    Effect.gen(function*(_) {
      const outcome = yield* _(runCli(["greet"]))
      expect(outcome).toEqual({ exitCode: 0, stdout: ["Hello, Gopher!"], stderr: [] })
    }).pipe(Effect.provide(makeCliLayer())))

  it.effect("greets the named user", () =>
    Effect.gen(function*(_) {
      const long = yield* _(runCli(["greet", "--name", "Alice"]))
      const short = yield* _(runCli(["greet", "-n", "Bob"]))
      expect(long.stdout).toEqual(["Hello, Alice!"])
      expect(short.stdout).toEqual(["Hello, Bob!"])
    }).pipe(Effect.provide(makeCliLayer())))

  it.effect("rejects positional arguments", () =>
    Effect.gen(function*(_) {
      const outcome = yield* _(runCli(["greet", "extra-arg"]))
      expect(outcome).toEqual({
        exitCode: 1,
        stdout: [],
        stderr: [
          "Error: Unexpected argument(s): extra-arg",
          "Suggestion: The greet command doesn't accept positional arguments. Use --name flag instead"
        ]
      })
    }).pipe(Effect.provide(makeCliLayer())))

  it.effect("classifies an unexpected failure as a system error", () =>
    Effect.gen(function*(_) {
      const outcome = yield* _(runCli(["greet"]))
      expect(outcome).toEqual({
        exitCode: 3,
        stdout: [],
        stderr: [
          "Error: Unexpected internal failure",
          "Suggestion: Re-run with HELLO_GOPHER_LOG_LEVEL=debug and report the output"
        ]
      })
    }).pipe(Effect.provide(makeCliLayer({ greeter: throwingGreeter }))))
})

describe("runCli proverb", () => {
  it.effect("prints one proverb from the set", () =>
    Effect.gen(function*(_) {
      const outcome = yield* _(runCli(["proverb"]))
      expect(outcome.exitCode).toBe(0)
      expect(outcome.stderr).toEqual([])
      expect(outcome.stdout).toHaveLength(1)
      expect(SAMPLE_ENTRIES).toContain(outcome.stdout[0])
    }).pipe(Effect.provide(makeCliLayer())))

  it.effect("varies across repeated invocations", () =>
    Effect.gen(function*(_) {
      const text = Array.from({ length: 60 }, (_entry, index) => `proverb number ${index}`).join("\n")
      const layer = makeCliLayer({ resource: proverbResourceFromText(text) })
      const outcomes = yield* _(
        Effect.forEach(Array.from({ length: 50 }, () => 0), () => pipe(runCli(["proverb"]), Effect.provide(layer)))
      )
      const lines = new Set(outcomes.flatMap((outcome) => outcome.stdout))
      expect(outcomes.every((outcome) => outcome.exitCode === 0)).toBe(true)
      expect(lines.size).toBeGreaterThanOrEqual(2)
    }))

  it.effect("rejects positional arguments", () =>
    Effect.gen(function*(_) {
      const outcome = yield* _(runCli(["proverb", "extra"]))
      expect(outcome.exitCode).toBe(1)
      expect(outcome.stderr).toEqual([
        "Error: Unexpected argument(s): extra",
        "Suggestion: The proverb command doesn't accept any arguments"
      ])
    }).pipe(Effect.provide(makeCliLayer())))

  it.effect("reports an empty resource as a data error", () =>
    Effect.gen(function*(_) {
      const outcome = yield* _(runCli(["proverb"]))
      expect(outcome).toEqual({ exitCode: 2, stdout: [], stderr: dataFailureStderr })
    }).pipe(Effect.provide(makeCliLayer({ resource: proverbResourceFromText("") }))))

  it.effect("reports a comment-only resource as a data error", () =>
    Effect.gen(function*(_) {
      const outcome = yield* _(runCli(["proverb"]))
      expect(outcome).toEqual({ exitCode: 2, stdout: [], stderr: dataFailureStderr })
    }).pipe(Effect.provide(makeCliLayer({ resource: proverbResourceFromText("# a\n\n# b") }))))

  it.effect("reports an unreadable resource as a data error", () =>
    Effect.gen(function*(_) {
      const outcome = yield* _(runCli(["proverb"]))
      expect(outcome.exitCode).toBe(2)
      expect(outcome.stderr).toEqual(dataFailureStderr)
    }).pipe(
      Effect.provide(makeCliLayer({ resource: failingResource(proverbResourceUnreadable("/missing.txt", "ENOENT")) }))
    ))
})

describe("runCli version and help", () => {
  const defaultVersionBlock = [
    "hello-gopher version dev",
    "Build date: unknown",
    "Git commit: unknown",
    "Node.js version: v20.11.0",
    "OS/Arch: linux/x64"
  ]

  it.effect("prints the five-line version block", () =>
    Effect.gen(function*(_) {
      const verb = yield* _(runCli(["version"]))
      const flag = yield* _(runCli(["--version"]))
      const short = yield* _(runCli(["-v"]))
      expect(verb).toEqual({ exitCode: 0, stdout: defaultVersionBlock, stderr: [] })
      expect(flag.stdout).toEqual(defaultVersionBlock)
      expect(short.stdout).toEqual(defaultVersionBlock)
    }).pipe(Effect.provide(makeCliLayer())))

  it.effect("uses build metadata from the environment", () =>
    Effect.gen(function*(_) {
      const outcome = yield* _(runCli(["version"]))
      expect(outcome.stdout).toEqual([
        "hello-gopher version 1.4.0",
        "Build date: 2026-01-02T03:04:05Z",
        "Git commit: abc1234",
        "Node.js version: v20.11.0",
        "OS/Arch: linux/x64"
      ])
    }).pipe(
      Effect.provide(
        makeCliLayer({
          env: {
            HELLO_GOPHER_VERSION: "1.4.0",
            HELLO_GOPHER_BUILD_DATE: "2026-01-02T03:04:05Z",
            HELLO_GOPHER_GIT_COMMIT: "abc1234"
          }
        })
      )
    ))

  it.effect("prints usage text with exit code 0", () =>
    Effect.gen(function*(_) {
      const bare = yield* _(runCli([]))
      const flag = yield* _(runCli(["--help"]))
      const verb = yield* _(runCli(["greet", "-h"]))
      expect(bare).toEqual({ exitCode: 0, stdout: rootHelp(), stderr: [] })
      expect(flag.stdout).toEqual(rootHelp())
      expect(verb.stdout).toEqual(verbHelp("greet"))
      expect(verb.stdout).toContain("  -n, --name string   Name to greet (default: Gopher)")
    }).pipe(Effect.provide(makeCliLayer())))

  it.effect("rejects an unknown verb", () =>
    Effect.gen(function*(_) {
      const outcome = yield* _(runCli(["unknown-verb"]))
      expect(outcome).toEqual({
        exitCode: 1,
        stdout: [],
        stderr: [
          "Error: Unknown command: unknown-verb",
          "Suggestion: Run 'hello-gopher --help' to see available commands"
        ]
      })
    }).pipe(Effect.provide(makeCliLayer())))
})
