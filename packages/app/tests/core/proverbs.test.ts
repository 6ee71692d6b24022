import { describe, expect, it } from "@effect/vitest"
import { Either } from "effect"
import fc from "fast-check"

import {
  describeProverbDataError,
  noValidProverbs,
  parseProverbs,
  proverbAt,
  proverbCount,
  proverbResourceEmpty,
  proverbResourceUnreadable,
  type ProverbSet
} from "../../src/core/proverbs.js"
import { SAMPLE_ENTRIES, SAMPLE_PROVERBS } from "../support/layers.js"

const sampleSet: ProverbSet = { entries: ["first", "second", "third"] }

describe("parseProverbs", () => {
  it("drops blank lines and comments and trims entries", () => {
    const parsed = parseProverbs(SAMPLE_PROVERBS)
    expect(Either.getOrThrow(parsed).entries).toEqual(SAMPLE_ENTRIES)
  })

  it("handles CRLF line endings", () => {
    const parsed = parseProverbs("one\r\ntwo\r\n")
    expect(Either.getOrThrow(parsed).entries).toEqual(["one", "two"])
  })

  it("reports an empty resource", () => {
    expect(parseProverbs("")).toEqual(Either.left(proverbResourceEmpty))
    expect(parseProverbs("  \n\t\n ")).toEqual(Either.left(proverbResourceEmpty))
  })

  it("reports a resource with only comments and blank lines", () => {
    expect(parseProverbs("# a\n\n# b")).toEqual(Either.left(noValidProverbs(3)))
  })

  it("never yields blank or commented entries", () => {
    const line = fc.oneof(
      fc.string(),
      fc.string().map((text) => `# ${text}`),
      fc.constant("   ")
    )
    fc.assert(
      fc.property(fc.array(line, { maxLength: 20 }), (lines) => {
        const parsed = parseProverbs(lines.join("\n"))
        if (Either.isRight(parsed)) {
          expect(proverbCount(parsed.right)).toBeGreaterThanOrEqual(1)
          for (const entry of parsed.right.entries) {
            expect(entry.trim()).toBe(entry)
            expect(entry.length).toBeGreaterThan(0)
            expect(entry.startsWith("#")).toBe(false)
          }
        }
      })
    )
  })
})

describe("proverbAt", () => {
  it("returns the entry at an index inside the set", () => {
    expect(proverbAt(sampleSet, 0)).toBe("first")
    expect(proverbAt(sampleSet, 2)).toBe("third")
  })

  it("wraps indices outside the set", () => {
    expect(proverbAt(sampleSet, 4)).toBe("second")
    expect(proverbAt(sampleSet, -1)).toBe("third")
  })
})

describe("describeProverbDataError", () => {
  it("describes each load failure", () => {
    expect(describeProverbDataError(proverbResourceUnreadable("/data/proverbs.txt", "ENOENT"))).toBe(
      "cannot read proverb resource at /data/proverbs.txt: ENOENT"
    )
    expect(describeProverbDataError(proverbResourceEmpty)).toBe("embedded proverb data is empty")
    expect(describeProverbDataError(noValidProverbs(3))).toBe(
      "no valid proverbs found in embedded data (3 line(s), all blank or comments)"
    )
  })
})
