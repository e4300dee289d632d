import { describe, expect, it } from "@effect/vitest"
import { Either } from "effect"

import { parseKey } from "../../src/core/key.js"
import {
  formatCandidate,
  formatGeneratedKey,
  formatUsage,
  logBruteForce,
  logCommand,
  logSeededEntropy,
  usageLines
} from "../../src/core/text.js"
import { parseMessage } from "../../src/core/texts.js"

describe("text", () => {
  it("usage lists every command", () => {
    const usage = formatUsage()
    expect(usage.split("\n")).toEqual(usageLines)
    expect(usageLines[0]).toBe("Usage:")
    expect(usage).toContain("keygen")
    expect(usage).toContain("encrypt <message> [key]")
    expect(usage).toContain("decrypt <ciphertext> <key>")
    expect(usage).toContain("brute-force <ciphertext>")
  })

  it("formats a brute-force candidate as key and plaintext", () => {
    const candidate = {
      key: Either.getOrThrow(parseKey("11")),
      message: Either.getOrThrow(parseMessage("wewillmeetatmidnight"))
    }
    expect(formatCandidate(candidate)).toBe("11: wewillmeetatmidnight")
  })

  it("formats log and output lines", () => {
    expect(formatGeneratedKey("4")).toBe("Generated key: 4")
    expect(logCommand("keygen")).toBe("Running command=keygen")
    expect(logBruteForce(20)).toBe("Brute force over 26 keys, ciphertext length=20")
    expect(logSeededEntropy(7)).toBe(
      "Keys are drawn from a seeded generator (seed=7); they are reproducible and not secret."
    )
  })
})
