import type { Candidate } from "./cipher.js"
import { insecureExport } from "./key.js"
import { renderMessage } from "./texts.js"

export const usageLines: ReadonlyArray<string> = [
  "Usage:",
  "  keygen                         generate a key",
  "  encrypt <message> [key]        encrypt lowercase letters a-z",
  "  decrypt <ciphertext> <key>     decrypt letters A-Z (any case)",
  "  brute-force <ciphertext>       try every key",
  "Keys are numbers between 0 and 25 inclusive."
]

export const formatUsage = (): string => usageLines.join("\n")

export const formatCandidate = (candidate: Candidate): string =>
  `${insecureExport(candidate.key)}: ${renderMessage(candidate.message)}`

export const formatGeneratedKey = (exported: string): string => `Generated key: ${exported}`

export const logKeyExported = (): string => "Key material was printed in the clear; do not store or log it."

export const logSeededEntropy = (seed: number): string =>
  `Keys are drawn from a seeded generator (seed=${seed}); they are reproducible and not secret.`

export const logCommand = (kind: string): string => `Running command=${kind}`

export const logBruteForce = (length: number): string => `Brute force over 26 keys, ciphertext length=${length}`
