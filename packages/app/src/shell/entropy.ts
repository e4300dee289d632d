import { randomBytes } from "node:crypto"

import { Context } from "effect"

import type { RngSeed } from "../core/brand.js"
import { type EntropySource, seededSource } from "../core/rng.js"

export class EntropyService extends Context.Tag("EntropyService")<
  EntropyService,
  EntropySource
>() {}

/** 32-bit words from the operating system CSPRNG. */
export const cryptoEntropySource: EntropySource = {
  bound: 2 ** 32,
  next: () => randomBytes(4).readUInt32BE(0)
}

// CHANGE: choose the entropy source for a run
// WHY: a configured seed makes key generation replayable; otherwise keys come from node:crypto
// SOURCE: n/a
// FORMAT THEOREM: forall s: makeEntropySource(s) = seeded(s) if s != null else crypto
// PURITY: SHELL
// INVARIANT: the core never sees which source it was given
// COMPLEXITY: O(1)/O(1)
export const makeEntropySource = (seed: RngSeed | null): EntropySource =>
  seed === null ? cryptoEntropySource : seededSource(seed)
