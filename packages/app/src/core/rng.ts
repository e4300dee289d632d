import { RngSeed } from "./axioms.js"
import type { RngSeed as RngSeedBrand } from "./brand.js"

const modulus = 2_147_483_647
const multiplier = 48_271

/**
 * A caller-owned supply of randomness.
 * `next()` yields integers uniformly distributed on `[0, bound)`.
 */
export type EntropySource = {
  readonly bound: number
  readonly next: () => number
}

const requireIntegerSeed = (seed: RngSeedBrand): RngSeedBrand => {
  if (!Number.isInteger(seed)) {
    throw new RangeError(`RNG seed must be an integer, got ${seed}`)
  }
  return seed
}

// CHANGE: advance the deterministic RNG seed
// WHY: keep seeded randomness reproducible for tests and replayable runs
// SOURCE: Park–Miller minimal standard generator
// FORMAT THEOREM: forall s: 0 < next(s) < modulus
// PURITY: CORE
// INVARIANT: seed is always within (0, modulus), a zero residue is lifted to 1; non-integer seeds throw RangeError
// COMPLEXITY: O(1)/O(1)
export const nextSeed = (seed: RngSeedBrand): RngSeedBrand => {
  requireIntegerSeed(seed)
  const residue = ((seed % modulus) + modulus) % modulus
  const positive = residue === 0 ? 1 : residue
  return RngSeed((positive * multiplier) % modulus)
}

// CHANGE: expose the seeded generator as an entropy source
// WHY: tests and reproducible runs inject it where production injects node:crypto
// SOURCE: n/a
// FORMAT THEOREM: forall s: seededSource(s).next() in [0, modulus - 1)
// PURITY: CORE
// EFFECT: next() advances private generator state
// INVARIANT: two sources built from the same seed yield the same sequence; the seed is checked eagerly
// COMPLEXITY: O(1)/O(1)
export const seededSource = (seed: RngSeedBrand): EntropySource => {
  let state = requireIntegerSeed(seed)
  return {
    bound: modulus - 1,
    next: () => {
      state = nextSeed(state)
      return state - 1
    }
  }
}

// CHANGE: sample an integer below an upper bound without modulo bias
// WHY: reducing a raw draw mod n over-weights the low residues whenever n does not divide the bound
// SOURCE: n/a
// FORMAT THEOREM: forall n in [1, bound]: P(value = i) = 1/n for i in [0, n)
// PURITY: CORE
// EFFECT: consumes one or more draws from source
// INVARIANT: draws at or above bound - bound % n are rejected; n outside [1, bound] and
//   draws outside the integers of [0, bound) throw RangeError
// COMPLEXITY: O(1) expected/O(1)
export const uniformBelow = (source: EntropySource, upperExclusive: number): number => {
  if (!Number.isSafeInteger(source.bound) || source.bound < 1) {
    throw new RangeError(`Entropy source bound must be a positive safe integer, got ${source.bound}`)
  }
  if (!Number.isSafeInteger(upperExclusive) || upperExclusive < 1) {
    throw new RangeError(`Cannot sample below ${upperExclusive}: the range is empty or not an integer`)
  }
  if (upperExclusive > source.bound) {
    throw new RangeError(`Cannot sample below ${upperExclusive} from a source bounded by ${source.bound}`)
  }
  const limit = source.bound - (source.bound % upperExclusive)
  const draw = (): number => {
    const value = source.next()
    if (!Number.isInteger(value) || value < 0 || value >= source.bound) {
      throw new RangeError(`Entropy source produced ${value}, outside the integers of [0, ${source.bound})`)
    }
    return value
  }
  let value = draw()
  while (value >= limit) {
    value = draw()
  }
  return value % upperExclusive
}
