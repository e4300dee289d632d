import type { RingElement as RingElementBrand, RngSeed as RngSeedBrand } from "./brand.js"

// CHANGE: provide the only unchecked constructor for ring elements
// WHY: validating constructors in ring.ts need one place where a number becomes a RingElement
// SOURCE: n/a
// FORMAT THEOREM: forall n in [0, 26): uncheckedRingElement(n) = n
// PURITY: CORE
// INVARIANT: callers guarantee 0 <= value < 26; nothing here re-checks it
// COMPLEXITY: O(1)/O(1)
export const uncheckedRingElement = (value: number): RingElementBrand => value as RingElementBrand

// CHANGE: provide constructors for RNG seeds
// WHY: make randomness explicit and deterministic in the core
// SOURCE: n/a
// FORMAT THEOREM: forall n in Number: RngSeed(n) = n
// PURITY: CORE
// INVARIANT: seed remains a number
// COMPLEXITY: O(1)/O(1)
export const RngSeed = (value: number): RngSeedBrand => value as RngSeedBrand
