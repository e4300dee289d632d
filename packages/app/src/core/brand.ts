// CHANGE: introduce branded values to keep ring symbols and seeds distinct without unsafe casts
// WHY: a plain number must never pass for a canonical ring element
// SOURCE: n/a
// FORMAT THEOREM: forall x in Brand<T>: value(x) = x at runtime
// PURITY: CORE
// INVARIANT: brands are only created in the axiomatic module or by validating constructors
// COMPLEXITY: O(1)/O(1)
export type Brand<T, Name extends string> = T & { readonly __brand: Name }

/** A residue in the ring of integers modulo 26, always in `[0, 26)`. */
export type RingElement = Brand<number, "RingElement">

export type RngSeed = Brand<number, "RngSeed">
