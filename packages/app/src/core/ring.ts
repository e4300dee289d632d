import { Either } from "effect"

import { decodeValue, encodeLetter, modulus } from "./alphabet.js"
import { uncheckedRingElement } from "./axioms.js"
import type { RingElement } from "./brand.js"
import { type EncodingError, invalidSymbol, missingLetter } from "./errors.js"
import { type EntropySource, uniformBelow } from "./rng.js"

/** The additive identity. */
export const zero: RingElement = uncheckedRingElement(0)

export const isZero = (element: RingElement): boolean => element === zero

export const ringValue = (element: RingElement): number => element

// CHANGE: reduce an arbitrary integer to its canonical residue
// WHY: arithmetic on raw integers must re-enter the ring through a canonical value
// SOURCE: n/a
// FORMAT THEOREM: forall n in Z: fromCanonicalized(n) = n mod 26, 0 <= result < 26
// PURITY: CORE
// INVARIANT: Euclidean remainder, never negative; non-integers throw RangeError
// COMPLEXITY: O(1)/O(1)
export const fromCanonicalized = (value: number): RingElement => {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`Cannot reduce ${value} modulo ${modulus}: not a safe integer`)
  }
  return uncheckedRingElement(((value % modulus) + modulus) % modulus)
}

// CHANGE: encode a single letter through the alphabet table
// WHY: the only validating entry point into the ring from untrusted text
// SOURCE: n/a
// FORMAT THEOREM: forall c in a..z: fromChar(c) = Right(index(c)); otherwise Left(EncodingError)
// PURITY: CORE
// INVARIANT: every Right value is canonical
// COMPLEXITY: O(1)/O(1)
export const fromChar = (character: string): Either.Either<RingElement, EncodingError> => {
  const value = encodeLetter(character)
  return value === undefined
    ? Either.left(invalidSymbol(character))
    : Either.right(uncheckedRingElement(value))
}

/**
 * Maps a ring element back to its letter.
 *
 * @throws EncodingTableDefect when the element has no letter, which only an
 * unchecked construction outside `[0, 26)` can cause.
 */
export const toChar = (element: RingElement): string => {
  const letter = decodeValue(element)
  if (letter === undefined) {
    throw missingLetter(element)
  }
  return letter
}

// CHANGE: draw a ring element uniformly at random from an injected source
// WHY: the core never owns a generator; production and tests choose their own
// SOURCE: n/a
// FORMAT THEOREM: forall i in [0, 26): P(random = i) = 1/26
// PURITY: CORE
// EFFECT: consumes entropy from source
// INVARIANT: result is canonical
// COMPLEXITY: O(1) expected/O(1)
export const randomRingElement = (source: EntropySource): RingElement =>
  uncheckedRingElement(uniformBelow(source, modulus))

/**
 * Sum modulo 26 by a single conditional subtraction.
 * Operands are assumed canonical and are not re-checked.
 */
export const add = (left: RingElement, right: RingElement): RingElement => {
  const sum = left + right
  return uncheckedRingElement(sum >= modulus ? sum - modulus : sum)
}

/**
 * Difference modulo 26 by a single conditional addition.
 * Operands are assumed canonical and are not re-checked.
 */
export const sub = (left: RingElement, right: RingElement): RingElement => {
  const difference = left - right
  return uncheckedRingElement(difference < 0 ? difference + modulus : difference)
}
