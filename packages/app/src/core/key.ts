import { Either, Redacted } from "effect"

import { modulus } from "./alphabet.js"
import type { RingElement } from "./brand.js"
import { type EncodingError, invalidKey } from "./errors.js"
import { fromCanonicalized, randomRingElement, ringValue } from "./ring.js"
import type { EntropySource } from "./rng.js"

/**
 * A shift cipher key.
 *
 * The shift is held in a `Redacted` box so that string conversion, JSON and
 * inspection print `<redacted>`; {@link insecureExport} is the one way out.
 */
export type Key = {
  readonly _tag: "ShiftKey"
  readonly secret: Redacted.Redacted<RingElement>
}

const decimalInteger = /^[+-]?\d+$/

export const keyFromRingElement = (element: RingElement): Key => ({
  _tag: "ShiftKey",
  secret: Redacted.make(element)
})

export const keyShift = (key: Key): RingElement => Redacted.value(key.secret)

// CHANGE: generate a key uniformly over the whole keyspace
// WHY: keys must be drawn uniformly from Z/26Z; 0 is a member and stays in
// SOURCE: n/a
// FORMAT THEOREM: forall k in [0, 26): P(randomKey = k) = 1/26
// PURITY: CORE
// EFFECT: consumes entropy from source
// INVARIANT: the identity shift is not excluded
// COMPLEXITY: O(1) expected/O(1)
export const randomKey = (source: EntropySource): Key => keyFromRingElement(randomRingElement(source))

// CHANGE: parse a key from decimal text with a range check
// WHY: an out-of-range key is a typing mistake and is surfaced, never wrapped
// SOURCE: n/a
// FORMAT THEOREM: forall s: parseKey(s) = Right(k) <-> int(s) in [0, 25]
// PURITY: CORE
// INVARIANT: "26" and "-1" are rejected
// COMPLEXITY: O(n)/O(1)
export const parseKey = (text: string): Either.Either<Key, EncodingError> => {
  if (!decimalInteger.test(text)) {
    return Either.left(invalidKey(text))
  }
  const value = Number(text)
  return Number.isSafeInteger(value) && value >= 0 && value < modulus
    ? Either.right(keyFromRingElement(fromCanonicalized(value)))
    : Either.left(invalidKey(text))
}

/**
 * Renders the key as a decimal string.
 * The result is unprotected secret material; callers decide where it may go.
 */
export const insecureExport = (key: Key): string => ringValue(keyShift(key)).toString()

export const keyEquals = (left: Key, right: Key): boolean => keyShift(left) === keyShift(right)

/** Every key of the shift cipher, in ascending order. */
export const allKeys: ReadonlyArray<Key> = Array.from(
  { length: modulus },
  (_, value) => keyFromRingElement(fromCanonicalized(value))
)
