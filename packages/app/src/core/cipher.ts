import type { Either } from "effect"

import type { EncodingError } from "./errors.js"
import { allKeys, type Key, keyShift, parseKey, randomKey } from "./key.js"
import { add, sub } from "./ring.js"
import type { EntropySource } from "./rng.js"
import { type Ciphertext, ciphertextFromElements, type Message, messageFromElements } from "./texts.js"

/**
 * A deterministic symmetric cipher.
 *
 * For every key `k` and message `m`: `decrypt(encrypt(m, k), k)` equals `m`.
 */
export type Cipher<M, C, K> = {
  readonly name: string
  readonly encrypt: (message: M, key: K) => C
  readonly decrypt: (ciphertext: C, key: K) => M
  readonly generateKey: (source: EntropySource) => K
  readonly parseKey: (text: string) => Either.Either<K, EncodingError>
}

export type Candidate = {
  readonly key: Key
  readonly message: Message
}

// CHANGE: shift every symbol forward by the key
// WHY: encryption of the Latin shift cipher is translation in Z/26Z
// SOURCE: Stinson, Cryptography: Theory and Practice, Example 2.1
// FORMAT THEOREM: forall m, k: |encrypt(m, k)| = |m| ∧ c_i = m_i + k
// PURITY: CORE
// INVARIANT: order and length are preserved
// COMPLEXITY: O(n)/O(n)
export const encrypt = (message: Message, key: Key): Ciphertext => {
  const shift = keyShift(key)
  return ciphertextFromElements(message.elements.map((element) => add(element, shift)))
}

// CHANGE: shift every symbol back by the key
// WHY: decryption is the inverse translation; any key yields some message
// SOURCE: Stinson, Cryptography: Theory and Practice, Example 2.1
// FORMAT THEOREM: forall m, k: decrypt(encrypt(m, k), k) = m
// PURITY: CORE
// INVARIANT: a wrong key is not detected, the result is simply another message
// COMPLEXITY: O(n)/O(n)
export const decrypt = (ciphertext: Ciphertext, key: Key): Message => {
  const shift = keyShift(key)
  return messageFromElements(ciphertext.elements.map((element) => sub(element, shift)))
}

/** Decrypts under each of the 26 keys, in key order. */
export const bruteForce = (ciphertext: Ciphertext): ReadonlyArray<Candidate> =>
  allKeys.map((key) => ({ key, message: decrypt(ciphertext, key) }))

/**
 * The Latin shift cipher. Its keyspace has 26 members, so it offers no
 * confidentiality: {@link bruteForce} recovers any plaintext.
 */
export const shiftCipher: Cipher<Message, Ciphertext, Key> = {
  name: "shift",
  encrypt,
  decrypt,
  generateKey: randomKey,
  parseKey
}
