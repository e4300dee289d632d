import { Either } from "effect"

import type { RingElement } from "./brand.js"
import { type EncodingError, invalidCiphertext, invalidMessage } from "./errors.js"
import { fromChar, toChar } from "./ring.js"

/** A plaintext of arbitrary length, possibly empty. */
export type Message = {
  readonly _tag: "Message"
  readonly elements: ReadonlyArray<RingElement>
}

/** A ciphertext of arbitrary length. Rendered in uppercase. */
export type Ciphertext = {
  readonly _tag: "Ciphertext"
  readonly elements: ReadonlyArray<RingElement>
}

type Encoded = {
  readonly elements: ReadonlyArray<RingElement>
  readonly invalid: ReadonlyArray<string>
}

// CHANGE: encode a string symbol by symbol, collecting every rejected character
// WHY: the error names all offending characters, not just the first one
// SOURCE: n/a
// FORMAT THEOREM: forall s: invalid(s) = [] -> |elements| = |chars(s)|
// PURITY: CORE
// INVARIANT: invalid holds each rejected character once, in order of first appearance
// COMPLEXITY: O(n)/O(n)
const encodeAll = (text: string): Encoded => {
  const elements: Array<RingElement> = []
  const invalid: Array<string> = []
  for (const character of text) {
    Either.match(fromChar(character), {
      onLeft: () => {
        if (!invalid.includes(character)) {
          invalid.push(character)
        }
      },
      onRight: (element) => {
        elements.push(element)
      }
    })
  }
  return { elements, invalid }
}

const decodeAll = (elements: ReadonlyArray<RingElement>): string => elements.map(toChar).join("")

const sameElements = (left: ReadonlyArray<RingElement>, right: ReadonlyArray<RingElement>): boolean =>
  left.length === right.length && left.every((element, index) => element === right[index])

export const messageFromElements = (elements: ReadonlyArray<RingElement>): Message => ({
  _tag: "Message",
  elements: [...elements]
})

export const ciphertextFromElements = (elements: ReadonlyArray<RingElement>): Ciphertext => ({
  _tag: "Ciphertext",
  elements: [...elements]
})

/**
 * Parses a plaintext made only of lowercase Latin letters.
 * The empty string is a valid, empty message.
 */
export const parseMessage = (text: string): Either.Either<Message, EncodingError> => {
  const encoded = encodeAll(text)
  return encoded.invalid.length > 0
    ? Either.left(invalidMessage(text, encoded.invalid))
    : Either.right(messageFromElements(encoded.elements))
}

export const renderMessage = (message: Message): string => decodeAll(message.elements)

/**
 * Parses a ciphertext in any mix of cases. The input is lowercased before
 * encoding, so its original casing is not kept.
 */
export const parseCiphertext = (text: string): Either.Either<Ciphertext, EncodingError> => {
  const encoded = encodeAll(text.toLowerCase())
  return encoded.invalid.length > 0
    ? Either.left(invalidCiphertext(text, encoded.invalid))
    : Either.right(ciphertextFromElements(encoded.elements))
}

export const renderCiphertext = (ciphertext: Ciphertext): string => decodeAll(ciphertext.elements).toUpperCase()

export const messageEquals = (left: Message, right: Message): boolean => sameElements(left.elements, right.elements)

export const ciphertextEquals = (left: Ciphertext, right: Ciphertext): boolean =>
  sameElements(left.elements, right.elements)
