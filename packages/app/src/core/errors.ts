import { Data } from "effect"

export type EncodingErrorReason = "symbol" | "message" | "ciphertext" | "key"

/**
 * A string could not be read as a value of the requested type.
 *
 * `invalid` lists the offending characters in order of first appearance;
 * it is empty for keys, which fail as a whole.
 */
export class EncodingError extends Data.TaggedError("EncodingError")<{
  readonly reason: EncodingErrorReason
  readonly input: string
  readonly invalid: ReadonlyArray<string>
  readonly message: string
}> {}

/**
 * A ring element had no letter in the encoding table.
 * Only reachable through the unchecked constructor, so it is thrown rather than returned.
 */
export class EncodingTableDefect extends Data.Error<{
  readonly value: number
  readonly message: string
}> {}

const quoteAll = (characters: ReadonlyArray<string>): string =>
  characters.map((character) => JSON.stringify(character)).join(", ")

const describeInvalid = (characters: ReadonlyArray<string>): string =>
  `Failed to encode the following characters as ring elements: ${quoteAll(characters)}`

export const invalidSymbol = (input: string): EncodingError =>
  new EncodingError({
    reason: "symbol",
    input,
    invalid: [input],
    message: describeInvalid([input])
  })

export const invalidMessage = (input: string, invalid: ReadonlyArray<string>): EncodingError =>
  new EncodingError({
    reason: "message",
    input,
    invalid,
    message: `Invalid message. ${describeInvalid(invalid)}`
  })

export const invalidCiphertext = (input: string, invalid: ReadonlyArray<string>): EncodingError =>
  new EncodingError({
    reason: "ciphertext",
    input,
    invalid,
    message: `Invalid ciphertext. ${describeInvalid(invalid)}`
  })

export const invalidKey = (input: string): EncodingError =>
  new EncodingError({
    reason: "key",
    input,
    invalid: [],
    message: `Input ${JSON.stringify(input)} does not represent a valid key`
  })

export const missingLetter = (value: number): EncodingTableDefect =>
  new EncodingTableDefect({
    value,
    message: `Could not map ${value} to a letter: the encoding table is broken or the ring element is invalid`
  })
