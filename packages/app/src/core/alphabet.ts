const letters = "abcdefghijklmnopqrstuvwxyz"

export type AlphabetEntry = readonly [letter: string, value: number]

/**
 * Encoding of the lowercase Latin alphabet in the integers modulo 26.
 *
 * @invariant the table is a bijection between `a..z` and `0..25`
 */
export const latinAlphabet: ReadonlyArray<AlphabetEntry> = Array.from(
  letters,
  (letter, value): AlphabetEntry => [letter, value]
)

/** Size of the ring, drawn from the encoding table. */
export const modulus = latinAlphabet.length

const valuesByLetter: ReadonlyMap<string, number> = new Map(latinAlphabet)

const lettersByValue: ReadonlyMap<number, string> = new Map(
  latinAlphabet.map(([letter, value]): readonly [number, string] => [value, letter])
)

export const encodeLetter = (letter: string): number | undefined => valuesByLetter.get(letter)

export const decodeValue = (value: number): string | undefined => lettersByValue.get(value)
