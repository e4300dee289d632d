import { describe, expect, it } from "@effect/vitest"
import { Either } from "effect"
import fc from "fast-check"

import { RngSeed } from "../../src/core/axioms.js"
import { add, fromCanonicalized, fromChar, randomRingElement, ringValue, sub, toChar } from "../../src/core/ring.js"
import { seededSource } from "../../src/core/rng.js"
import { lowerChar } from "./property-helpers.js"

const canonical = fc.integer({ min: -10_000, max: 10_000 }).map(fromCanonicalized)

const isCanonical = (value: number): boolean => Number.isInteger(value) && value >= 0 && value < 26

describe("ring element properties", () => {
  it("fromCanonicalized returns the least nonnegative residue", () => {
    fc.assert(
      fc.property(fc.integer({ min: -1_000_000, max: 1_000_000 }), (value) => {
        const result = ringValue(fromCanonicalized(value))
        expect(isCanonical(result)).toBe(true)
        expect(Math.abs((result - value) % 26)).toBe(0)
      })
    )
  })

  it("fromChar and toChar are inverse on the alphabet", () => {
    fc.assert(
      fc.property(lowerChar, (letter) => {
        expect(toChar(Either.getOrThrow(fromChar(letter)))).toBe(letter)
      })
    )
  })

  it("arithmetic on canonical elements stays canonical and decodable", () => {
    fc.assert(
      fc.property(canonical, canonical, (left, right) => {
        const sum = add(left, right)
        const difference = sub(left, right)
        expect(isCanonical(sum)).toBe(true)
        expect(isCanonical(difference)).toBe(true)
        expect(() => toChar(sum)).not.toThrow()
        expect(() => toChar(difference)).not.toThrow()
      })
    )
  })

  it("sub undoes add", () => {
    fc.assert(
      fc.property(canonical, canonical, (left, right) => {
        expect(sub(add(left, right), right)).toBe(left)
      })
    )
  })

  it("add agrees with integer addition modulo 26", () => {
    fc.assert(
      fc.property(canonical, canonical, (left, right) => {
        expect(add(left, right)).toBe(fromCanonicalized(left + right))
      })
    )
  })

  it("random elements are canonical for any seed", () => {
    fc.assert(
      fc.property(fc.integer(), (seed) => {
        const source = seededSource(RngSeed(seed))
        for (let i = 0; i < 5; i += 1) {
          expect(isCanonical(randomRingElement(source))).toBe(true)
        }
      })
    )
  })
})
