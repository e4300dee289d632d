import { describe, expect, it } from "@effect/vitest"
import fc from "fast-check"

import { RngSeed } from "../../src/core/axioms.js"
import { type EntropySource, nextSeed, seededSource, uniformBelow } from "../../src/core/rng.js"

const modulus = 2_147_483_647

const scriptedSource = (bound: number, draws: ReadonlyArray<number>): EntropySource => {
  let index = 0
  return {
    bound,
    next: () => {
      const draw = draws[index]
      index += 1
      if (draw === undefined) {
        throw new Error("scripted source exhausted")
      }
      return draw
    }
  }
}

const countingSource = (bound: number): EntropySource => {
  let counter = 0
  return {
    bound,
    next: () => {
      const draw = counter % bound
      counter += 1
      return draw
    }
  }
}

describe("rng", () => {
  it("nextSeed stays within (0, modulus)", () => {
    fc.assert(
      fc.property(fc.integer({ min: -1_000_000, max: 1_000_000 }), (seed) => {
        const next = nextSeed(RngSeed(seed))
        expect(next).toBeGreaterThan(0)
        expect(next).toBeLessThan(modulus)
      })
    )
  })

  it("nextSeed does not get stuck on a zero seed", () => {
    expect(nextSeed(RngSeed(0))).toBe(48_271)
    expect(nextSeed(RngSeed(modulus))).toBe(48_271)
  })

  it("nextSeed follows the minimal standard sequence", () => {
    expect(nextSeed(RngSeed(1))).toBe(48_271)
    expect(nextSeed(RngSeed(48_271))).toBe(182_605_794)
  })

  it("seeded sources with the same seed agree", () => {
    fc.assert(
      fc.property(fc.integer(), (seed) => {
        const first = seededSource(RngSeed(seed))
        const second = seededSource(RngSeed(seed))
        for (let i = 0; i < 8; i += 1) {
          const draw = first.next()
          expect(second.next()).toBe(draw)
          expect(draw).toBeGreaterThanOrEqual(0)
          expect(draw).toBeLessThan(first.bound)
        }
      })
    )
  })

  it("uniformBelow refuses an empty or fractional range", () => {
    fc.assert(
      fc.property(fc.constantFrom(0, -1, -10, 2.5, Number.NaN, Number.POSITIVE_INFINITY), (upperExclusive) => {
        expect(() => uniformBelow(seededSource(RngSeed(1)), upperExclusive)).toThrow(RangeError)
      })
    )
  })

  it("uniformBelow refuses draws outside the integers of [0, bound)", () => {
    for (const draw of [0.5, -1, 30, Number.NaN]) {
      expect(() => uniformBelow(scriptedSource(30, [draw]), 26)).toThrow(RangeError)
    }
  })

  it("uniformBelow refuses a source without a positive integer bound", () => {
    expect(() => uniformBelow(scriptedSource(Number.NaN, [0]), 26)).toThrow(RangeError)
    expect(() => uniformBelow(scriptedSource(30.5, [0]), 26)).toThrow(RangeError)
  })

  it("seeded sources refuse fractional seeds up front", () => {
    expect(() => seededSource(RngSeed(0.5))).toThrow("RNG seed must be an integer, got 0.5")
    expect(() => nextSeed(RngSeed(Number.NaN))).toThrow(RangeError)
  })

  it("uniformBelow returns values within bounds", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 1000 }),
        fc.integer({ min: 1, max: 1_000_000 }),
        (upperExclusive, seed) => {
          const value = uniformBelow(seededSource(RngSeed(seed)), upperExclusive)
          expect(value).toBeGreaterThanOrEqual(0)
          expect(value).toBeLessThan(upperExclusive)
        }
      )
    )
  })

  it("uniformBelow rejects draws in the biased tail", () => {
    // bound 30, n 26: draws 26..29 would over-weight residues 0..3
    const source = scriptedSource(30, [29, 27, 26, 3])
    expect(uniformBelow(source, 26)).toBe(3)
  })

  it("uniformBelow accepts the last unbiased draw", () => {
    expect(uniformBelow(scriptedSource(30, [25]), 26)).toBe(25)
  })

  it("uniformBelow hits every residue equally over a full cycle", () => {
    const source = countingSource(64)
    const counts = new Array<number>(26).fill(0)
    for (let i = 0; i < 52; i += 1) {
      const value = uniformBelow(source, 26)
      counts[value] = (counts[value] ?? 0) + 1
    }
    expect(counts).toEqual(new Array<number>(26).fill(2))
  })

  it("uniformBelow refuses a range wider than the source", () => {
    expect(() => uniformBelow(scriptedSource(10, [0]), 26)).toThrow(RangeError)
  })
})
