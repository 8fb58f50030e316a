import { fixedRandom } from "../../../tests/utils/random-sources"
import { constant, immediate } from "../constant"
import { exponential } from "../exponential"

describe("constant", () => {
  it("returns the same delay for every attempt", () => {
    const policy = constant({ delay: { milliseconds: 250 } })

    expect(policy.getDelay(0)).toEqual({ milliseconds: 250 })
    expect(policy.getDelay(9)).toEqual({ milliseconds: 250 })
  })

  it("immediate never waits", () => {
    expect(immediate.getDelay(3)).toEqual({ milliseconds: 0 })
  })
})

describe("exponential", () => {
  it("doubles by default", () => {
    const policy = exponential({ base: { milliseconds: 100 } })

    expect([0, 1, 2, 3].map((a) => policy.getDelay(a).milliseconds)).toEqual([
      100, 200, 400, 800,
    ])
  })

  it("uses a custom factor", () => {
    const policy = exponential({ base: { milliseconds: 10 }, factor: 3 })

    expect(policy.getDelay(2)).toEqual({ milliseconds: 90 })
  })

  it("factor 1 is constant", () => {
    const policy = exponential({ base: { milliseconds: 10 }, factor: 1 })

    expect(policy.getDelay(7)).toEqual({ milliseconds: 10 })
  })

  it("draws the exponent from [0, attempt] when randomized", () => {
    const low = exponential({ base: { milliseconds: 10 }, randomExponent: true }, fixedRandom(0))
    const mid = exponential(
      { base: { milliseconds: 10 }, randomExponent: true },
      fixedRandom(0.5),
    )
    const high = exponential(
      { base: { milliseconds: 10 }, randomExponent: true },
      fixedRandom(0.99),
    )

    expect(low.getDelay(3)).toEqual({ milliseconds: 10 })
    // floor(0.5 * 4) = 2
    expect(mid.getDelay(3)).toEqual({ milliseconds: 40 })
    // floor(0.99 * 4) = 3
    expect(high.getDelay(3)).toEqual({ milliseconds: 80 })
  })

  it("rejects factors below 1", () => {
    expect(() => exponential({ base: { milliseconds: 10 }, factor: 0.5 })).toThrow(RangeError)
  })
})
