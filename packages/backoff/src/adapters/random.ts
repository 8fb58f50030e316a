import type { RandomSource } from "../ports/random-source"

export const systemRandom: RandomSource = {
  next(): number {
    return Math.random()
  },
}

/**
 * Deterministic source (mulberry32). Same seed, same sequence; useful for
 * reproducible jitter in demos and tests.
 */
export function seededRandom(seed: number): RandomSource {
  let state = seed >>> 0

  return {
    next(): number {
      state = (state + 0x6d2b79f5) >>> 0
      let t = state
      t = Math.imul(t ^ (t >>> 15), t | 1)
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61)
      return ((t ^ (t >>> 14)) >>> 0) / 4_294_967_296
    },
  }
}
