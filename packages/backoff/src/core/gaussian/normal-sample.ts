import type { RandomSource } from "../../ports/random-source"

/**
 * One draw from N(0, 1) via Box-Muller. Consumes two values from `random`.
 */
export function sampleStandardNormal(random: RandomSource): number {
  // 1 - u keeps the log argument in (0, 1]
  const u1 = 1 - random.next()
  const u2 = random.next()

  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2)
}

export function sampleNormal(random: RandomSource, mean: number, stdDev: number): number {
  return mean + stdDev * sampleStandardNormal(random)
}
