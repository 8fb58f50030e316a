import { systemRandom } from "../../adapters/random"
import type { JitterStrategy } from "../../ports/jitter-strategy"
import type { RandomSource } from "../../ports/random-source"
import { sampleNormal } from "../gaussian/normal-sample"

/** Width of the accepted band, in standard deviations. */
export const JITTER_SIGMA_COUNT = 4

const MAX_SAMPLES = 1_000

export type GaussianJitterOptions = {
  /**
   * Spread relative to the value. With factor 1 the jittered value stays
   * within (0, 2 * value); factor 0.5 keeps it within (0.5, 1.5) * value.
   */
  factor: number
}

/**
 * Zero-mean offset drawn from a normal distribution cropped to
 * ±{@link JITTER_SIGMA_COUNT} sigma, where sigma = |value| * factor / 4.
 * Samples outside the band are redrawn, not clipped.
 */
export function gaussianJitterAmount(
  value: number,
  factor: number,
  random: RandomSource = systemRandom,
): number {
  assertFactor(factor)

  if (factor === 0 || value === 0) return 0

  const stdDev = (Math.abs(value) * factor) / JITTER_SIGMA_COUNT
  const bound = stdDev * JITTER_SIGMA_COUNT

  for (let i = 0; i < MAX_SAMPLES; i++) {
    const amount = sampleNormal(random, 0, stdDev)
    if (Math.abs(amount) < bound) return amount
  }

  // a random source stuck outside the band
  return 0
}

export function gaussianJitter(
  options: GaussianJitterOptions,
  random: RandomSource = systemRandom,
): JitterStrategy {
  assertFactor(options.factor)

  return {
    apply(value: number): number {
      return value + gaussianJitterAmount(value, options.factor, random)
    },
  }
}

function assertFactor(factor: number): void {
  if (!Number.isFinite(factor) || factor < 0) {
    throw new RangeError(`jitter factor must be finite and >= 0 (got ${factor})`)
  }
}
