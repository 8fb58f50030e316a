import { systemRandom } from "../../adapters/random"
import type { Delay, DelayPolicy } from "../../ports/delay-policy"
import type { RandomSource } from "../../ports/random-source"

export interface ExponentialOptions {
  base: Delay

  /** Multiplier per attempt. Default: 2 */
  factor?: number

  /**
   * Draw the exponent uniformly from [0, attempt] instead of using `attempt`.
   * Spreads retries from many callers without raising the ceiling.
   */
  randomExponent?: boolean
}

export function exponential(
  opts: ExponentialOptions,
  random: RandomSource = systemRandom,
): DelayPolicy {
  const { base, factor = 2, randomExponent = false } = opts

  if (!Number.isFinite(factor) || factor < 1) {
    throw new RangeError(`factor must be finite and >= 1 (got ${factor})`)
  }

  return {
    getDelay(attempt: number): Delay {
      const exponent = randomExponent ? Math.floor(random.next() * (attempt + 1)) : attempt

      return { milliseconds: base.milliseconds * factor ** exponent }
    },
  }
}
