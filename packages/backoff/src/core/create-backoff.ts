import type { Delay, DelayPolicy } from "../ports/delay-policy"
import type { JitterStrategy } from "../ports/jitter-strategy"

function sanitize(ms: number, fallback: number): number {
  return Number.isFinite(ms) && ms >= 0 ? ms : fallback
}

function clamp(ms: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, ms))
}

function validateBounds(min: Delay, max: Delay): { minMs: number; maxMs: number } {
  const minMs = min.milliseconds
  const maxMs = max.milliseconds

  if (!Number.isFinite(minMs) || minMs < 0) {
    throw new RangeError(`min.milliseconds must be finite and >= 0 (got ${minMs})`)
  }

  if (!Number.isFinite(maxMs) || maxMs < 0) {
    throw new RangeError(`max.milliseconds must be finite and >= 0 (got ${maxMs})`)
  }

  if (maxMs < minMs) {
    throw new RangeError(
      `max.milliseconds must be >= min.milliseconds (got ${maxMs} < ${minMs})`,
    )
  }

  return { minMs, maxMs }
}

export type CreateBackoffOptions = {
  delay: DelayPolicy
  jitter?: JitterStrategy

  /** Floor for delay. Default: 0 */
  min?: Delay

  /** Ceiling for delay. Default: unbounded */
  max?: Delay
}

/**
 * Wraps a delay policy with jitter, then sanitizes and clamps the result to
 * whole, finite, non-negative milliseconds within [min, max].
 */
export function createBackoff(options: CreateBackoffOptions): DelayPolicy {
  const {
    delay,
    jitter,
    min = { milliseconds: 0 },
    max = { milliseconds: Number.MAX_SAFE_INTEGER },
  } = options

  const { minMs, maxMs } = validateBounds(min, max)

  return {
    getDelay(attempt: number): Delay {
      const raw = delay.getDelay(attempt).milliseconds
      const jittered = jitter ? jitter.apply(raw) : raw
      const clamped = clamp(sanitize(jittered, minMs), minMs, maxMs)

      return { milliseconds: Math.floor(clamped) }
    },
  }
}
