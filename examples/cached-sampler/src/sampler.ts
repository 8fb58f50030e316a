import {
  constant,
  createBackoff,
  gaussianJitter,
  type RandomSource,
  sampleNormal,
} from "@scrapekit/backoff"
import type { Clock } from "@scrapekit/clock"
import type { Logger } from "@scrapekit/logger"
import { RetryExhaustedError, retrying } from "@scrapekit/retry"

/** Draws inside this band are rejected and drawn again. */
export const EXCLUDED_BAND = { low: 7, high: 9 } as const

export type SamplerDeps = {
  random: RandomSource
  clock: Clock
  logger: Logger
}

export type SamplerOptions = {
  /** Draws per sample before giving up on it. Default: 5 */
  maxAttempts?: number

  /** Base wait between draws, jittered. Default: 10ms */
  retryDelayMs?: number
}

export type Sampler = (mean: number, stdDev: number, size: number) => Promise<number[]>

/**
 * Collects `size` normal draws that fall outside {@link EXCLUDED_BAND}.
 * A draw that keeps landing inside the band is logged and skipped.
 */
export function createSampler(deps: SamplerDeps, opts: SamplerOptions = {}): Sampler {
  const { random, clock, logger } = deps

  const outsideBand = (x: number) => x > EXCLUDED_BAND.high || x < EXCLUDED_BAND.low
  const draw = retrying((mean: number, stdDev: number) => sampleNormal(random, mean, stdDev), {
    name: "gauss",
    validator: outsideBand,
    maxAttempts: opts.maxAttempts ?? 5,
    delay: createBackoff({
      delay: constant({ delay: { milliseconds: opts.retryDelayMs ?? 10 } }),
      jitter: gaussianJitter({ factor: 1 }, random),
    }),
    clock,
    logger,
  })

  return async function getY(mean, stdDev, size) {
    const values: number[] = []

    while (values.length < size) {
      try {
        values.push(await draw(mean, stdDev))
      } catch (err) {
        if (!(err instanceof RetryExhaustedError)) throw err
        logger.warn("sample skipped", { err })
      }
    }

    return values
  }
}

export type Summary = Readonly<{ count: number; min: number; max: number; mean: number }>

export function summarize(values: readonly number[]): Summary {
  if (values.length === 0) return { count: 0, min: Number.NaN, max: Number.NaN, mean: Number.NaN }

  const sum = values.reduce((acc, x) => acc + x, 0)
  return {
    count: values.length,
    min: Math.min(...values),
    max: Math.max(...values),
    mean: sum / values.length,
  }
}
