import type { Milliseconds } from "@scrapekit/clock"

export type Delay = { milliseconds: Milliseconds }

/**
 * Delay before the next attempt; attempt is 0-indexed.
 */
export interface DelayPolicy {
  getDelay(attempt: number): Delay
}
