import type { Milliseconds, UnixMs } from "@scrapekit/clock"

export interface AttemptContext {
  /** 0-indexed attempt number */
  attempt: number

  /** attempt + 1 */
  attemptsSoFar: number

  /** Epoch ms when the first attempt started */
  startedAt: UnixMs

  elapsedMs: Milliseconds

  signal?: AbortSignal
}

export interface RetryAttemptInfo extends AttemptContext {
  /** Wait before the next attempt; null when no attempt follows */
  nextDelayMs: Milliseconds | null

  isLastAttempt: boolean
}
