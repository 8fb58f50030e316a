import type { Milliseconds } from "@scrapekit/clock"

export type SuccessfulRetryResult<T> = {
  success: true
  value: T
  attempts: number
  elapsedMs: Milliseconds
}

export type FailedRetryResult = {
  success: false

  /**
   * The last thrown error, a `RetryExhaustedError` when results kept being
   * rejected, or a `RetryAbortedError` when stopped without any error.
   */
  error: unknown
  attempts: number
  elapsedMs: Milliseconds
  aborted: boolean
  timedOut: boolean
}

export type RetryResult<T> = SuccessfulRetryResult<T> | FailedRetryResult
