import { BaseError, type ErrorContext } from "@scrapekit/errors"

/** Every attempt returned a result the validator rejected. */
export class RetryExhaustedError extends BaseError<"retry_exhausted"> {
  readonly attempts: number
  readonly lastResult: unknown

  constructor(attempts: number, lastResult: unknown, context: ErrorContext = {}) {
    const subject = typeof context.call === "string" ? context.call : "call"

    super(`${subject} returned an invalid result ${attempts} times`, {
      code: "retry_exhausted",
      context: { ...context, attempts },
      isRetryable: true,
    })

    this.attempts = attempts
    this.lastResult = lastResult
  }
}

export type RetryStopReason = "aborted" | "timed_out"

/** The run stopped on a signal or time budget before any attempt failed. */
export class RetryAbortedError extends BaseError<"retry_aborted"> {
  readonly reason: RetryStopReason

  constructor(reason: RetryStopReason, attempts: number) {
    super(reason === "aborted" ? "Retry aborted" : "Retry timed out", {
      code: "retry_aborted",
      context: { reason, attempts },
    })

    this.reason = reason
  }
}
