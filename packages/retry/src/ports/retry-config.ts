import type { DelayPolicy } from "@scrapekit/backoff"
import type { Milliseconds } from "@scrapekit/clock"
import type { RetryObserver } from "./observer"
import type { ErrorPredicate, ResultPredicate } from "./predicates"

/**
 * @remarks
 * `maxAttempts` counts tries, not retries: 1 means a single call.
 *
 * Without `errorPredicate` every thrown error is retried; without
 * `resultPredicate` every result is accepted. A result still rejected on the
 * last attempt ends the run with {@link RetryExhaustedError}.
 */
export interface RetryConfig<T = unknown> {
  /** Integer >= 1 */
  maxAttempts: number

  delay: DelayPolicy

  errorPredicate?: ErrorPredicate

  resultPredicate?: ResultPredicate<T>

  observer?: RetryObserver<T>

  signal?: AbortSignal

  /** Wall-clock budget for all attempts and waits. */
  maxElapsedMs?: Milliseconds
}
