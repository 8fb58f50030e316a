import type { AttemptContext } from "./attempt-context"
import type { RetryConfig } from "./retry-config"
import type { RetryResult } from "./retry-result"

/** One attempt of the retried operation. */
export type RetryFn<T> = (ctx: AttemptContext) => Promise<T>

/**
 * Runs a function until it returns an accepted result or the attempts,
 * time budget or signal run out.
 *
 * @remarks
 * - `execute()` resolves with the value or throws the failure's `error`.
 * - `tryExecute()` resolves with a result object for every retry outcome.
 * - Both reject on invalid config and on predicate or observer throws.
 * - Aborting while `fn` runs is `fn`'s business; the executor only stops
 *   scheduling further attempts.
 */
export interface IRetryExecutor {
  execute<T>(fn: RetryFn<T>, config: RetryConfig<T>): Promise<T>
  tryExecute<T>(fn: RetryFn<T>, config: RetryConfig<T>): Promise<RetryResult<T>>
}
