import type { AttemptContext, RetryAttemptInfo } from "./attempt-context"

/**
 * Lifecycle hooks. An observer that throws aborts the run; the error
 * propagates from both `execute` and `tryExecute`.
 */
export interface RetryObserver<T> {
  onAttempt?(ctx: AttemptContext): void | Promise<void>
  onError?(error: unknown, info: RetryAttemptInfo): void | Promise<void>
  onResultRetry?(result: T, info: RetryAttemptInfo): void | Promise<void>
  onSuccess?(result: T, ctx: AttemptContext): void | Promise<void>
  onExhausted?(error: unknown, info: RetryAttemptInfo): void | Promise<void>
  onAborted?(ctx: AttemptContext): void | Promise<void>
}
