export {
  RetryAbortedError,
  RetryExhaustedError,
  type RetryStopReason,
} from "./core/retry-errors"
export { createRetryExecutor, type RetryExecutorDeps } from "./core/retry-executor"
export { type RetryingFunction, type RetryingOptions, retrying } from "./core/retrying"
export type { AttemptContext, RetryAttemptInfo } from "./ports/attempt-context"
export type { RetryObserver } from "./ports/observer"
export type { ErrorPredicate, ResultPredicate } from "./ports/predicates"
export type { RetryConfig } from "./ports/retry-config"
export type { IRetryExecutor, RetryFn } from "./ports/retry-executor"
export type {
  FailedRetryResult,
  RetryResult,
  SuccessfulRetryResult,
} from "./ports/retry-result"
