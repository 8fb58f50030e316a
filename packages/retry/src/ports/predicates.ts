import type { AttemptContext } from "./attempt-context"

/** Whether a thrown error deserves another attempt. */
export interface ErrorPredicate {
  shouldRetry(error: unknown, ctx: AttemptContext): boolean
}

/** Whether a returned result must be rejected and the call attempted again. */
export interface ResultPredicate<T> {
  shouldRetry(result: T, ctx: AttemptContext): boolean
}
