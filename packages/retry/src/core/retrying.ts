import { type DelayPolicy, immediate } from "@scrapekit/backoff"
import { type Clock, type Milliseconds, SystemClock } from "@scrapekit/clock"
import { createNullLogger, type Logger } from "@scrapekit/logger"
import type { RetryConfig } from "../ports/retry-config"
import { RetryExhaustedError } from "./retry-errors"
import { createRetryExecutor } from "./retry-executor"

export type RetryingOptions<T> = {
  /** Accepts a result; a rejected result triggers another attempt. Default: accept all. */
  validator?: (result: T) => boolean

  /** Total calls, not retries. Default: 1 */
  maxAttempts?: number

  /** Wait after a rejected result. Default: no wait */
  delay?: DelayPolicy

  /**
   * Errors for which another attempt is made. By default thrown errors
   * propagate at once and only rejected results are retried.
   */
  retryOn?: (error: unknown) => boolean

  /** Used in log entries and error messages. Default: `fn.name` */
  name?: string

  clock?: Clock
  logger?: Logger
  signal?: AbortSignal
  maxElapsedMs?: Milliseconds
}

export type RetryingFunction<A extends unknown[], R> = (...args: A) => Promise<Awaited<R>>

/**
 * Wraps `fn` so each call is repeated until `validator` accepts its result.
 *
 * @throws RetryExhaustedError when `maxAttempts` results were all rejected
 *
 * @example
 * ```ts
 * const sample = retrying(() => gauss(10, 3), {
 *   validator: (x) => x > 9 || x < 7,
 *   maxAttempts: 5,
 *   delay: constant({ delay: { milliseconds: 10 } }),
 * })
 * ```
 */
export function retrying<A extends unknown[], R>(
  fn: (...args: A) => R,
  options: RetryingOptions<Awaited<R>> = {},
): RetryingFunction<A, R> {
  const name = options.name ?? (fn.name || "anonymous")
  const executor = createRetryExecutor({ clock: options.clock ?? new SystemClock() })
  const logger = (options.logger ?? createNullLogger()).child({ module: "retry", fn: name })
  const { validator, retryOn } = options

  const config: RetryConfig<Awaited<R>> = {
    maxAttempts: options.maxAttempts ?? 1,
    delay: options.delay ?? immediate,
    errorPredicate: { shouldRetry: (error) => retryOn?.(error) ?? false },
    ...(validator && {
      resultPredicate: { shouldRetry: (result: Awaited<R>) => !validator(result) },
    }),
    observer: {
      onResultRetry: (_result, info) => {
        logger.debug("result rejected, retrying", {
          attempt: info.attempt,
          nextDelayMs: info.nextDelayMs,
        })
      },
      onError: (error, info) => {
        logger.warn("attempt failed, retrying", {
          attempt: info.attempt,
          nextDelayMs: info.nextDelayMs,
          err: error,
        })
      },
      onExhausted: (error, info) => {
        logger.warn("retries exhausted", { attempt: info.attempt, err: error })
      },
    },
    ...(options.signal && { signal: options.signal }),
    ...(options.maxElapsedMs !== undefined && { maxElapsedMs: options.maxElapsedMs }),
  }

  return async (...args: A): Promise<Awaited<R>> => {
    try {
      return await executor.execute(async () => fn(...args), config)
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        throw new RetryExhaustedError(err.attempts, err.lastResult, {
          fn: name,
          call: describeCall(name, args),
        })
      }
      throw err
    }
  }
}

function describeCall(name: string, args: readonly unknown[]): string {
  return `${name}(${args.map(describeArg).join(", ")})`
}

function describeArg(arg: unknown): string {
  if (typeof arg === "string") return JSON.stringify(arg)
  if (typeof arg === "object" && arg !== null) return Array.isArray(arg) ? "[...]" : "{...}"
  return String(arg)
}
