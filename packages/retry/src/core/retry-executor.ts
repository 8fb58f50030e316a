import type { DelayPolicy } from "@scrapekit/backoff"
import type { Clock, Milliseconds, UnixMs } from "@scrapekit/clock"
import type { AttemptContext, RetryAttemptInfo } from "../ports/attempt-context"
import type { RetryConfig } from "../ports/retry-config"
import type { IRetryExecutor, RetryFn } from "../ports/retry-executor"
import type { RetryResult } from "../ports/retry-result"
import { RetryAbortedError, RetryExhaustedError } from "./retry-errors"

export type RetryExecutorDeps = {
  clock: Clock
}

export function createRetryExecutor(deps: RetryExecutorDeps): IRetryExecutor {
  return new RetryExecutor(deps)
}

type Outcome<T> = { done: true; result: RetryResult<T> } | { done: false }
type AttemptResult<T> = { ok: true; value: T } | { ok: false; error: unknown }

class RetryExecutor implements IRetryExecutor {
  constructor(private readonly deps: RetryExecutorDeps) {}

  async execute<T>(fn: RetryFn<T>, config: RetryConfig<T>): Promise<T> {
    const result = await this.run(fn, config)

    if (result.success) return result.value

    throw result.error
  }

  async tryExecute<T>(fn: RetryFn<T>, config: RetryConfig<T>): Promise<RetryResult<T>> {
    return this.run(fn, config)
  }

  private async run<T>(fn: RetryFn<T>, config: RetryConfig<T>): Promise<RetryResult<T>> {
    this.validateConfig(config)

    const { maxAttempts, observer, signal, maxElapsedMs } = config
    const startedAt = this.deps.clock.nowMs()
    let lastError: unknown
    let failed = false

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const ctx = this.buildContext(attempt, startedAt, signal)

      if (signal?.aborted) {
        await observer?.onAborted?.(ctx)
        return this.stoppedResult(new RetryAbortedError("aborted", attempt), ctx, "aborted")
      }

      if (maxElapsedMs !== undefined && ctx.elapsedMs >= maxElapsedMs) {
        const error = failed ? lastError : new RetryAbortedError("timed_out", attempt)
        await observer?.onExhausted?.(error, this.buildInfo(ctx, null, true))
        return this.stoppedResult(error, ctx, "timed_out")
      }

      await observer?.onAttempt?.(ctx)

      const isLastAttempt = attempt === maxAttempts - 1
      const attemptResult = await this.tryAttempt(fn, ctx)

      const outcome = attemptResult.ok
        ? await this.handleResult(attemptResult.value, ctx, isLastAttempt, config)
        : await this.handleError(attemptResult.error, ctx, isLastAttempt, config)

      if (outcome.done) return outcome.result

      if (!attemptResult.ok) {
        lastError = attemptResult.error
        failed = true
      }
    }

    // maxAttempts >= 1 and the last attempt always settles
    throw new RangeError("retry loop ended without a result")
  }

  private async tryAttempt<T>(fn: RetryFn<T>, ctx: AttemptContext): Promise<AttemptResult<T>> {
    try {
      return await fn(ctx).then(
        (value): AttemptResult<T> => ({ ok: true, value }),
        (error: unknown): AttemptResult<T> => ({ ok: false, error }),
      )
    } catch (error) {
      // fn threw before returning a promise
      return { ok: false, error }
    }
  }

  private async handleResult<T>(
    result: T,
    ctx: AttemptContext,
    isLastAttempt: boolean,
    config: RetryConfig<T>,
  ): Promise<Outcome<T>> {
    const { resultPredicate, observer } = config
    const rejected = resultPredicate?.shouldRetry(result, ctx) ?? false

    if (!rejected) {
      await observer?.onSuccess?.(result, ctx)
      return { done: true, result: this.successResult(result, ctx) }
    }

    if (isLastAttempt) {
      const error = new RetryExhaustedError(ctx.attemptsSoFar, result)
      await observer?.onExhausted?.(error, this.buildInfo(ctx, null, true))
      return { done: true, result: this.failedResult(error, ctx) }
    }

    const nextDelayMs = this.getDelayMs(config.delay, ctx.attempt)
    await observer?.onResultRetry?.(result, this.buildInfo(ctx, nextDelayMs, false))
    await this.sleep(nextDelayMs, config, ctx.startedAt)

    return { done: false }
  }

  private async handleError<T>(
    error: unknown,
    ctx: AttemptContext,
    isLastAttempt: boolean,
    config: RetryConfig<T>,
  ): Promise<Outcome<T>> {
    const { errorPredicate, observer } = config
    const retryable = errorPredicate?.shouldRetry(error, ctx) ?? true

    if (!retryable || isLastAttempt) {
      await observer?.onExhausted?.(error, this.buildInfo(ctx, null, true))
      return { done: true, result: this.failedResult(error, ctx) }
    }

    const nextDelayMs = this.getDelayMs(config.delay, ctx.attempt)
    await observer?.onError?.(error, this.buildInfo(ctx, nextDelayMs, false))
    await this.sleep(nextDelayMs, config, ctx.startedAt)

    return { done: false }
  }

  private validateConfig(config: RetryConfig<unknown>): void {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be an integer >= 1 (got ${config.maxAttempts})`)
    }

    const { maxElapsedMs } = config
    if (maxElapsedMs !== undefined && (!Number.isFinite(maxElapsedMs) || maxElapsedMs < 0)) {
      throw new RangeError(`maxElapsedMs must be a finite number >= 0 (got ${maxElapsedMs})`)
    }
  }

  private getDelayMs(delay: DelayPolicy, attempt: number): Milliseconds {
    return delay.getDelay(attempt).milliseconds
  }

  private buildContext(attempt: number, startedAt: UnixMs, signal?: AbortSignal): AttemptContext {
    return {
      attempt,
      attemptsSoFar: attempt + 1,
      startedAt,
      elapsedMs: this.deps.clock.nowMs() - startedAt,
      ...(signal && { signal }),
    }
  }

  private buildInfo(
    ctx: AttemptContext,
    nextDelayMs: Milliseconds | null,
    isLastAttempt: boolean,
  ): RetryAttemptInfo {
    return { ...ctx, nextDelayMs, isLastAttempt }
  }

  /** Waits, cut short by the remaining time budget. */
  private async sleep(
    delayMs: Milliseconds,
    config: RetryConfig<unknown>,
    startedAt: UnixMs,
  ): Promise<void> {
    const { maxElapsedMs, signal } = config
    const remaining =
      maxElapsedMs === undefined
        ? delayMs
        : maxElapsedMs - (this.deps.clock.nowMs() - startedAt)
    const actual = Math.min(delayMs, Math.max(0, remaining))

    if (actual > 0) await this.deps.clock.sleep(actual, signal)
  }

  private successResult<T>(value: T, ctx: AttemptContext): RetryResult<T> {
    return {
      success: true,
      value,
      attempts: ctx.attemptsSoFar,
      elapsedMs: this.deps.clock.nowMs() - ctx.startedAt,
    }
  }

  private failedResult<T>(error: unknown, ctx: AttemptContext): RetryResult<T> {
    return {
      success: false,
      error,
      attempts: ctx.attemptsSoFar,
      elapsedMs: this.deps.clock.nowMs() - ctx.startedAt,
      aborted: false,
      timedOut: false,
    }
  }

  /** `ctx` is the attempt that never started. */
  private stoppedResult<T>(
    error: unknown,
    ctx: AttemptContext,
    reason: "aborted" | "timed_out",
  ): RetryResult<T> {
    return {
      success: false,
      error,
      attempts: ctx.attempt,
      elapsedMs: ctx.elapsedMs,
      aborted: reason === "aborted",
      timedOut: reason === "timed_out",
    }
  }
}
