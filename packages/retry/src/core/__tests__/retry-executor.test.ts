import { constant, type DelayPolicy, immediate } from "@scrapekit/backoff"
import { FakeClock, type Milliseconds } from "@scrapekit/clock"
import { RetryAbortedError, RetryExhaustedError } from "../retry-errors"
import { createRetryExecutor } from "../retry-executor"

class AbortingClock extends FakeClock {
  constructor(private readonly controller: AbortController) {
    super(0)
  }

  override async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    this.controller.abort()
    await super.sleep(ms, signal)
  }
}

const failTimes = (n: number, value = "ok") => {
  let calls = 0

  return vi.fn(async () => {
    calls++
    if (calls <= n) throw new Error(`failure ${calls}`)
    return value
  })
}

describe("createRetryExecutor", () => {
  let clock: FakeClock
  let delay: DelayPolicy

  beforeEach(() => {
    clock = new FakeClock(0)
    delay = constant({ delay: { milliseconds: 100 } })
  })

  describe("config validation", () => {
    it.each([0, -1, 2.5])("rejects maxAttempts = %s", async (maxAttempts) => {
      const executor = createRetryExecutor({ clock })

      await expect(
        executor.tryExecute(async () => "ok", { maxAttempts, delay }),
      ).rejects.toThrow(RangeError)
    })

    it.each([Number.NaN, Number.POSITIVE_INFINITY, -5])(
      "rejects maxElapsedMs = %s",
      async (maxElapsedMs) => {
        const executor = createRetryExecutor({ clock })

        await expect(
          executor.tryExecute(async () => "ok", { maxAttempts: 1, delay, maxElapsedMs }),
        ).rejects.toThrow(RangeError)
      },
    )
  })

  describe("errors", () => {
    it("retries thrown errors by default and returns the first success", async () => {
      const executor = createRetryExecutor({ clock })
      const fn = failTimes(2)

      const result = await executor.tryExecute(fn, { maxAttempts: 3, delay })

      expect(result).toEqual({ success: true, value: "ok", attempts: 3, elapsedMs: 200 })
      expect(clock.sleeps).toEqual([100, 100])
    })

    it("reports the last error when attempts run out", async () => {
      const executor = createRetryExecutor({ clock })

      const result = await executor.tryExecute(failTimes(5), { maxAttempts: 3, delay })

      expect(result.success).toBe(false)
      if (result.success) return
      expect(result.error).toEqual(new Error("failure 3"))
      expect(result).toMatchObject({ attempts: 3, aborted: false, timedOut: false })
    })

    it("execute() throws the failure's error", async () => {
      const executor = createRetryExecutor({ clock })

      await expect(executor.execute(failTimes(5), { maxAttempts: 2, delay })).rejects.toThrow(
        "failure 2",
      )
    })

    it("stops when the error predicate declines", async () => {
      const executor = createRetryExecutor({ clock })
      const fn = failTimes(5)

      const result = await executor.tryExecute(fn, {
        maxAttempts: 5,
        delay,
        errorPredicate: { shouldRetry: () => false },
      })

      expect(fn).toHaveBeenCalledTimes(1)
      expect(result).toMatchObject({ success: false, attempts: 1 })
    })

    it("treats a synchronous throw like a rejection", async () => {
      const executor = createRetryExecutor({ clock })

      const result = await executor.tryExecute(
        () => {
          throw new Error("sync")
        },
        { maxAttempts: 1, delay },
      )

      expect(result).toMatchObject({ success: false, error: new Error("sync") })
    })
  })

  describe("results", () => {
    it("retries rejected results until one is accepted", async () => {
      const executor = createRetryExecutor({ clock })
      let n = 0

      const value = await executor.execute(async () => ++n, {
        maxAttempts: 5,
        delay: immediate,
        resultPredicate: { shouldRetry: (result) => result < 3 },
      })

      expect(value).toBe(3)
      expect(clock.sleeps).toEqual([])
    })

    it("fails with RetryExhaustedError when the last result is still rejected", async () => {
      const executor = createRetryExecutor({ clock })

      const result = await executor.tryExecute(async () => 8, {
        maxAttempts: 3,
        delay,
        resultPredicate: { shouldRetry: () => true },
      })

      expect(result.success).toBe(false)
      if (result.success) return
      expect(result.error).toBeInstanceOf(RetryExhaustedError)
      expect(result.error).toMatchObject({ attempts: 3, lastResult: 8 })
      expect(clock.sleeps).toEqual([100, 100])
    })

    it("asks the delay policy with the 0-indexed attempt", async () => {
      const executor = createRetryExecutor({ clock })
      const getDelay = vi.fn((attempt: number) => ({ milliseconds: (attempt + 1) * 10 }))

      await executor.tryExecute(failTimes(5), { maxAttempts: 3, delay: { getDelay } })

      expect(getDelay.mock.calls).toEqual([[0], [1]])
      expect(clock.sleeps).toEqual([10, 20])
    })
  })

  describe("cancellation", () => {
    it("does not call fn when the signal is already aborted", async () => {
      const executor = createRetryExecutor({ clock })
      const ac = new AbortController()
      ac.abort()
      const fn = vi.fn(async () => "ok")

      const result = await executor.tryExecute(fn, { maxAttempts: 3, delay, signal: ac.signal })

      expect(fn).not.toHaveBeenCalled()
      expect(result).toMatchObject({ success: false, attempts: 0, aborted: true })
      if (result.success) return
      expect(result.error).toBeInstanceOf(RetryAbortedError)
    })

    it("stops after a wait during which the signal was aborted", async () => {
      const ac = new AbortController()
      const executor = createRetryExecutor({ clock: new AbortingClock(ac) })
      const onAborted = vi.fn()
      const fn = failTimes(5)

      const result = await executor.tryExecute(fn, {
        maxAttempts: 5,
        delay,
        signal: ac.signal,
        observer: { onAborted },
      })

      expect(fn).toHaveBeenCalledTimes(1)
      expect(result).toMatchObject({ success: false, attempts: 1, aborted: true })
      expect(onAborted).toHaveBeenCalledTimes(1)
    })
  })

  describe("time budget", () => {
    it("times out once elapsed time reaches maxElapsedMs", async () => {
      const executor = createRetryExecutor({ clock })
      let n = 0
      const slowFailure = async () => {
        clock.advance(60)
        throw new Error(`slow ${++n}`)
      }

      const result = await executor.tryExecute(slowFailure, {
        maxAttempts: 10,
        delay: immediate,
        maxElapsedMs: 100,
      })

      expect(result).toEqual({
        success: false,
        error: new Error("slow 2"),
        attempts: 2,
        elapsedMs: 120,
        aborted: false,
        timedOut: true,
      })
    })

    it("shortens the last wait to the remaining budget", async () => {
      const executor = createRetryExecutor({ clock })

      const result = await executor.tryExecute(failTimes(10), {
        maxAttempts: 10,
        delay,
        maxElapsedMs: 150,
      })

      expect(clock.sleeps).toEqual([100, 50])
      expect(result).toMatchObject({ attempts: 2, timedOut: true })
    })
  })

  describe("observer", () => {
    it("reports attempts, retries and success in order", async () => {
      const executor = createRetryExecutor({ clock })
      const events: string[] = []

      await executor.execute(failTimes(1), {
        maxAttempts: 3,
        delay,
        observer: {
          onAttempt: (ctx) => {
            events.push(`attempt ${ctx.attempt}`)
          },
          onError: (_err, info) => {
            events.push(`error next=${info.nextDelayMs} last=${info.isLastAttempt}`)
          },
          onSuccess: (value, ctx) => {
            events.push(`success ${String(value)} after ${ctx.attemptsSoFar}`)
          },
        },
      })

      expect(events).toEqual([
        "attempt 0",
        "error next=100 last=false",
        "attempt 1",
        "success ok after 2",
      ])
    })

    it("propagates observer failures", async () => {
      const executor = createRetryExecutor({ clock })

      await expect(
        executor.tryExecute(async () => "ok", {
          maxAttempts: 1,
          delay,
          observer: {
            onSuccess: () => {
              throw new Error("observer broke")
            },
          },
        }),
      ).rejects.toThrow("observer broke")
    })
  })
})
