import { type DurationUnit, toMilliseconds } from "../core/duration"
import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/**
 * Manually driven clock.
 *
 * `sleep()` never waits on real timers: it moves virtual time forward by the
 * requested amount and records it in `sleeps`.
 */
export class FakeClock implements Clock {
  private time: UnixMs
  private readonly slept: Milliseconds[] = []

  constructor(start: UnixMs = 0) {
    this.time = start
  }

  now(): Date {
    return new Date(this.time)
  }

  nowMs(): UnixMs {
    return this.time
  }

  advance(ms: Milliseconds): void {
    this.time = this.time + ms
  }

  advanceBy(amount: number, unit: DurationUnit): void {
    this.advance(toMilliseconds(amount, unit))
  }

  set(ms: UnixMs): void {
    this.time = ms
  }

  get sleeps(): readonly Milliseconds[] {
    return [...this.slept]
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) return

    this.slept.push(ms)
    if (ms > 0) this.advance(ms)
  }
}
