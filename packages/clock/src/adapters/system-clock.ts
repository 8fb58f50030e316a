import { setTimeout as wait } from "node:timers/promises"

import type { Clock } from "../ports/clock"
import type { Milliseconds, UnixMs } from "../ports/time"

/** Wall clock backed by `Date` and Node timers. */
export class SystemClock implements Clock {
  now(): Date {
    return new Date()
  }

  nowMs(): UnixMs {
    return Date.now()
  }

  async sleep(ms: Milliseconds, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return

    try {
      await wait(ms, undefined, signal ? { signal } : {})
    } catch (err) {
      // An abort ends the wait early; anything else is a real failure.
      if (signal?.aborted) return
      throw err
    }
  }
}
