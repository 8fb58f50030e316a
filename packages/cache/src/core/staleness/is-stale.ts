import type { UnixMs } from "@scrapekit/clock"
import type { StalenessDuration } from "../../ports/staleness"

/**
 * Whether an entry written at `createdAt` is too old to serve at `now`.
 * An entry exactly at the bound is still fresh.
 */
export function isStale(createdAt: UnixMs, now: UnixMs, duration: StalenessDuration): boolean {
  switch (duration.kind) {
    case "bounded":
      return now - createdAt > duration.milliseconds
    case "unbounded":
      return false
    case "since":
      return createdAt < duration.cutoff
    case "calendar": {
      const monthsBack = duration.years * 12 + duration.months
      return createdAt < calendarCutoff(now, monthsBack, duration.milliseconds)
    }
  }
}

/**
 * `now` minus the fixed part, then minus whole months in UTC. The day of
 * month is kept, clamped to the length of the target month.
 */
function calendarCutoff(now: UnixMs, monthsBack: number, milliseconds: number): UnixMs {
  const cutoff = new Date(now - milliseconds)
  const day = cutoff.getUTCDate()

  cutoff.setUTCDate(1)
  cutoff.setUTCMonth(cutoff.getUTCMonth() - monthsBack)
  cutoff.setUTCDate(Math.min(day, daysInMonth(cutoff)))

  return cutoff.getTime()
}

function daysInMonth(date: Date): number {
  const lastDay = new Date(date.getTime())
  lastDay.setUTCMonth(lastDay.getUTCMonth() + 1, 0)
  return lastDay.getUTCDate()
}
