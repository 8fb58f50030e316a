import type { Milliseconds, UnixMs } from "@scrapekit/clock"

type BoundedStaleness = { kind: "bounded"; milliseconds: Milliseconds }
type UnboundedStaleness = { kind: "unbounded" }
type SinceStaleness = { kind: "since"; cutoff: UnixMs }

/**
 * Reaches back by calendar years and months as well as fixed time. The
 * cutoff depends on the date it is measured from, so it is computed per read.
 */
type CalendarStaleness = {
  kind: "calendar"
  years: number
  months: number
  milliseconds: Milliseconds
}

/** How far back a cached entry may have been written and still be served. */
export type StalenessDuration =
  | BoundedStaleness
  | UnboundedStaleness
  | SinceStaleness
  | CalendarStaleness

/**
 * Accepted reachback input: a duration phrase (`"2 hours"`, `"1h 30m"`,
 * `"20 years, 3 months"`), a bare number of seconds, `"never"`, or an ISO
 * date, possibly partial (`"2000-12"`).
 */
export type ReachbackSpec = string | number
