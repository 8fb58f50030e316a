import { type DurationUnit, type Milliseconds, toMilliseconds } from "@scrapekit/clock"
import type { ReachbackSpec, StalenessDuration } from "../../ports/staleness"
import { InvalidStalenessSpecError } from "../cache-errors"

/** Entries never go stale. */
export const DEFAULT_REACHBACK = "never"

const UNBOUNDED = new Set(["never", "infinite", "infinity", "forever"])

const UNITS = new Map<string, DurationUnit>([
  ["ms", "millisecond"],
  ["millisecond", "millisecond"],
  ["milliseconds", "millisecond"],
  ["s", "second"],
  ["sec", "second"],
  ["secs", "second"],
  ["second", "second"],
  ["seconds", "second"],
  ["m", "minute"],
  ["min", "minute"],
  ["mins", "minute"],
  ["minute", "minute"],
  ["minutes", "minute"],
  ["h", "hour"],
  ["hr", "hour"],
  ["hrs", "hour"],
  ["hour", "hour"],
  ["hours", "hour"],
  ["d", "day"],
  ["day", "day"],
  ["days", "day"],
  ["w", "week"],
  ["wk", "week"],
  ["wks", "week"],
  ["week", "week"],
  ["weeks", "week"],
])

type CalendarUnit = "year" | "month"

const CALENDAR_UNITS = new Map<string, CalendarUnit>([
  ["y", "year"],
  ["yr", "year"],
  ["yrs", "year"],
  ["year", "year"],
  ["years", "year"],
  ["mo", "month"],
  ["month", "month"],
  ["months", "month"],
])

const BARE_NUMBER = /^-?\d+(?:\.\d+)?$/
const ISO_DATE =
  /^\d{4}-\d{2}(?:-\d{2}(?:[t ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:z|[+-]\d{2}:?\d{2})?)?)?$/
const TERM = /\s*(-?\d+(?:\.\d+)?)\s*([a-z]+)\s*/y
const SEPARATOR = /(?:,|and\b)\s*/y

/**
 * Parses a reachback into a {@link StalenessDuration}.
 *
 * @example
 * ```ts
 * parseReachback("2 hours")           // { kind: "bounded", milliseconds: 7_200_000 }
 * parseReachback("1h, 30 min")        // { kind: "bounded", milliseconds: 5_400_000 }
 * parseReachback(90)                  // { kind: "bounded", milliseconds: 90_000 }
 * parseReachback("never")             // { kind: "unbounded" }
 * parseReachback("2024-01-15")        // { kind: "since", cutoff: 1705276800000 }
 * parseReachback("2000-12")           // { kind: "since", cutoff: 975628800000 }
 * parseReachback("1 year, 2 days")    // { kind: "calendar", years: 1, months: 0, milliseconds: 172_800_000 }
 * ```
 *
 * @throws InvalidStalenessSpecError for empty, negative, unknown or
 *   dangling input, and for fractional years or months
 */
export function parseReachback(spec: ReachbackSpec): StalenessDuration {
  if (typeof spec === "number") return bounded(checkMagnitude(spec, spec) * 1_000)

  const text = spec.trim().toLowerCase()

  if (!text) throw new InvalidStalenessSpecError(spec, "is empty")
  if (UNBOUNDED.has(text)) return { kind: "unbounded" }
  if (BARE_NUMBER.test(text)) return bounded(checkMagnitude(spec, Number(text)) * 1_000)
  if (ISO_DATE.test(text)) return since(spec)

  const { years, months, milliseconds } = sumTerms(spec, text)
  if (years === 0 && months === 0) return bounded(milliseconds)
  return { kind: "calendar", years, months, milliseconds }
}

type TermTotals = { years: number; months: number; milliseconds: Milliseconds }

function sumTerms(spec: string, text: string): TermTotals {
  const totals: TermTotals = { years: 0, months: 0, milliseconds: 0 }
  let position = 0

  for (;;) {
    TERM.lastIndex = position
    const match = TERM.exec(text)
    const [, amount, unitWord] = match ?? []

    if (!match || amount === undefined || unitWord === undefined) {
      throw new InvalidStalenessSpecError(spec, `unrecognized text "${text.slice(position)}"`)
    }

    addTerm(spec, totals, checkMagnitude(spec, Number(amount)), unitWord)
    position = TERM.lastIndex
    if (position >= text.length) return totals

    SEPARATOR.lastIndex = position
    if (SEPARATOR.exec(text)) {
      position = SEPARATOR.lastIndex
      if (position >= text.length) {
        throw new InvalidStalenessSpecError(spec, "ends with a separator")
      }
    }
  }
}

function addTerm(spec: string, totals: TermTotals, amount: number, word: string): void {
  const unit = UNITS.get(word)
  if (unit) {
    totals.milliseconds += toMilliseconds(amount, unit)
    return
  }

  const calendarUnit = CALENDAR_UNITS.get(word)
  if (!calendarUnit) throw new InvalidStalenessSpecError(spec, `unknown unit "${word}"`)

  if (!Number.isInteger(amount)) {
    throw new InvalidStalenessSpecError(spec, `"${word}" needs a whole number`)
  }
  if (calendarUnit === "year") totals.years += amount
  else totals.months += amount
}

function checkMagnitude(spec: ReachbackSpec, amount: number): number {
  if (!Number.isFinite(amount)) {
    throw new InvalidStalenessSpecError(spec, "magnitude must be finite")
  }
  if (amount < 0) throw new InvalidStalenessSpecError(spec, "magnitude must not be negative")
  return amount
}

function bounded(milliseconds: Milliseconds): StalenessDuration {
  return { kind: "bounded", milliseconds }
}

function since(spec: string): StalenessDuration {
  const cutoff = Date.parse(spec.trim())

  if (Number.isNaN(cutoff)) throw new InvalidStalenessSpecError(spec, "is not a valid date")
  return { kind: "since", cutoff }
}
