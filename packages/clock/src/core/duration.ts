import type { Milliseconds } from "../ports/time"

export const durationUnits = [
  "millisecond",
  "second",
  "minute",
  "hour",
  "day",
  "week",
] as const

export type DurationUnit = (typeof durationUnits)[number]

export const MS_PER: Readonly<Record<DurationUnit, Milliseconds>> = {
  millisecond: 1,
  second: 1_000,
  minute: 60_000,
  hour: 3_600_000,
  day: 86_400_000,
  week: 604_800_000,
}

/**
 * Converts `amount` of `unit` to milliseconds.
 *
 * @throws RangeError when `amount` is not a finite number
 */
export function toMilliseconds(amount: number, unit: DurationUnit): Milliseconds {
  if (!Number.isFinite(amount)) {
    throw new RangeError(`amount must be finite (got ${amount})`)
  }

  return amount * MS_PER[unit]
}
