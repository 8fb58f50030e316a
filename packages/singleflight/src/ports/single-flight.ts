export type InFlightKey = string

/**
 * Outcome of one {@link Singleflight.run} call.
 *
 * `isLeader` is true for the caller whose `fn` actually ran; the others
 * joined its flight and share its value (or its error).
 */
export type FlightResult<T> = Readonly<{
  value: T
  isLeader: boolean

  /** Callers that joined the flight, leader excluded */
  sharedWith: number
}>

/**
 * Collapses concurrent calls for the same key into one execution.
 *
 * @example
 * ```ts
 * const flights = new MemorySingleflight<Quote>()
 *
 * // one fetch, three results
 * await Promise.all([
 *   flights.run("EUR", () => fetchQuote("EUR")),
 *   flights.run("EUR", () => fetchQuote("EUR")),
 *   flights.run("EUR", () => fetchQuote("EUR")),
 * ])
 * ```
 */
export interface Singleflight<T> {
  /**
   * Runs `fn` for `key` unless a call for `key` is already in flight, in
   * which case the pending outcome is shared. A settled flight is forgotten,
   * so the next call starts fresh.
   */
  run(key: InFlightKey, fn: () => Promise<T>): Promise<FlightResult<T>>

  /** Keys currently in flight. */
  readonly size: number
}
