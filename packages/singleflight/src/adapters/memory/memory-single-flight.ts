import type { FlightResult, InFlightKey, Singleflight } from "../../ports/single-flight"

type Flight<T> = {
  promise: Promise<T>
  followers: number
}

/** In-process {@link Singleflight}; flights live only as long as their promise. */
export class MemorySingleflight<T> implements Singleflight<T> {
  private readonly flights = new Map<InFlightKey, Flight<T>>()

  async run(key: InFlightKey, fn: () => Promise<T>): Promise<FlightResult<T>> {
    const pending = this.flights.get(key)

    if (pending) {
      pending.followers++
      const value = await pending.promise
      return { value, isLeader: false, sharedWith: pending.followers }
    }

    const flight: Flight<T> = { promise: fn(), followers: 0 }
    this.flights.set(key, flight)

    try {
      const value = await flight.promise
      return { value, isLeader: true, sharedWith: flight.followers }
    } finally {
      this.flights.delete(key)
    }
  }

  get size(): number {
    return this.flights.size
  }
}
