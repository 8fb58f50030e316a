export { MemorySingleflight } from "./adapters/memory/memory-single-flight"
export type { FlightResult, InFlightKey, Singleflight } from "./ports/single-flight"
