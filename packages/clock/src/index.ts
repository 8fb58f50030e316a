export { FakeClock } from "./adapters/fake-clock"
export { SystemClock } from "./adapters/system-clock"
export {
  type DurationUnit,
  durationUnits,
  MS_PER,
  toMilliseconds,
} from "./core/duration"
export type { Clock, Sleeper, TimeSource } from "./ports/clock"
export type * from "./ports/time"
