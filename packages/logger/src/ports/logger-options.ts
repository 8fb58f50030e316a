import type { LogLevelName } from "./log-level"

export type LoggerOptions = {
  /** Entries below this level are dropped. */
  level: LogLevelName

  /**
   * Human-readable output for local runs. Adapters that write JSON ignore
   * it or hand off to a pretty printer.
   */
  prettify?: boolean
}
