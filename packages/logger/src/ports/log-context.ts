/** Well-known fields bound to scrapekit loggers. */
export type LogContext = {
  service: string
  module: string

  /** Identity of the wrapped function. */
  fn: string
  key: string
  cacheDirectory: string
  discriminator: string

  /** 0-indexed retry attempt. */
  attempt: number
  durationMs: number
}

export type LogEvent = {
  err: unknown
}

export type LogMeta<TContext extends LogContext = LogContext> = Partial<TContext> &
  Partial<LogEvent> &
  Record<string, unknown>

/** Fields a `child()` call adds to or overrides in the parent context. */
export type LogContextPatch = Partial<LogContext> & Record<string, unknown>
