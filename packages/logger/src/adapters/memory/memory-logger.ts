import type { LogContext, LogContextPatch, LogMeta } from "../../ports/log-context"
import { type LogLevelName, levelSeverity } from "../../ports/log-level"
import type { Logger } from "../../ports/logger"
import type { LoggerOptions } from "../../ports/logger-options"

export type LogRecord = Readonly<{
  level: LogLevelName
  message: string
  fields: Readonly<Record<string, unknown>>
}>

/**
 * Keeps entries in memory instead of writing them anywhere.
 * A logger and all of its children append to the same record list.
 */
export class MemoryLogger<TContext extends LogContext = LogContext>
  implements Logger<TContext>
{
  private readonly context: Record<string, unknown>

  constructor(
    private readonly opts: Partial<LoggerOptions> = {},
    context: LogContextPatch = {},
    private readonly sink: LogRecord[] = [],
  ) {
    this.context = stripUndefined(context)
  }

  get records(): readonly LogRecord[] {
    return [...this.sink]
  }

  clear(): void {
    this.sink.length = 0
  }

  trace(message: string, meta?: LogMeta<TContext>): void {
    this.write("trace", message, meta)
  }

  debug(message: string, meta?: LogMeta<TContext>): void {
    this.write("debug", message, meta)
  }

  info(message: string, meta?: LogMeta<TContext>): void {
    this.write("info", message, meta)
  }

  warn(message: string, meta?: LogMeta<TContext>): void {
    this.write("warn", message, meta)
  }

  error(message: string, meta?: LogMeta<TContext>): void {
    this.write("error", message, meta)
  }

  fatal(message: string, meta?: LogMeta<TContext>): void {
    this.write("fatal", message, meta)
  }

  child<U extends LogContextPatch>(context: U): MemoryLogger<TContext & U> {
    return new MemoryLogger<TContext & U>(
      this.opts,
      { ...this.context, ...stripUndefined(context) },
      this.sink,
    )
  }

  private write(level: LogLevelName, message: string, meta?: LogMeta<TContext>): void {
    const min = this.opts.level ?? "trace"
    if (levelSeverity[level] < levelSeverity[min]) return

    this.sink.push({
      level,
      message,
      fields: { ...this.context, ...(meta && stripUndefined(meta)) },
    })
  }
}

function stripUndefined(obj: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = {}
  for (const [k, v] of Object.entries(obj)) {
    if (v !== undefined) out[k] = v
  }
  return out
}
