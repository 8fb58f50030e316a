export type ErrorCode = Lowercase<string>

/** Structured metadata carried by an error (paths, keys, inputs). */
export type ErrorContext = Readonly<Record<string, unknown>>

export interface AppError extends Error {
  readonly code: ErrorCode
  readonly context: ErrorContext

  /** `true` when the same call may succeed if attempted again. */
  readonly isRetryable: boolean

  /**
   * `true` for expected runtime failures (bad input, I/O), `false` for
   * programmer errors and broken invariants.
   */
  readonly isOperational: boolean

  readonly timestamp: Date
  readonly cause?: unknown
}

/** JSON-safe error shape for logs. */
export type SerializedError = Readonly<{
  name: string
  code: string
  message: string
  context: Record<string, unknown>
  timestamp: string
  isOperational: boolean
  cause?: SerializedError
  stack?: string
}>
