import { BaseError, errnoCode } from "@scrapekit/errors"

/** An argument has no stable canonical encoding, so no key can be built. */
export class UnhashableArgumentError extends BaseError<"unhashable_argument"> {
  constructor(path: string, reason: string) {
    super(`Cannot build a cache key: ${path} ${reason}`, {
      code: "unhashable_argument",
      context: { path, reason },
    })
  }
}

export class InvalidStalenessSpecError extends BaseError<"invalid_staleness_spec"> {
  constructor(spec: string | number, reason: string) {
    super(`Invalid reachback ${JSON.stringify(spec)}: ${reason}`, {
      code: "invalid_staleness_spec",
      context: { spec, reason },
    })
  }
}

/** A payload (or a stored entry) falls outside the storable value space. */
export class SerializationError extends BaseError<"serialization"> {
  constructor(path: string, reason: string, cause?: unknown) {
    super(`Cannot serialize ${path}: ${reason}`, {
      code: "serialization",
      context: { path, reason },
      ...(cause !== undefined && { cause }),
    })
  }
}

export type StorageOperation = "list" | "read" | "mkdir" | "write" | "rename" | "delete"

export class StorageIOError extends BaseError<"storage_io"> {
  readonly operation: StorageOperation
  readonly path: string

  constructor(operation: StorageOperation, path: string, cause: unknown) {
    const code = errnoCode(cause)

    super(`Cache storage ${operation} failed for ${path}${code ? ` (${code})` : ""}`, {
      code: "storage_io",
      context: { operation, path, ...(code && { code }) },
      cause,
      isRetryable: true,
    })

    this.operation = operation
    this.path = path
  }
}

export class CacheConfigError extends BaseError<"cache_config"> {
  constructor(details: string, sources: readonly string[]) {
    super(`Cache configuration is invalid:\n${details}`, {
      code: "cache_config",
      context: { sources: [...sources] },
    })
  }
}
