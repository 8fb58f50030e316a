import { SystemClock } from "@scrapekit/clock"
import { createNullLogger } from "@scrapekit/logger"
import { FileSystemEntryStore } from "../adapters/fs/fs-entry-store"
import type { EntryStore } from "../ports/entry-store"
import {
  type CachedFunction,
  type CachedOptions,
  type CacheOptions,
  cached,
  DEFAULT_CACHE_DIRECTORY,
} from "./cached"

/** Per-function settings; storage, clock and logger come from the cache. */
export type WrapOptions<A extends unknown[]> = Omit<
  CachedOptions<A>,
  "cacheDirectory" | "store" | "clock" | "logger"
>

export interface Cache {
  readonly store: EntryStore

  /** Wraps `fn` with this cache's store and defaults, overridden by `overrides`. */
  wrap<A extends unknown[], R>(
    fn: (...args: A) => R,
    overrides?: WrapOptions<A>,
  ): CachedFunction<A, R>
}

/**
 * Builds a cache whose wrappers share one store and one set of defaults.
 * Several caches with different directories or policies can coexist.
 *
 * @example
 * ```ts
 * const cache = createCache({ cacheDirectory: ".cache/prices", reachback: "1 hour" })
 * const getPrices = cache.wrap(fetchPrices)
 * const getHistory = cache.wrap(fetchHistory, { hoard: true, reachback: "never" })
 * ```
 */
export function createCache(options: CacheOptions = {}): Cache {
  const clock = options.clock ?? new SystemClock()
  const logger = options.logger ?? createNullLogger()
  const store =
    options.store ??
    new FileSystemEntryStore(
      { clock, logger },
      { rootDir: options.cacheDirectory ?? DEFAULT_CACHE_DIRECTORY },
    )

  return {
    store,
    wrap: (fn, overrides = {}) =>
      cached(fn, {
        ...(options.reachback !== undefined && { reachback: options.reachback }),
        ...(options.hoard !== undefined && { hoard: options.hoard }),
        ...overrides,
        clock,
        logger,
        store,
      }),
  }
}
