import { SystemClock, type TimeSource } from "@scrapekit/clock"
import { createNullLogger, type Logger } from "@scrapekit/logger"
import { MemorySingleflight } from "@scrapekit/singleflight"
import { FileSystemEntryStore } from "../adapters/fs/fs-entry-store"
import type { CacheEntry } from "../ports/cache-entry"
import type { CacheKey } from "../ports/cache-key"
import type { EntryStore } from "../ports/entry-store"
import type { ReachbackSpec } from "../ports/staleness"
import { buildCacheKey, type CallKwargs } from "./key/build-cache-key"
import { isStale } from "./staleness/is-stale"
import { DEFAULT_REACHBACK, parseReachback } from "./staleness/parse-reachback"

export const DEFAULT_CACHE_DIRECTORY = "cache"

/** Arguments that identify a call, as fed to {@link buildCacheKey}. */
export type KeyArgs = Readonly<{
  args: readonly unknown[]
  kwargs?: CallKwargs
}>

export type CacheOptions = {
  /** Root of the on-disk store, created on first write. Default: `"cache"` */
  cacheDirectory?: string

  /** How old an entry may be and still be served. Default: `"never"` */
  reachback?: ReachbackSpec

  /** Keep every result instead of only the newest. Default: `false` */
  hoard?: boolean

  logger?: Logger
  clock?: TimeSource

  /** Replaces the filesystem store; `cacheDirectory` is then unused. */
  store?: EntryStore
}

export type CachedOptions<A extends unknown[]> = CacheOptions & {
  /** Identity used in keys and logs. Default: `fn.name` */
  name?: string

  /**
   * Maps call arguments to the values the key is built from, e.g. to drop a
   * logger argument or to name positional arguments.
   */
  keyArgs?: (...args: A) => KeyArgs
}

export type CachedFunction<A extends unknown[], R> = ((...args: A) => Promise<Awaited<R>>) &
  Readonly<{
    identity: string
    keyFor: (...args: A) => CacheKey
    history: (...args: A) => Promise<CacheEntry<Awaited<R>>[]>
    latest: (...args: A) => Promise<CacheEntry<Awaited<R>> | null>
  }>

/**
 * Wraps `fn` so its results are stored and served again while fresh.
 *
 * Each call builds a key from its arguments and reads the newest entry. A
 * fresh entry is returned without calling `fn`. Otherwise `fn` runs once and
 * its result is written, unless it is `null` or `undefined`. Concurrent calls
 * with the same key share one lookup and at most one run of `fn`.
 *
 * @example
 * ```ts
 * const getPrices = cached(fetchPrices, { reachback: "12 minutes" })
 * await getPrices("EUR") // runs fetchPrices
 * await getPrices("EUR") // served from ./cache
 * ```
 *
 * @throws TypeError when `fn` is anonymous and no `name` is given
 * @throws InvalidStalenessSpecError when `reachback` cannot be parsed
 */
export function cached<A extends unknown[], R>(
  fn: (...args: A) => R,
  options: CachedOptions<A> = {},
): CachedFunction<A, R> {
  const identity = options.name ?? fn.name
  if (!identity) {
    throw new TypeError("cached() needs a `name` option to wrap an anonymous function")
  }

  const staleness = parseReachback(options.reachback ?? DEFAULT_REACHBACK)
  const hoard = options.hoard ?? false
  const clock = options.clock ?? new SystemClock()
  const baseLogger = options.logger ?? createNullLogger()
  const logger = baseLogger.child({ module: "cache", fn: identity })
  const store =
    options.store ??
    new FileSystemEntryStore(
      { clock, logger: baseLogger },
      { rootDir: options.cacheDirectory ?? DEFAULT_CACHE_DIRECTORY },
    )
  const { keyArgs } = options

  const keyFor = (...args: A): CacheKey => {
    const call: KeyArgs = keyArgs ? keyArgs(...args) : { args }
    return buildCacheKey(identity, call.args, call.kwargs)
  }

  const flights = new MemorySingleflight<Awaited<R>>()

  const load = async (key: CacheKey, args: A): Promise<Awaited<R>> => {
    const latest = await store.readLatest<Awaited<R>>(key)

    if (latest && !isStale(latest.createdAt, clock.nowMs(), staleness)) {
      logger.debug("cache hit", { key, discriminator: latest.discriminator })
      return latest.payload
    }

    if (latest) {
      logger.debug("cache entry stale", { key, createdAt: latest.createdAt })
    } else {
      logger.debug("cache miss", { key })
    }

    const result = await fn(...args)

    if (result === null || result === undefined) {
      logger.debug("result was empty, not cached", { key })
      return result
    }

    const entry = await store.write(key, result, hoard)
    logger.info("cache entry written", { key, hoard, discriminator: entry.discriminator })

    return result
  }

  const invoke = async (...args: A): Promise<Awaited<R>> => {
    const key = keyFor(...args)
    const flight = await flights.run(key, () => load(key, args))

    if (!flight.isLeader) logger.debug("joined a call in flight", { key })
    return flight.value
  }

  return Object.assign(invoke, {
    identity,
    keyFor,
    history: (...args: A) => store.readAll<Awaited<R>>(keyFor(...args)),
    latest: (...args: A) => store.readLatest<Awaited<R>>(keyFor(...args)),
  })
}
