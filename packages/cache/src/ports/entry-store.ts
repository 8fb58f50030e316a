import type { CacheEntry } from "./cache-entry"
import type { CacheKey } from "./cache-key"

/**
 * Persistent home of cache entries, grouped by key.
 *
 * @remarks
 * - A key with no entries reads as `null` / `[]`, never as an error.
 * - Payloads must lie in the {@link Payload} value space; `write` checks this
 *   before touching storage.
 * - Failures of the backing storage are thrown, never swallowed.
 */
export interface EntryStore {
  /** Entry with the greatest `(createdAt, discriminator)`, or `null`. */
  readLatest<T>(key: CacheKey): Promise<CacheEntry<T> | null>

  /** All entries for `key` in ascending creation order. */
  readAll<T>(key: CacheKey): Promise<CacheEntry<T>[]>

  /**
   * Persist `payload` as a new entry.
   *
   * With `hoard` off the new entry replaces every earlier one for `key`;
   * with it on, earlier entries are kept.
   */
  write<T>(key: CacheKey, payload: T, hoard: boolean): Promise<CacheEntry<T>>
}
