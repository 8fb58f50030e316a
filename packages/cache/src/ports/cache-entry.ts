import type { UnixMs } from "@scrapekit/clock"
import type { CacheKey } from "./cache-key"

/** Discriminator of the single entry kept when history is off. */
export const LATEST_DISCRIMINATOR = "latest"

export type CacheEntry<T> = Readonly<{
  key: CacheKey
  createdAt: UnixMs

  /**
   * `"latest"` for the single kept entry, otherwise
   * `<13-digit createdAt>-<6-digit counter>-<8 hex>`.
   */
  discriminator: string

  payload: T
}>

/** Orders entries by creation time, then by discriminator. */
export function compareEntries(a: CacheEntry<unknown>, b: CacheEntry<unknown>): number {
  if (a.createdAt !== b.createdAt) return a.createdAt - b.createdAt
  if (a.discriminator === b.discriminator) return 0
  return a.discriminator < b.discriminator ? -1 : 1
}
