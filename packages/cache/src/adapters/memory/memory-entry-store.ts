import type { TimeSource } from "@scrapekit/clock"
import { decodeEntry, encodeEntry } from "../../core/codec/entry-codec"
import { type DiscriminatorSequence, processSequence } from "../../core/discriminator"
import { type CacheEntry, compareEntries, LATEST_DISCRIMINATOR } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { EntryStore } from "../../ports/entry-store"

export type MemoryEntryStoreDeps = {
  clock: TimeSource
  sequence?: DiscriminatorSequence
}

/**
 * Keeps encoded entries in process memory. Entries go through the same codec
 * as on disk, so callers never share a payload object with the store.
 */
export class MemoryEntryStore implements EntryStore {
  private readonly entries = new Map<CacheKey, Map<string, string>>()
  private readonly sequence: DiscriminatorSequence

  constructor(private readonly deps: MemoryEntryStoreDeps) {
    this.sequence = deps.sequence ?? processSequence
  }

  async readLatest<T>(key: CacheKey): Promise<CacheEntry<T> | null> {
    const all = await this.readAll<T>(key)
    return all.at(-1) ?? null
  }

  async readAll<T>(key: CacheKey): Promise<CacheEntry<T>[]> {
    const stored = this.entries.get(key)
    if (!stored) return []

    return [...stored.values()].map((text) => decodeEntry<T>(text)).sort(compareEntries)
  }

  async write<T>(key: CacheKey, payload: T, hoard: boolean): Promise<CacheEntry<T>> {
    // entries keep whole milliseconds; sub-ms clock readings are dropped
    const createdAt = Math.floor(this.deps.clock.nowMs())
    const entry: CacheEntry<T> = {
      key,
      createdAt,
      discriminator: hoard ? this.sequence.next(createdAt) : LATEST_DISCRIMINATOR,
      payload,
    }
    const text = encodeEntry(entry)

    const stored = hoard ? (this.entries.get(key) ?? new Map<string, string>()) : new Map<string, string>()
    stored.set(entry.discriminator, text)
    this.entries.set(key, stored)

    return entry
  }

  /** Drops every entry. */
  clear(): void {
    this.entries.clear()
  }
}
