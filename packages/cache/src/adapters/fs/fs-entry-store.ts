import { createHash, randomBytes } from "node:crypto"
import * as fs from "node:fs/promises"
import * as path from "node:path"
import type { TimeSource } from "@scrapekit/clock"
import { isNotFoundError } from "@scrapekit/errors"
import { createNullLogger, type Logger } from "@scrapekit/logger"
import { SerializationError, StorageIOError } from "../../core/cache-errors"
import { decodeEntry, encodeEntry } from "../../core/codec/entry-codec"
import {
  DISCRIMINATOR_PATTERN,
  type DiscriminatorSequence,
  processSequence,
} from "../../core/discriminator"
import { type CacheEntry, compareEntries, LATEST_DISCRIMINATOR } from "../../ports/cache-entry"
import type { CacheKey } from "../../ports/cache-key"
import type { EntryStore } from "../../ports/entry-store"

const ENTRY_SUFFIX = ".entry.json"
const LATEST_FILE = `${LATEST_DISCRIMINATOR}${ENTRY_SUFFIX}`

export type FileSystemEntryStoreDeps = {
  clock: TimeSource
  logger?: Logger
  sequence?: DiscriminatorSequence
}

export type FileSystemEntryStoreOptions = {
  /** Created on first write. */
  rootDir: string
}

/**
 * Keeps each key's entries in `<rootDir>/<sha256(key)>/`, one JSON file per
 * entry.
 *
 * Files are written under a dot-prefixed temporary name and renamed into
 * place, so a reader sees either the old entry or the new one. Temporary
 * and unrecognized files are never read.
 */
export class FileSystemEntryStore implements EntryStore {
  readonly rootDir: string
  private readonly logger: Logger
  private readonly sequence: DiscriminatorSequence

  constructor(
    private readonly deps: FileSystemEntryStoreDeps,
    opts: FileSystemEntryStoreOptions,
  ) {
    this.rootDir = path.resolve(opts.rootDir)
    this.sequence = deps.sequence ?? processSequence
    this.logger = (deps.logger ?? createNullLogger()).child({
      module: "cache-store",
      cacheDirectory: this.rootDir,
    })
  }

  /** Directory holding every entry of `key`. */
  directoryFor(key: CacheKey): string {
    return path.join(this.rootDir, createHash("sha256").update(key, "utf8").digest("hex"))
  }

  async readLatest<T>(key: CacheKey): Promise<CacheEntry<T> | null> {
    const dir = this.directoryFor(key)
    const names = await this.listEntryFiles(dir)

    const latest = names.includes(LATEST_FILE)
      ? await this.readEntry<T>(key, path.join(dir, LATEST_FILE))
      : null

    // historical names sort by (createdAt, counter); walk back past unreadable ones
    const historical = names.filter((name) => name !== LATEST_FILE).sort()
    let newestHistorical: CacheEntry<T> | null = null

    for (let i = historical.length - 1; i >= 0 && !newestHistorical; i--) {
      const name = historical[i]
      if (name) newestHistorical = await this.readEntry<T>(key, path.join(dir, name))
    }

    if (!latest) return newestHistorical
    if (!newestHistorical) return latest
    return compareEntries(latest, newestHistorical) >= 0 ? latest : newestHistorical
  }

  async readAll<T>(key: CacheKey): Promise<CacheEntry<T>[]> {
    const dir = this.directoryFor(key)
    const entries: CacheEntry<T>[] = []

    for (const name of await this.listEntryFiles(dir)) {
      const entry = await this.readEntry<T>(key, path.join(dir, name))
      if (entry) entries.push(entry)
    }

    return entries.sort(compareEntries)
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

    const dir = this.directoryFor(key)
    await this.ensureDirectory(dir)
    await this.writeAtomically(dir, `${entry.discriminator}${ENTRY_SUFFIX}`, text)

    if (!hoard) await this.removeHistorical(dir)

    return entry
  }

  private async listEntryFiles(dir: string): Promise<string[]> {
    try {
      const names = await fs.readdir(dir)
      return names.filter(isEntryFileName)
    } catch (err) {
      if (isNotFoundError(err)) return []
      throw new StorageIOError("list", dir, err)
    }
  }

  private async readEntry<T>(key: CacheKey, file: string): Promise<CacheEntry<T> | null> {
    let text: string
    try {
      text = await fs.readFile(file, "utf8")
    } catch (err) {
      // replaced or removed since the directory was listed
      if (isNotFoundError(err)) return null
      throw new StorageIOError("read", file, err)
    }

    try {
      const entry = decodeEntry<T>(text)
      if (entry.key === key) return entry

      this.logger.warn("cache entry belongs to another key, skipped", { key, path: file })
      return null
    } catch (err) {
      if (!(err instanceof SerializationError)) throw err

      this.logger.warn("unreadable cache entry skipped", { key, path: file, err })
      return null
    }
  }

  private async ensureDirectory(dir: string): Promise<void> {
    try {
      await fs.mkdir(dir, { recursive: true })
    } catch (err) {
      throw new StorageIOError("mkdir", dir, err)
    }
  }

  private async writeAtomically(dir: string, name: string, text: string): Promise<void> {
    const target = path.join(dir, name)
    const tmp = path.join(dir, `.${name}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`)

    try {
      await fs.writeFile(tmp, text, "utf8")
    } catch (err) {
      await this.discard(tmp)
      throw new StorageIOError("write", tmp, err)
    }

    try {
      await fs.rename(tmp, target)
    } catch (err) {
      await this.discard(tmp)
      throw new StorageIOError("rename", target, err)
    }
  }

  private async removeHistorical(dir: string): Promise<void> {
    for (const name of await this.listEntryFiles(dir)) {
      if (name === LATEST_FILE) continue

      const file = path.join(dir, name)
      try {
        await fs.unlink(file)
      } catch (err) {
        if (!isNotFoundError(err)) throw new StorageIOError("delete", file, err)
      }
    }
  }

  private async discard(tmp: string): Promise<void> {
    try {
      await fs.rm(tmp, { force: true })
    } catch (err) {
      this.logger.warn("temporary cache file left behind", { path: tmp, err })
    }
  }
}

function isEntryFileName(name: string): boolean {
  if (name === LATEST_FILE) return true
  if (!name.endsWith(ENTRY_SUFFIX)) return false

  return DISCRIMINATOR_PATTERN.test(name.slice(0, -ENTRY_SUFFIX.length))
}
