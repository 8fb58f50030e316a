import { createHash } from "node:crypto"
import { mkdir, readdir, readFile, writeFile } from "node:fs/promises"
import path from "node:path"
import { FakeClock } from "@scrapekit/clock"
import { MemoryLogger } from "@scrapekit/logger"
import { StorageIOError } from "../../../core/cache-errors"
import { DiscriminatorSequence } from "../../../core/discriminator"
import { sequenceHex } from "../../../tests/utils/hex-sources"
import { makeTempDir, removeTempDir } from "../../../tests/utils/temp-dir"
import { FileSystemEntryStore } from "../fs-entry-store"

const T0 = 1_700_000_000_000

describe("FileSystemEntryStore", () => {
  let rootDir: string
  let clock: FakeClock
  let logger: MemoryLogger
  let store: FileSystemEntryStore

  beforeEach(async () => {
    rootDir = await makeTempDir()
    clock = new FakeClock(T0)
    logger = new MemoryLogger()
    store = new FileSystemEntryStore(
      { clock, logger, sequence: new DiscriminatorSequence(sequenceHex(["deadbeef", "cafebabe"])) },
      { rootDir },
    )
  })

  afterEach(async () => {
    await removeTempDir(rootDir)
  })

  const seed = async (key: string, name: string, content: string) => {
    const dir = store.directoryFor(key)
    await mkdir(dir, { recursive: true })
    await writeFile(path.join(dir, name), content)
  }

  const encoded = (key: string, discriminator: string, createdAt: number, payload: unknown) =>
    JSON.stringify({ version: 1, key, createdAt, discriminator, payload })

  describe("layout", () => {
    it("keeps each key in a directory named by the sha256 of the key", () => {
      const digest = createHash("sha256").update("sample-abc").digest("hex")

      expect(store.directoryFor("sample-abc")).toBe(path.join(rootDir, digest))
    })

    it("writes the single entry to latest.entry.json", async () => {
      await store.write("k", [1, 2], false)

      const text = await readFile(path.join(store.directoryFor("k"), "latest.entry.json"), "utf8")

      expect(JSON.parse(text)).toEqual({
        version: 1,
        key: "k",
        createdAt: T0,
        discriminator: "latest",
        payload: [1, 2],
      })
    })

    it("names hoarded entries by timestamp, counter and random suffix", async () => {
      await store.write("k", "a", true)
      await store.write("k", "b", true)

      const names = (await readdir(store.directoryFor("k"))).sort()

      expect(names).toEqual([
        "1700000000000-000000-deadbeef.entry.json",
        "1700000000000-000001-cafebabe.entry.json",
      ])
    })

    it("leaves only latest.entry.json behind after a single write", async () => {
      await store.write("k", "a", true)
      clock.advance(1)
      await store.write("k", "b", false)

      await expect(readdir(store.directoryFor("k"))).resolves.toEqual(["latest.entry.json"])
    })
  })

  describe("reading", () => {
    it("ignores temporary and unrelated files", async () => {
      await store.write("k", 1, false)
      await seed("k", ".latest.entry.json.4242.0a0b0c0d.tmp", '{"version":1,"ke')
      await seed("k", "notes.txt", "hello")

      const all = await store.readAll<number>("k")

      expect(all.map((e) => e.payload)).toEqual([1])
      expect(logger.records).toEqual([])
    })

    it("reads a directory holding only an interrupted write as empty", async () => {
      await seed("k", ".latest.entry.json.4242.0a0b0c0d.tmp", encoded("k", "latest", T0, 1))

      await expect(store.readLatest("k")).resolves.toBeNull()
    })

    it("skips a corrupt entry file with a warning", async () => {
      await store.write("k", "good", false)
      await seed("k", "0000000000001-000000-00000000.entry.json", "not json")

      const all = await store.readAll<string>("k")

      expect(all.map((e) => e.payload)).toEqual(["good"])
      expect(logger.records).toHaveLength(1)
      expect(logger.records[0]).toMatchObject({
        level: "warn",
        message: "unreadable cache entry skipped",
        fields: { module: "cache-store", key: "k" },
      })
    })

    it("falls back to an older entry when the newest one is unreadable", async () => {
      await store.write("k", "older", true)
      await seed("k", "9999999999999-000000-ffffffff.entry.json", encoded("k", "x", T0, null))

      await expect(store.readLatest("k")).resolves.toMatchObject({ payload: "older" })
    })

    it("prefers a newer hoarded entry over latest.entry.json", async () => {
      await store.write("k", "single", false)
      clock.advance(100)
      await store.write("k", "hoarded", true)

      await expect(store.readLatest("k")).resolves.toMatchObject({ payload: "hoarded" })
    })

    it("skips an entry stored under another key", async () => {
      await seed("k", "latest.entry.json", encoded("other", "latest", T0, 1))

      await expect(store.readLatest("k")).resolves.toBeNull()
      expect(logger.records.map((r) => r.message)).toEqual([
        "cache entry belongs to another key, skipped",
      ])
    })
  })

  describe("filesystem failures", () => {
    let blocked: FileSystemEntryStore

    beforeEach(async () => {
      const file = path.join(rootDir, "not-a-directory")
      await writeFile(file, "x")
      blocked = new FileSystemEntryStore({ clock }, { rootDir: file })
    })

    it("raises StorageIOError when a key directory cannot be listed", async () => {
      const read = blocked.readAll("k")

      await expect(read).rejects.toBeInstanceOf(StorageIOError)
      await expect(read).rejects.toMatchObject({
        code: "storage_io",
        isRetryable: true,
        operation: "list",
        context: { code: "ENOTDIR" },
      })
    })

    it("raises StorageIOError when the key directory cannot be created", async () => {
      await expect(blocked.write("k", 1, false)).rejects.toMatchObject({
        code: "storage_io",
        operation: "mkdir",
        path: blocked.directoryFor("k"),
      })
    })
  })
})
