import { describeLoggerContract } from "../../../ports/__tests__/logger.contract"
import { MemoryLogger } from "../memory-logger"

describeLoggerContract({
  name: "MemoryLogger",
  make: (opts) => {
    const logger = new MemoryLogger({ level: opts?.level ?? "trace" })

    return {
      logger,
      read: () =>
        logger.records.map((r) => ({
          level: r.level,
          payload: { msg: r.message, ...r.fields },
        })),
      clear: () => logger.clear(),
    }
  },
})

describe("MemoryLogger behavior", () => {
  it("records message and merged fields", () => {
    const logger = new MemoryLogger().child({ module: "cache" })

    logger.debug("cache hit", { key: "k-1", ageMs: 10, skipped: undefined })

    expect(logger.records).toEqual([
      { level: "debug", message: "cache hit", fields: { module: "cache", key: "k-1", ageMs: 10 } },
    ])
  })
})
