import type { TimeSource } from "@scrapekit/clock"
import { createPinoLogger, type Logger } from "@scrapekit/logger"
import { type Cache, createCache } from "../create-cache"
import type { CacheConfig } from "./cache-config"

export type CacheFromConfigDeps = {
  /** Default: a pino logger at `config.logLevel` */
  logger?: Logger
  clock?: TimeSource
}

export function createCacheFromConfig(config: CacheConfig, deps: CacheFromConfigDeps = {}): Cache {
  const logger =
    deps.logger ?? createPinoLogger({}, { level: config.logLevel, prettify: config.logPretty })

  return createCache({
    cacheDirectory: config.cacheDirectory,
    reachback: config.reachback,
    hoard: config.hoard,
    logger,
    ...(deps.clock && { clock: deps.clock }),
  })
}
