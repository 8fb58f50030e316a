import { systemRandom } from "@scrapekit/backoff"
import { createCacheFromConfig, loadCacheConfig } from "@scrapekit/cache"
import { SystemClock } from "@scrapekit/clock"
import { createPinoLogger } from "@scrapekit/logger"
import { createSampler, summarize } from "./sampler"

const NUM_POINTS = 5_000

async function main(): Promise<void> {
  const config = await loadCacheConfig({ dotenvFile: ".env" })
  const logger = createPinoLogger(
    {},
    { level: config.logLevel, prettify: config.logPretty },
    { service: "cached-sampler" },
  )
  const clock = new SystemClock()

  const cache = createCacheFromConfig(config, { logger, clock })
  const getY = cache.wrap(createSampler({ random: systemRandom, clock, logger }), {
    name: "get_y",
    reachback: "12 minutes",
  })

  const y1 = await getY(10, 3, NUM_POINTS)
  logger.info("gauss(10, 3) outside [7, 9]", summarize(y1))

  const y2 = await getY(11, 4, NUM_POINTS)
  logger.info("gauss(11, 4) outside [7, 9]", summarize(y2))
}

main().catch((err: unknown) => {
  createPinoLogger({}, { level: "error" }, { service: "cached-sampler" }).fatal(
    "sampler failed",
    { err },
  )
  process.exitCode = 1
})
