import { type LogLevelName, logLevelNames } from "@scrapekit/logger"
import { z } from "zod"
import { InvalidStalenessSpecError } from "../cache-errors"
import { DEFAULT_CACHE_DIRECTORY } from "../cached"
import { DEFAULT_REACHBACK, parseReachback } from "../staleness/parse-reachback"

export const CONFIG_ENV_PREFIX = "SCRAPEKIT_"

/** Variables as read from the environment, without {@link CONFIG_ENV_PREFIX}. */
export const cacheConfigSchema = z
  .object({
    CACHE_DIRECTORY: z.string().min(1).default(DEFAULT_CACHE_DIRECTORY),
    REACHBACK: z
      .string()
      .default(DEFAULT_REACHBACK)
      .superRefine((value, ctx) => {
        try {
          parseReachback(value)
        } catch (err) {
          if (!(err instanceof InvalidStalenessSpecError)) throw err
          ctx.addIssue({ code: "custom", message: err.message, input: value })
        }
      }),
    HOARD: z.stringbool().default(false),
    LOG_LEVEL: z.enum(logLevelNames).default("info"),
    LOG_PRETTY: z.stringbool().default(false),
  })
  .transform(
    (vars): CacheConfig => ({
      cacheDirectory: vars.CACHE_DIRECTORY,
      reachback: vars.REACHBACK,
      hoard: vars.HOARD,
      logLevel: vars.LOG_LEVEL,
      logPretty: vars.LOG_PRETTY,
    }),
  )

export type CacheConfig = Readonly<{
  cacheDirectory: string
  reachback: string
  hoard: boolean
  logLevel: LogLevelName
  logPretty: boolean
}>
