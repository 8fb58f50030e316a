import { z } from "zod"
import { DotenvSource } from "../../adapters/config/dotenv-source"
import { EnvSource } from "../../adapters/config/env-source"
import type { ConfigSource } from "../../ports/config-source"
import { CacheConfigError } from "../cache-errors"
import { type CacheConfig, CONFIG_ENV_PREFIX, cacheConfigSchema } from "./cache-config"

export type LoadCacheConfigOptions = {
  /** Default: `process.env` */
  env?: Readonly<Record<string, string | undefined>>

  /** Base for a relative `dotenvFile`. Default: `process.cwd()` */
  cwd?: string

  /** Optional .env file; environment variables take precedence over it. */
  dotenvFile?: string
}

/**
 * Reads `SCRAPEKIT_*` settings from an optional .env file and the environment.
 *
 * @example
 * ```ts
 * const config = await loadCacheConfig({ dotenvFile: ".env" })
 * const cache = createCacheFromConfig(config)
 * ```
 *
 * @throws CacheConfigError listing every invalid variable
 */
export async function loadCacheConfig(options: LoadCacheConfigOptions = {}): Promise<CacheConfig> {
  const sources: ConfigSource[] = [
    ...(options.dotenvFile
      ? [
          new DotenvSource({
            file: options.dotenvFile,
            required: false,
            prefix: CONFIG_ENV_PREFIX,
            ...(options.cwd && { cwd: options.cwd }),
          }),
        ]
      : []),
    new EnvSource({ prefix: CONFIG_ENV_PREFIX, ...(options.env && { env: options.env }) }),
  ]

  const merged: Record<string, unknown> = {}
  for (const source of sources) {
    for (const [key, value] of Object.entries(await source.load())) {
      if (value !== undefined) merged[key] = value
    }
  }

  const result = cacheConfigSchema.safeParse(merged)
  if (!result.success) {
    throw new CacheConfigError(
      z.prettifyError(result.error),
      sources.map((source) => source.name),
    )
  }

  return result.data
}
