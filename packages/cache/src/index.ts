export { EnvSource, type EnvSourceOptions } from "./adapters/config/env-source"
export { DotenvSource, type DotenvSourceOptions } from "./adapters/config/dotenv-source"
export {
  FileSystemEntryStore,
  type FileSystemEntryStoreDeps,
  type FileSystemEntryStoreOptions,
} from "./adapters/fs/fs-entry-store"
export { MemoryEntryStore, type MemoryEntryStoreDeps } from "./adapters/memory/memory-entry-store"
export {
  CacheConfigError,
  InvalidStalenessSpecError,
  SerializationError,
  StorageIOError,
  type StorageOperation,
  UnhashableArgumentError,
} from "./core/cache-errors"
export {
  type CachedFunction,
  type CachedOptions,
  type CacheOptions,
  cached,
  DEFAULT_CACHE_DIRECTORY,
  type KeyArgs,
} from "./core/cached"
export { decodeEntry, ENTRY_FORMAT_VERSION, encodeEntry } from "./core/codec/entry-codec"
export { assertPayload, isPayload } from "./core/codec/payload"
export { type CacheConfig, CONFIG_ENV_PREFIX, cacheConfigSchema } from "./core/config/cache-config"
export {
  type CacheFromConfigDeps,
  createCacheFromConfig,
} from "./core/config/create-cache-from-config"
export { type LoadCacheConfigOptions, loadCacheConfig } from "./core/config/load-cache-config"
export { type Cache, createCache, type WrapOptions } from "./core/create-cache"
export { DiscriminatorSequence, type RandomHex } from "./core/discriminator"
export { buildCacheKey, type CallKwargs, canonicalSignature } from "./core/key/build-cache-key"
export { isStale } from "./core/staleness/is-stale"
export { DEFAULT_REACHBACK, parseReachback } from "./core/staleness/parse-reachback"
export { type CacheEntry, compareEntries, LATEST_DISCRIMINATOR } from "./ports/cache-entry"
export type { CacheKey } from "./ports/cache-key"
export type { ConfigSource } from "./ports/config-source"
export type { EntryStore } from "./ports/entry-store"
export type { Payload, PayloadField, PayloadObject } from "./ports/payload"
export type { ReachbackSpec, StalenessDuration } from "./ports/staleness"
