/**
 * Opaque, filesystem-safe identifier of one logical call:
 * `<slug of the function identity>-<sha1 of the canonical signature>`.
 */
export type CacheKey = string
