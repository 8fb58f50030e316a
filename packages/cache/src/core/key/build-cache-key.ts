import { createHash } from "node:crypto"
import type { CacheKey } from "../../ports/cache-key"
import { encodeCanonical } from "./canonical"

const MAX_SLUG_LENGTH = 64

export type CallKwargs = Readonly<Record<string, unknown>>

/**
 * Text form of a call, `identity(a1, a2, k1=v1)`, with keyword arguments
 * sorted by name.
 *
 * @throws UnhashableArgumentError
 */
export function canonicalSignature(
  identity: string,
  args: readonly unknown[],
  kwargs: CallKwargs = {},
): string {
  const positional = args.map((arg, i) => encodeCanonical(arg, `args[${i}]`))
  const named = Object.keys(kwargs)
    .sort()
    .map((name) => `${name}=${encodeCanonical(kwargs[name], `kwargs.${name}`)}`)

  return `${identity}(${[...positional, ...named].join(", ")})`
}

/**
 * Deterministic key for one logical call of the function named `identity`.
 * Equal calls give equal keys in every process.
 *
 * @example
 * ```ts
 * buildCacheKey("sample", [10, 3]) // "sample-<sha1 of 'sample(10, 3)'>"
 * ```
 *
 * @throws UnhashableArgumentError when an argument has no canonical encoding
 */
export function buildCacheKey(
  identity: string,
  args: readonly unknown[],
  kwargs: CallKwargs = {},
): CacheKey {
  const signature = canonicalSignature(identity, args, kwargs)
  const digest = createHash("sha1").update(signature, "utf8").digest("hex")

  return `${slugify(identity)}-${digest}`
}

function slugify(identity: string): string {
  const slug = identity.replace(/[^A-Za-z0-9_.-]+/g, "_").slice(0, MAX_SLUG_LENGTH)
  return slug || "fn"
}
