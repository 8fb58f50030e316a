import { z } from "zod"
import type { CacheEntry } from "../../ports/cache-entry"
import { SerializationError } from "../cache-errors"
import { assertPayload, isPayload } from "./payload"

export const ENTRY_FORMAT_VERSION = 1

function entrySchema<T>() {
  return z.object({
    version: z.literal(ENTRY_FORMAT_VERSION),
    key: z.string().min(1),
    createdAt: z.number().int().nonnegative(),
    discriminator: z.string().min(1),
    payload: z.custom<T>(isPayload, { message: "unsupported payload" }),
  })
}

/**
 * Text form of a {@link CacheEntry}: one JSON document with a format version.
 *
 * @throws SerializationError when the payload is not storable or `createdAt`
 *   is not a whole, non-negative number of milliseconds
 */
export function encodeEntry<T>(entry: CacheEntry<T>): string {
  if (!Number.isSafeInteger(entry.createdAt) || entry.createdAt < 0) {
    throw new SerializationError("createdAt", `is ${entry.createdAt}, not whole epoch milliseconds`)
  }
  assertPayload(entry.payload)

  return JSON.stringify({
    version: ENTRY_FORMAT_VERSION,
    key: entry.key,
    createdAt: entry.createdAt,
    discriminator: entry.discriminator,
    payload: entry.payload,
  })
}

/**
 * @throws SerializationError when `text` is not an encoded entry
 */
export function decodeEntry<T>(text: string): CacheEntry<T> {
  let raw: unknown
  try {
    raw = JSON.parse(text)
  } catch (err) {
    throw new SerializationError("entry", "is not valid JSON", err)
  }

  const result = entrySchema<T>().safeParse(raw)
  if (!result.success) {
    throw new SerializationError("entry", z.prettifyError(result.error), result.error)
  }

  const { key, createdAt, discriminator, payload } = result.data
  return { key, createdAt, discriminator, payload }
}
