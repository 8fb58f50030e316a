import { UnhashableArgumentError } from "../cache-errors"

/**
 * Stable text encoding of an argument value.
 *
 * Equal values encode equally regardless of object key, Map or Set insertion
 * order. Values whose identity is their only content (functions, class
 * instances, promises) are rejected with the path of the offending value.
 */
export function encodeCanonical(value: unknown, path: string): string {
  return encode(value, path, new Set())
}

function encode(value: unknown, path: string, ancestors: Set<object>): string {
  if (value === null) return "null"
  if (value === undefined) return "undefined"
  if (typeof value === "string") return JSON.stringify(value)
  // String() already folds -0 into "0" and names NaN and the infinities
  if (typeof value === "number" || typeof value === "boolean") return String(value)
  if (typeof value === "bigint") return `${value}n`
  if (typeof value === "function") throw new UnhashableArgumentError(path, "is a function")
  if (typeof value === "symbol") throw new UnhashableArgumentError(path, "is a symbol")

  if (ancestors.has(value)) throw new UnhashableArgumentError(path, "contains a cycle")

  ancestors.add(value)
  try {
    return encodeObject(value, path, ancestors)
  } finally {
    ancestors.delete(value)
  }
}

function encodeObject(value: object, path: string, ancestors: Set<object>): string {
  if (value instanceof Date) {
    if (Number.isNaN(value.getTime())) {
      throw new UnhashableArgumentError(path, "is an invalid Date")
    }
    return `Date(${value.toISOString()})`
  }

  if (value instanceof RegExp) return `RegExp(${String(value)})`

  if (value instanceof Uint8Array) {
    return `Bytes(${Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString("hex")})`
  }

  if (Array.isArray(value)) {
    const items = value.map((item: unknown, i) => encode(item, `${path}[${i}]`, ancestors))
    return `[${items.join(", ")}]`
  }

  if (value instanceof Map) {
    const entries = [...value.entries()].map(([k, v]: [unknown, unknown], i) => {
      const encodedKey = encode(k, `${path}<key ${i}>`, ancestors)
      return `${encodedKey}: ${encode(v, `${path}<${encodedKey}>`, ancestors)}`
    })
    return `Map{${entries.sort().join(", ")}}`
  }

  if (value instanceof Set) {
    const members = [...value].map((member: unknown, i) =>
      encode(member, `${path}<member ${i}>`, ancestors),
    )
    return `Set{${members.sort().join(", ")}}`
  }

  if (isPlainObject(value)) {
    const fields = Object.keys(value)
      .sort()
      .map((k) => `${JSON.stringify(k)}: ${encode(value[k], `${path}.${k}`, ancestors)}`)
    return `{${fields.join(", ")}}`
  }

  throw new UnhashableArgumentError(
    path,
    `is a ${value.constructor?.name ?? "non-plain"} object with no canonical encoding`,
  )
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}
