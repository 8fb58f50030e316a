import type { Payload } from "../../ports/payload"
import { SerializationError } from "../cache-errors"

/**
 * Checks that `value` lies in the storable {@link Payload} space.
 *
 * @throws SerializationError naming the path of the first unsupported value
 */
export function assertPayload(value: unknown, path = "payload"): void {
  const problem = findProblem(value, path, new Set())
  if (problem) throw new SerializationError(problem.path, problem.reason)
}

export function isPayload(value: unknown): boolean {
  return findProblem(value, "payload", new Set()) === null
}

type Problem = Readonly<{ path: string; reason: string }>

function findProblem(value: unknown, path: string, ancestors: Set<object>): Problem | null {
  if (typeof value === "string" || typeof value === "boolean") return null

  if (typeof value === "number") {
    if (!Number.isFinite(value)) return { path, reason: `is ${value}` }
    // JSON has no negative zero; it would come back as 0
    return Object.is(value, -0) ? { path, reason: "is -0" } : null
  }

  if (value === null || value === undefined) return { path, reason: `is ${value}` }
  if (typeof value !== "object") return { path, reason: `is a ${typeof value}` }
  if (ancestors.has(value)) return { path, reason: "contains a cycle" }

  ancestors.add(value)
  try {
    return findNestedProblem(value, path, ancestors)
  } finally {
    ancestors.delete(value)
  }
}

function findNestedProblem(value: object, path: string, ancestors: Set<object>): Problem | null {
  if (Array.isArray(value)) {
    // index loop so holes surface as undefined
    for (let i = 0; i < value.length; i++) {
      const problem = findFieldProblem(value[i], `${path}[${i}]`, ancestors)
      if (problem) return problem
    }
    return null
  }

  if (!isPlainRecord(value)) {
    return { path, reason: `is a ${value.constructor?.name ?? "non-plain"} object` }
  }

  for (const [key, field] of Object.entries(value)) {
    const problem = findFieldProblem(field, `${path}.${key}`, ancestors)
    if (problem) return problem
  }
  return null
}

/** Inside arrays and objects `null` is data; only the top level must be a value. */
function findFieldProblem(value: unknown, path: string, ancestors: Set<object>): Problem | null {
  return value === null ? null : findProblem(value, path, ancestors)
}

function isPlainRecord(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}
