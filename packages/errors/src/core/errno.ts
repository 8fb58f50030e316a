function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

/** The errno code (`ENOENT`, `EACCES`, ...) of a Node system error, if any. */
export function errnoCode(err: unknown): string | undefined {
  if (!isRecord(err)) return undefined

  const code = err.code
  return typeof code === "string" ? code : undefined
}

export function isNotFoundError(err: unknown): boolean {
  return errnoCode(err) === "ENOENT"
}
