/**
 * Keeps the variables starting with `prefix`, with the prefix removed.
 * An empty prefix keeps everything.
 */
export function stripPrefix(
  values: Readonly<Record<string, string | undefined>>,
  prefix: string,
): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix)) out[key.slice(prefix.length)] = value
  }

  return out
}
