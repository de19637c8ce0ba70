/**
 * Keep only keys starting with `prefix`, with the prefix removed.
 * Without a prefix the record is copied as is.
 */
export function stripPrefix<V>(
  values: Record<string, V>,
  prefix: string | undefined,
): Record<string, V> {
  if (!prefix) return { ...values }

  const filtered: Record<string, V> = {}

  for (const [key, value] of Object.entries(values)) {
    if (key.startsWith(prefix) && key.length > prefix.length) {
      filtered[key.slice(prefix.length)] = value
    }
  }

  return filtered
}
