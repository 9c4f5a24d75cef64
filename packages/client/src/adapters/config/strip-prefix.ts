/** Keep only the entries named `<prefix><key>`, keyed by `<key>`. */
export function stripPrefix(
  vars: Record<string, string | undefined>,
  prefix: string | undefined,
): Record<string, string | undefined> {
  if (!prefix) return { ...vars }

  const filtered: Record<string, string | undefined> = {}

  for (const [key, value] of Object.entries(vars)) {
    if (key.startsWith(prefix)) {
      filtered[key.slice(prefix.length)] = value
    }
  }

  return filtered
}
