const SEPARATED = /[_\-\s]/

/**
 * Maps raw source keys onto setting names.
 *
 * `FORCE_UTC`, `force-utc` and `forceUtc` all become `forceUtc`; `LEVEL`
 * becomes `level`. Keys that are already camelCase are kept.
 */
export function normalizeKey(key: string): string {
  const trimmed = key.trim()
  const isUpperCase = trimmed === trimmed.toUpperCase()

  if (!SEPARATED.test(trimmed) && !isUpperCase) return trimmed

  const [head = "", ...rest] = trimmed.toLowerCase().split(SEPARATED).filter(Boolean)

  return head + rest.map((word) => word.charAt(0).toUpperCase() + word.slice(1)).join("")
}
