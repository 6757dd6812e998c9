/**
 * Check if a value should be left out of the emitted schema: `undefined`,
 * empty strings, and empty arrays, maps or records.
 * `false` and `0` are values, not empty.
 */
export function isEmpty(value: unknown): boolean {
  if (value === undefined || value === "") return true
  if (Array.isArray(value)) return value.length === 0
  if (value instanceof Map) return value.size === 0
  if (typeof value === "object" && value !== null) return Object.keys(value).length === 0
  return false
}

/**
 * Build a record from entries, dropping the empty ones (inline)
 */
export function clean(entries: [string, unknown][]): Record<string, unknown> {
  return Object.fromEntries(entries.filter(([, value]) => !isEmpty(value)))
}

function cloneValue(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(cloneValue)
  if (typeof value === "object" && value !== null) return cloneRecord(Object.fromEntries(Object.entries(value)))
  return value
}

/**
 * Deep copy a record of plain JSON values, so the copy shares no arrays or objects with the input
 */
export function cloneRecord(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).map(([key, value]) => [key, cloneValue(value)]))
}
