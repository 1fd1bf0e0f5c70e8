/** Converts driver values into plain JSON values. */
export function toJsonSafe(value: unknown): unknown {
  if (value == null) return null
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString()
  if (typeof value === 'bigint') return value.toString()
  if (Buffer.isBuffer(value)) return value.toString('base64')
  if (Array.isArray(value)) return value.map(toJsonSafe)
  if (typeof value === 'object') {
    const out: Record<string, unknown> = {}
    for (const [key, entry] of Object.entries(value)) out[key] = toJsonSafe(entry)
    return out
  }
  if (typeof value === 'number' && !Number.isFinite(value)) return String(value)
  return value
}

export function toJsonSafeRow(row: Record<string, unknown>) {
  const out: Record<string, unknown> = {}
  for (const [key, entry] of Object.entries(row)) out[key] = toJsonSafe(entry)
  return out
}
