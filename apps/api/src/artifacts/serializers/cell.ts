import { ArtifactSerializationError } from '../../common/errors'

export function formatCell(value: unknown, column: string): string {
  if (value == null) return ''
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') return String(value)
  if (value instanceof Date) return value.toISOString()
  if (typeof value === 'object') {
    try {
      return JSON.stringify(value)
    } catch (error) {
      throw new ArtifactSerializationError(`Column "${column}" holds a value that cannot be serialized`, { cause: error })
    }
  }
  throw new ArtifactSerializationError(`Column "${column}" holds a ${typeof value} value that cannot be serialized`)
}
