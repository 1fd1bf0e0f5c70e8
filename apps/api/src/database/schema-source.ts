import type { DatabaseSchema } from '@invoice-agent/shared'

export abstract class SchemaSource {
  abstract load(): Promise<DatabaseSchema>
}
