export type LLMProvider = 'anthropic' | 'openai'

export type ArtifactFormat = 'csv' | 'pdf'

export interface IssuedArtifact {
  url: string
  expiresAt: string
  filename: string
  format: ArtifactFormat
  byteLength: number
}

export interface SchemaColumn {
  name: string
  dataType: string
  nullable: boolean
}

export interface SchemaForeignKey {
  column: string
  referencesTable: string
  referencesColumn: string
}

export interface SchemaTable {
  name: string
  columns: SchemaColumn[]
  foreignKeys: SchemaForeignKey[]
}

export interface DatabaseSchema {
  version: string
  tables: SchemaTable[]
}
