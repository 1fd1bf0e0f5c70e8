import { Injectable } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { createHash } from 'node:crypto'
import type { DatabaseSchema, SchemaTable } from '@invoice-agent/shared'
import { readListEnv, readStringEnv } from '../common/env'
import { SchemaSource } from './schema-source'
import { SqlExecutor, type QueryRow } from './sql-executor'

export interface ColumnRow {
  table_name: string
  column_name: string
  data_type: string
  is_nullable: string
}

export interface ForeignKeyRow {
  table_name: string
  column_name: string
  referenced_table: string
  referenced_column: string
}

function quoteLiteral(value: string) {
  return `'${value.replace(/'/g, "''")}'`
}

function text(row: QueryRow, key: string) {
  const value = row[key]
  return value == null ? '' : String(value)
}

/** Reads the catalog of one PostgreSQL schema from information_schema. */
@Injectable()
export class SchemaIntrospectionService extends SchemaSource {
  private readonly schemaName: string
  private readonly allowedTables: string[]

  constructor(
    private readonly executor: SqlExecutor,
    config: ConfigService,
  ) {
    super()
    this.schemaName = readStringEnv(config, 'SQL_SCHEMA', 'public')
    this.allowedTables = readListEnv(config, 'SQL_ALLOWED_TABLES')
  }

  async load(): Promise<DatabaseSchema> {
    const schema = quoteLiteral(this.schemaName)
    const [columns, foreignKeys] = await Promise.all([
      this.executor.query(
        `SELECT table_name, column_name, data_type, is_nullable
FROM information_schema.columns
WHERE table_schema = ${schema}
ORDER BY table_name, ordinal_position`,
      ),
      this.executor.query(
        `SELECT kcu.table_name, kcu.column_name,
  ccu.table_name AS referenced_table, ccu.column_name AS referenced_column
FROM information_schema.table_constraints tc
JOIN information_schema.key_column_usage kcu
  ON kcu.constraint_name = tc.constraint_name AND kcu.table_schema = tc.table_schema
JOIN information_schema.constraint_column_usage ccu
  ON ccu.constraint_name = tc.constraint_name AND ccu.table_schema = tc.table_schema
WHERE tc.constraint_type = 'FOREIGN KEY' AND tc.table_schema = ${schema}
ORDER BY kcu.table_name, kcu.column_name`,
      ),
    ])

    return buildDatabaseSchema(
      columns.rows.map((row) => ({
        table_name: text(row, 'table_name'),
        column_name: text(row, 'column_name'),
        data_type: text(row, 'data_type'),
        is_nullable: text(row, 'is_nullable'),
      })),
      foreignKeys.rows.map((row) => ({
        table_name: text(row, 'table_name'),
        column_name: text(row, 'column_name'),
        referenced_table: text(row, 'referenced_table'),
        referenced_column: text(row, 'referenced_column'),
      })),
      this.allowedTables,
    )
  }
}

export function buildDatabaseSchema(
  columns: ColumnRow[],
  foreignKeys: ForeignKeyRow[],
  allowedTables: string[] = [],
): DatabaseSchema {
  const allowed = new Set(allowedTables.map((name) => name.toLowerCase()))
  const isAllowed = (table: string) => allowed.size === 0 || allowed.has(table.toLowerCase())

  const tables = new Map<string, SchemaTable>()
  for (const row of columns) {
    if (!isAllowed(row.table_name)) continue
    let table = tables.get(row.table_name)
    if (!table) {
      table = { name: row.table_name, columns: [], foreignKeys: [] }
      tables.set(row.table_name, table)
    }
    table.columns.push({
      name: row.column_name,
      dataType: row.data_type,
      nullable: row.is_nullable.toUpperCase() !== 'NO',
    })
  }

  for (const row of foreignKeys) {
    tables.get(row.table_name)?.foreignKeys.push({
      column: row.column_name,
      referencesTable: row.referenced_table,
      referencesColumn: row.referenced_column,
    })
  }

  const version = createHash('sha256')
    .update(JSON.stringify({ columns, foreignKeys, allowed: [...allowed].sort() }))
    .digest('hex')
    .slice(0, 16)

  return { version, tables: [...tables.values()] }
}
