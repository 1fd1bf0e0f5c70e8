import type { DatabaseSchema } from '@invoice-agent/shared'

/**
 * Plain-text catalog for tool descriptions, one block per table:
 *
 *   Table: invoices
 *   - vendor_id integer NOT NULL -> vendors.id
 */
export function renderSchemaDescription(schema: DatabaseSchema) {
  const tables = [...schema.tables].sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
  if (tables.length === 0) return 'No tables are available.'

  return tables
    .map((table) => {
      const references = new Map(
        table.foreignKeys.map((fk) => [fk.column, `${fk.referencesTable}.${fk.referencesColumn}`]),
      )
      const lines = table.columns.map((column) => {
        const parts = [`- ${column.name} ${column.dataType}`]
        if (!column.nullable) parts.push('NOT NULL')
        const target = references.get(column.name)
        if (target) parts.push(`-> ${target}`)
        return parts.join(' ')
      })
      return [`Table: ${table.name}`, ...lines].join('\n')
    })
    .join('\n\n')
}
