import Papa from 'papaparse'
import { formatCell } from './cell'

export function serializeCsv(rows: Record<string, unknown>[], columns: string[]) {
  if (rows.length === 0) {
    return Buffer.from(Papa.unparse([columns]), 'utf8')
  }
  const data = rows.map((row) => columns.map((column) => formatCell(row[column], column)))
  return Buffer.from(Papa.unparse({ fields: columns, data }), 'utf8')
}
