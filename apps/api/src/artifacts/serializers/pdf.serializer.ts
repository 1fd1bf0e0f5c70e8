import PDFDocument from 'pdfkit'
import { formatCell } from './cell'

export interface PdfReportInput {
  title: string
  summary?: string
  columns: string[]
  rows: Record<string, unknown>[]
  generatedAt: Date
}

const EMPTY_REPORT_TEXT = 'No matching records.'

/** Renders the report fully in memory. */
export function renderPdfReport({ title, summary, columns, rows, generatedAt }: PdfReportInput): Promise<Buffer> {
  // format every cell first so a bad value fails before the document starts streaming
  const records = rows.map((row) => columns.map((column) => `${column}: ${formatCell(row[column], column)}`))

  return new Promise<Buffer>((resolve, reject) => {
    const doc = new PDFDocument({ size: 'A4', margin: 48, info: { Title: title } })
    const chunks: Buffer[] = []
    doc.on('data', (chunk: Buffer) => chunks.push(chunk))
    doc.on('end', () => resolve(Buffer.concat(chunks)))
    doc.on('error', reject)

    doc.fontSize(18).fillColor('black').text(title)
    doc.moveDown(0.3).fontSize(9).fillColor('#555555').text(`Generated ${generatedAt.toISOString()}`)
    if (summary) {
      doc.moveDown().fontSize(11).fillColor('black').text(summary)
    }
    doc.moveDown()

    if (records.length === 0) {
      doc.fontSize(11).fillColor('black').text(EMPTY_REPORT_TEXT)
    }
    records.forEach((lines, index) => {
      doc.fontSize(11).fillColor('black').text(`Record ${index + 1}`, { underline: true })
      doc.fontSize(9)
      for (const line of lines) doc.text(line)
      doc.moveDown(0.5)
    })

    doc.end()
  })
}
