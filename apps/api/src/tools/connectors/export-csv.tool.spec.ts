import { TOOL_NAMES } from '@invoice-agent/shared'
import { resultOf } from '../../testing/in-memory-sql-executor'
import { createToolStack } from '../../testing/tool-stack'
import { CSV_EXPORT_ROW_LIMIT } from './export-csv.tool'
import { REPORT_ROW_LIMIT } from './export-report.tool'

const ctx = { conversationId: 'c1' }

describe('export tools', () => {
  test('issues a CSV and returns only the link and its expiry', async () => {
    const { tools, executor, storage } = createToolStack()
    executor.on('FROM invoices', resultOf([{ invoice_number: 'INV-1', vendor_name: 'Acme Corp' }]))

    const result = await tools.invoke(
      TOOL_NAMES.exportCsv,
      { sql_query: 'SELECT invoice_number, vendor_name FROM invoices', file_name: 'Acme Invoices', expiry_minutes: 15 },
      ctx,
    )

    const key = storage.onlyKey()
    expect(key).toMatch(/^sessiondumps\/\d{8}_\d{6}_[0-9a-f]{8}_acme_invoices\.csv$/)
    expect(storage.text(key)).toBe('invoice_number,vendor_name\r\nINV-1,Acme Corp')
    expect(executor.executed[0].options.maxRows).toBe(CSV_EXPORT_ROW_LIMIT)
    expect(result.output).toEqual({
      url: `https://artifacts.test/${key}?expires=900`,
      expiresAt: expect.any(String),
      filename: 'acme_invoices.csv',
      rowCount: 1,
      truncated: false,
    })
  })

  test('zero matching rows still issue a header-only file and a link', async () => {
    const { tools, executor, storage } = createToolStack()
    executor.on('FROM invoices', resultOf([], ['invoice_number', 'vendor_name']))

    const result = await tools.invoke(TOOL_NAMES.exportCsv, { sql_query: 'SELECT invoice_number, vendor_name FROM invoices' }, ctx)

    expect(result.success).toBe(true)
    expect(storage.text(storage.onlyKey())).toBe('invoice_number,vendor_name')
    expect(result.output).toMatchObject({ filename: 'query_result.csv', rowCount: 0 })
  })

  test('renders a PDF report named after its title', async () => {
    const { tools, executor, storage } = createToolStack()
    executor.on('FROM invoices', resultOf([{ invoice_number: 'INV-1', total_amount: '120.50' }]))

    const result = await tools.invoke(
      TOOL_NAMES.exportReport,
      { sql_query: 'SELECT invoice_number, total_amount FROM invoices', title: 'Q3 Verification', summary: 'All matched.' },
      ctx,
    )

    const stored = storage.objects.get(storage.onlyKey())
    expect(stored?.contentType).toBe('application/pdf')
    expect(stored?.body.subarray(0, 5).toString('latin1')).toBe('%PDF-')
    expect(executor.executed[0].options.maxRows).toBe(REPORT_ROW_LIMIT)
    expect(result.output).toMatchObject({ filename: 'q3_verification.pdf', rowCount: 1 })
  })

  test('reports storage outages as IssuerUnavailable', async () => {
    const { tools, storage } = createToolStack()
    storage.putFailure = new Error('connect ECONNREFUSED')
    await expect(
      tools.invoke(TOOL_NAMES.exportCsv, { sql_query: 'SELECT invoice_number FROM invoices' }, ctx),
    ).rejects.toMatchObject({ kind: 'IssuerUnavailable', retryable: true })
  })
})
