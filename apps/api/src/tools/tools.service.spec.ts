import { TOOL_NAMES } from '@invoice-agent/shared'
import { createToolStack } from '../testing/tool-stack'
import { resultOf } from '../testing/in-memory-sql-executor'

describe('ToolsService', () => {
  test('lists tools in a fixed order with the schema embedded in query tools', async () => {
    const { tools } = createToolStack()
    const specs = await tools.describeAll()

    expect(specs.map((spec) => spec.name)).toEqual([
      TOOL_NAMES.sqlQuery,
      TOOL_NAMES.exportCsv,
      TOOL_NAMES.exportReport,
      TOOL_NAMES.emailConsent,
    ])
    expect(specs[0].description).toContain('Table: invoices\n- invoice_number text NOT NULL')
    expect(specs[0].description).toContain("SIMILARITY(vendor_name, 'Acme') >= 70")
    expect(specs[3].requiresApproval).toBe(true)
    expect(specs[3].description).not.toContain('Table: invoices')
  })

  test('reflects a new schema once the catalog is refreshed', async () => {
    const { tools, schemaSource, schemaCatalog } = createToolStack()
    await tools.describeAll()
    schemaSource.schema = {
      version: 'v2',
      tables: [{ name: 'contracts', columns: [{ name: 'contract_id', dataType: 'text', nullable: false }], foreignKeys: [] }],
    }
    schemaCatalog.invalidate()

    const [query] = await tools.describeAll()
    expect(query.description).toContain('Table: contracts')
    expect(query.description).not.toContain('Table: invoices')
  })

  test('fails unknown tools with UnknownTool', async () => {
    const { tools } = createToolStack()
    await expect(tools.invoke('drop_tables', {}, { conversationId: 'c1' })).rejects.toMatchObject({
      kind: 'UnknownTool',
      message: 'Unknown tool: drop_tables',
    })
  })

  test('validates arguments before a connector runs', async () => {
    const { tools, executor } = createToolStack()
    await expect(tools.invoke(TOOL_NAMES.sqlQuery, { query: 'SELECT 1' }, { conversationId: 'c1' })).rejects.toMatchObject({
      kind: 'ValidationError',
    })
    expect(executor.executed).toHaveLength(0)
  })

  test('dispatches to the connector', async () => {
    const { tools, executor } = createToolStack()
    executor.on('FROM invoices', resultOf([{ n: 2 }]))
    const result = await tools.invoke(TOOL_NAMES.sqlQuery, { sql_query: 'SELECT count(*) AS n FROM invoices' }, { conversationId: 'c1' })
    expect(result).toEqual({
      success: true,
      output: { columns: ['n'], rows: [{ n: 2 }], rowCount: 1, truncated: false },
      requiresConsent: false,
    })
  })

  test('refuses registrations after sealing and duplicate names', () => {
    const { tools } = createToolStack()
    const def = {
      name: 'extra',
      displayName: 'Extra',
      description: 'extra',
      requiresApproval: false,
      parameters: {},
    }
    expect(() => tools.register(def, { execute: async () => ({ success: true, output: null, requiresConsent: false }) })).toThrow(
      'Tool registry is sealed',
    )
  })

  test('only commits tools that require approval', async () => {
    const { tools } = createToolStack()
    await expect(tools.commit(TOOL_NAMES.sqlQuery, {}, { conversationId: 'c1' })).rejects.toMatchObject({ kind: 'UnknownTool' })
  })
})
