import { ConfigService } from '@nestjs/config'
import { INVOICE_SCHEMA, StaticSchemaSource } from '../testing/static-schema-source'
import { SchemaCatalogService } from './schema-catalog.service'

describe('SchemaCatalogService', () => {
  let source: StaticSchemaSource
  let catalog: SchemaCatalogService

  beforeEach(() => {
    jest.useFakeTimers()
    jest.setSystemTime(new Date('2025-03-01T00:00:00Z'))
    source = new StaticSchemaSource()
    catalog = new SchemaCatalogService(source, new ConfigService({ SCHEMA_CACHE_TTL_MS: 1000 }))
  })

  afterEach(() => {
    jest.useRealTimers()
  })

  test('caches the rendered description within the TTL', async () => {
    const first = await catalog.describe()
    const second = await catalog.describe()
    expect(first.version).toBe('v1')
    expect(first.text).toContain('Table: invoices')
    expect(second).toEqual(first)
    expect(source.loads).toBe(1)
  })

  test('reloads after the TTL and picks up a new version', async () => {
    await catalog.describe()
    source.schema = {
      version: 'v2',
      tables: [{ name: 'contracts', columns: [{ name: 'contract_id', dataType: 'text', nullable: false }], foreignKeys: [] }],
    }
    jest.advanceTimersByTime(1001)

    const next = await catalog.describe()
    expect(source.loads).toBe(2)
    expect(next).toEqual({ version: 'v2', text: 'Table: contracts\n- contract_id text NOT NULL' })
  })

  test('reloads immediately after invalidation', async () => {
    await catalog.describe()
    catalog.invalidate()
    await catalog.describe()
    expect(source.loads).toBe(2)
  })

  test('shares one load between concurrent callers', async () => {
    await Promise.all([catalog.describe(), catalog.describe(), catalog.describe()])
    expect(source.loads).toBe(1)
  })

  test('keeps serving the last description when a reload fails', async () => {
    const first = await catalog.describe()
    source.failure = new Error('connection reset')
    jest.advanceTimersByTime(1001)
    await expect(catalog.describe()).resolves.toEqual(first)
  })

  test('fails when nothing has been loaded yet', async () => {
    source.failure = new Error('connection reset')
    await expect(catalog.describe()).rejects.toThrow('connection reset')
    source.failure = null
    await expect(catalog.describe()).resolves.toEqual({ version: INVOICE_SCHEMA.version, text: expect.any(String) })
  })
})
