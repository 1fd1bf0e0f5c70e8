import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { readIntEnv } from '../common/env'
import { describeError } from '../common/errors'
import { renderSchemaDescription } from './render-schema'
import { SchemaSource } from './schema-source'

export interface SchemaDescription {
  version: string
  text: string
}

interface CachedDescription extends SchemaDescription {
  loadedAt: number
}

@Injectable()
export class SchemaCatalogService {
  private readonly logger = new Logger(SchemaCatalogService.name)
  private readonly ttlMs: number
  private cached: CachedDescription | null = null
  private loading: Promise<CachedDescription> | null = null

  constructor(
    private readonly source: SchemaSource,
    config: ConfigService,
  ) {
    this.ttlMs = readIntEnv(config, 'SCHEMA_CACHE_TTL_MS', 60_000, { min: 0, max: 24 * 60 * 60 * 1000 })
  }

  async describe(): Promise<SchemaDescription> {
    const cached = this.cached
    if (cached && Date.now() - cached.loadedAt < this.ttlMs) {
      return { version: cached.version, text: cached.text }
    }

    if (!this.loading) {
      this.loading = this.reload().finally(() => {
        this.loading = null
      })
    }
    const fresh = await this.loading
    return { version: fresh.version, text: fresh.text }
  }

  invalidate() {
    this.cached = null
    this.logger.log('Schema catalog invalidated')
  }

  private async reload(): Promise<CachedDescription> {
    const previous = this.cached
    try {
      const schema = await this.source.load()
      if (previous && previous.version === schema.version) {
        this.cached = { ...previous, loadedAt: Date.now() }
        return this.cached
      }
      this.cached = { version: schema.version, text: renderSchemaDescription(schema), loadedAt: Date.now() }
      this.logger.log(`Schema catalog loaded (version ${schema.version}, ${schema.tables.length} tables)`)
      return this.cached
    } catch (error) {
      if (!previous) throw error
      this.logger.warn(`Schema reload failed, serving version ${previous.version}: ${describeError(error)}`)
      return previous
    }
  }
}
