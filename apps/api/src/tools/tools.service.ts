import { Injectable, Logger, OnModuleInit } from '@nestjs/common'
import type { ToolResult, ToolSpec } from '@invoice-agent/shared'
import { UnknownToolError } from '../common/errors'
import { SchemaCatalogService } from '../database/schema-catalog.service'
import { EmailConsentTool } from './connectors/email-consent.tool'
import { ExportCsvTool } from './connectors/export-csv.tool'
import { ExportReportTool } from './connectors/export-report.tool'
import { SqlQueryTool } from './connectors/sql-query.tool'
import { validateToolArguments } from './tool-arguments'
import type { ToolContext, ToolDefinition, ToolHandler } from './tool.types'

interface RegisteredTool {
  def: ToolDefinition
  handler: ToolHandler
}

@Injectable()
export class ToolsService implements OnModuleInit {
  private readonly logger = new Logger(ToolsService.name)
  private readonly registry = new Map<string, RegisteredTool>()
  private sealed = false

  constructor(
    private readonly schemaCatalog: SchemaCatalogService,
    sqlQuery: SqlQueryTool,
    exportCsv: ExportCsvTool,
    exportReport: ExportReportTool,
    emailConsent: EmailConsentTool,
  ) {
    // order is the order the model sees
    this.register(sqlQuery.def, sqlQuery)
    this.register(exportCsv.def, exportCsv)
    this.register(exportReport.def, exportReport)
    this.register(emailConsent.def, emailConsent)
  }

  onModuleInit() {
    this.seal()
  }

  register(def: ToolDefinition, handler: ToolHandler) {
    if (this.sealed) throw new Error(`Tool registry is sealed; cannot register ${def.name}`)
    if (this.registry.has(def.name)) throw new Error(`Tool ${def.name} is already registered`)
    if (def.requiresApproval && !handler.commit) {
      throw new Error(`Tool ${def.name} requires approval but has no commit step`)
    }
    this.registry.set(def.name, { def, handler })
  }

  seal() {
    if (this.sealed) return
    this.sealed = true
    this.logger.log(`Tool registry sealed with ${this.registry.size} tools: ${[...this.registry.keys()].join(', ')}`)
  }

  /** Specs in registration order, with descriptions resolved against the current schema. */
  async describeAll(): Promise<ToolSpec[]> {
    const defs = [...this.registry.values()].map((entry) => entry.def)
    const needsSchema = defs.some((def) => typeof def.description === 'function')
    const schemaText = needsSchema ? (await this.schemaCatalog.describe()).text : ''

    return defs.map((def) => ({
      name: def.name,
      displayName: def.displayName,
      description: typeof def.description === 'function' ? def.description(schemaText) : def.description,
      requiresApproval: def.requiresApproval,
      parameters: def.parameters,
    }))
  }

  async invoke(name: string, input: unknown, ctx: ToolContext): Promise<ToolResult> {
    const entry = this.registry.get(name)
    if (!entry) throw new UnknownToolError(name)
    const args = validateToolArguments(entry.def.parameters, input)
    return entry.handler.execute(args, ctx)
  }

  /** Runs the approved second phase of a tool that requires approval. */
  async commit(name: string, draft: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const entry = this.registry.get(name)
    if (!entry?.def.requiresApproval || !entry.handler.commit) throw new UnknownToolError(name)
    return entry.handler.commit(draft, ctx)
  }
}
