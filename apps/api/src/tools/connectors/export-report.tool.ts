import { Injectable } from '@nestjs/common'
import { TOOL_NAMES, type ToolResult } from '@invoice-agent/shared'
import { ArtifactsService } from '../../artifacts/artifacts.service'
import { optionalIntegerArg, optionalStringArg, stringArg } from '../tool-arguments'
import type { ToolContext, ToolDefinition } from '../tool.types'
import { withSchema } from './query-guidance'
import { QueryRunner } from './query-runner'

export const REPORT_ROW_LIMIT = 1_000

@Injectable()
export class ExportReportTool {
  constructor(
    private readonly queries: QueryRunner,
    private readonly artifacts: ArtifactsService,
  ) {}

  get def(): ToolDefinition {
    return {
      name: TOOL_NAMES.exportReport,
      displayName: 'Export Query as PDF Report',
      description: (schema) =>
        withSchema(
          `Run one read-only SELECT statement and render up to ${REPORT_ROW_LIMIT.toLocaleString('en-US')} rows as a `
            + 'PDF report with a title and an optional summary, for example a verification report that compares '
            + 'invoices with their purchase orders or contracts. Returns a private, expiring download link.',
          schema,
        ),
      requiresApproval: false,
      parameters: {
        sql_query: { type: 'string', required: true, description: 'A single PostgreSQL SELECT statement.' },
        title: { type: 'string', required: true, description: 'Report title.' },
        summary: { type: 'string', required: false, description: 'Findings to print above the records.' },
        expiry_minutes: { type: 'integer', required: false, description: 'How long the link stays valid.' },
      },
    }
  }

  async execute(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const title = stringArg(args, 'title')
    const result = await this.queries.run(stringArg(args, 'sql_query'), {
      maxRows: REPORT_ROW_LIMIT,
      signal: ctx.signal,
    })
    const artifact = await this.artifacts.issue('pdf', result.rows, {
      title,
      summary: optionalStringArg(args, 'summary'),
      columns: result.columns,
      expiryMinutes: optionalIntegerArg(args, 'expiry_minutes'),
      signal: ctx.signal,
    })
    return {
      success: true,
      output: {
        url: artifact.url,
        expiresAt: artifact.expiresAt,
        filename: artifact.filename,
        rowCount: result.rows.length,
        truncated: result.truncated,
      },
      requiresConsent: false,
    }
  }
}
