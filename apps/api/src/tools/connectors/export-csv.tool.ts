import { Injectable } from '@nestjs/common'
import { TOOL_NAMES, type ToolResult } from '@invoice-agent/shared'
import { ArtifactsService } from '../../artifacts/artifacts.service'
import { optionalIntegerArg, optionalStringArg, stringArg } from '../tool-arguments'
import type { ToolContext, ToolDefinition } from '../tool.types'
import { withSchema } from './query-guidance'
import { QueryRunner } from './query-runner'

export const CSV_EXPORT_ROW_LIMIT = 50_000

@Injectable()
export class ExportCsvTool {
  constructor(
    private readonly queries: QueryRunner,
    private readonly artifacts: ArtifactsService,
  ) {}

  get def(): ToolDefinition {
    return {
      name: TOOL_NAMES.exportCsv,
      displayName: 'Export Query to CSV',
      description: (schema) =>
        withSchema(
          `Run one read-only SELECT statement and export up to ${CSV_EXPORT_ROW_LIMIT.toLocaleString('en-US')} `
            + 'matching rows as a CSV file. Returns a private download link that stops working after it expires '
            + '(60 minutes unless expiry_minutes says otherwise, at most 7 days). Use it when the user wants to '
            + 'download, export or share results, or when a result is too large to show in the chat.',
          schema,
        ),
      requiresApproval: false,
      parameters: {
        sql_query: { type: 'string', required: true, description: 'A single PostgreSQL SELECT statement.' },
        file_name: { type: 'string', required: false, description: 'Download name without extension.' },
        expiry_minutes: { type: 'integer', required: false, description: 'How long the link stays valid.' },
      },
    }
  }

  async execute(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const result = await this.queries.run(stringArg(args, 'sql_query'), {
      maxRows: CSV_EXPORT_ROW_LIMIT,
      signal: ctx.signal,
    })
    const artifact = await this.artifacts.issue('csv', result.rows, {
      filename: optionalStringArg(args, 'file_name'),
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
