import { Injectable } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { TOOL_NAMES, type ToolResult } from '@invoice-agent/shared'
import { readIntEnv } from '../../common/env'
import { stringArg } from '../tool-arguments'
import type { ToolContext, ToolDefinition } from '../tool.types'
import { withSchema } from './query-guidance'
import { QueryRunner } from './query-runner'

@Injectable()
export class SqlQueryTool {
  private readonly maxRows: number

  constructor(
    private readonly queries: QueryRunner,
    config: ConfigService,
  ) {
    this.maxRows = readIntEnv(config, 'SQL_MAX_ROWS', 500, { min: 1, max: 10_000 })
  }

  get def(): ToolDefinition {
    return {
      name: TOOL_NAMES.sqlQuery,
      displayName: 'Query Invoice Data',
      description: (schema) =>
        withSchema(
          'Run one read-only SELECT (or WITH ... SELECT) statement against the invoice, purchase order and '
            + `contract tables and return the rows as JSON. At most ${this.maxRows} rows are returned; `
            + '"truncated" is true when more matched. Aggregate in SQL rather than fetching raw rows.',
          schema,
        ),
      requiresApproval: false,
      parameters: {
        sql_query: { type: 'string', required: true, description: 'A single PostgreSQL SELECT statement.' },
      },
    }
  }

  async execute(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const result = await this.queries.run(stringArg(args, 'sql_query'), { maxRows: this.maxRows, signal: ctx.signal })
    return {
      success: true,
      output: {
        columns: result.columns,
        rows: result.rows,
        rowCount: result.rows.length,
        truncated: result.truncated,
      },
      requiresConsent: false,
    }
  }
}
