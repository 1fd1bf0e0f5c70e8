import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import postgres from 'postgres'
import { readIntEnv, readStringEnv } from '../common/env'
import {
  AgentError,
  QueryFailedError,
  UpstreamTimeoutError,
  UpstreamUnavailableError,
  describeError,
} from '../common/errors'
import { withTimeout } from '../common/timeout'
import { toJsonSafeRow } from './json-safe'
import { SqlExecutor, type QueryOptions, type QueryResult } from './sql-executor'

const QUERY_CANCELED = '57014'
const BOUNDED_CURSOR = 'bounded_result'

/**
 * The statements that run one query. With a row cap, the query feeds a cursor and one
 * more row than the cap is fetched, so the query's own ORDER BY decides which rows come back.
 */
export function boundedStatements(text: string, maxRows?: number): [string, ...string[]] {
  if (maxRows == null) return [text]
  // the newline keeps a trailing line comment from swallowing what follows
  return [`DECLARE ${BOUNDED_CURSOR} NO SCROLL CURSOR FOR\n${text}\n`, `FETCH FORWARD ${maxRows + 1} FROM ${BOUNDED_CURSOR}`]
}

@Injectable()
export class DatabaseService extends SqlExecutor implements OnModuleDestroy {
  private readonly logger = new Logger(DatabaseService.name)
  private readonly client: postgres.Sql | null
  private readonly timeoutMs: number

  constructor(config: ConfigService) {
    super()
    this.timeoutMs = readIntEnv(config, 'SQL_TIMEOUT_MS', 15_000, { min: 1_000, max: 300_000 })
    const url = readStringEnv(config, 'DATABASE_URL')
    if (!url) {
      this.logger.warn('DATABASE_URL is not set; queries will fail until it is configured.')
      this.client = null
      return
    }
    this.client = postgres(url, {
      max: readIntEnv(config, 'DATABASE_POOL_MAX', 10, { min: 1, max: 100 }),
      idle_timeout: 30,
      connect_timeout: 10,
      prepare: false,
    })
  }

  async onModuleDestroy() {
    await this.client?.end({ timeout: 5 })
  }

  async query(text: string, options: QueryOptions = {}): Promise<QueryResult> {
    const client = this.client
    if (!client) throw new UpstreamUnavailableError('The database is not configured')

    const { maxRows, signal } = options
    const statements = boundedStatements(text, maxRows)
    this.logger.debug(`Executing SQL: ${statements.join('; ')}`)

    try {
      const { list } = await withTimeout('Database query', this.timeoutMs, (abort) =>
        client.begin('read only', async (tx) => {
          await tx.unsafe(`SET LOCAL statement_timeout = ${this.timeoutMs}`)
          let result = await this.run(tx, statements[0], abort)
          for (const statement of statements.slice(1)) result = await this.run(tx, statement, abort)
          return { list: result }
        }), signal)

      const rows = Array.from(list, (row) => toJsonSafeRow(row))
      const truncated = maxRows != null && rows.length > maxRows
      return {
        columns: list.columns.map((column) => String(column.name)),
        rows: truncated ? rows.slice(0, maxRows) : rows,
        truncated,
      }
    } catch (error) {
      throw this.toAgentError(error)
    }
  }

  private async run(tx: postgres.TransactionSql, statement: string, abort: AbortSignal) {
    const pending = tx.unsafe(statement)
    const cancel = () => pending.cancel()
    abort.addEventListener('abort', cancel, { once: true })
    try {
      return await pending
    } finally {
      abort.removeEventListener('abort', cancel)
    }
  }

  private toAgentError(error: unknown): AgentError {
    if (error instanceof AgentError) return error
    if (error instanceof postgres.PostgresError) {
      if (error.code === QUERY_CANCELED) {
        return new UpstreamTimeoutError(`The query exceeded the ${this.timeoutMs}ms statement timeout`)
      }
      return new QueryFailedError(error.message, { cause: error })
    }
    this.logger.warn(`Database call failed: ${describeError(error)}`)
    return new UpstreamUnavailableError('The database is unavailable', { cause: error })
  }
}
