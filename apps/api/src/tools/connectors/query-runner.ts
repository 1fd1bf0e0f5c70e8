import { Injectable } from '@nestjs/common'
import { SqlExecutor, type QueryOptions, type QueryResult } from '../../database/sql-executor'
import { SqlRewriterService } from '../../sql/sql-rewriter.service'

/** Guard, rewrite, execute: the path every model-authored query takes. */
@Injectable()
export class QueryRunner {
  constructor(
    private readonly rewriter: SqlRewriterService,
    private readonly executor: SqlExecutor,
  ) {}

  async run(sql: string, options: QueryOptions = {}): Promise<QueryResult> {
    const prepared = this.rewriter.prepare(sql)
    return this.executor.query(prepared.sql, options)
  }
}
