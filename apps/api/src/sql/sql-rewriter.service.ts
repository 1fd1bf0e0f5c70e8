import { Injectable, Logger } from '@nestjs/common'
import { assertReadOnlyQuery } from './read-only-guard'
import { rewriteSimilarity, type RewrittenQuery } from './similarity-rewriter'

@Injectable()
export class SqlRewriterService {
  private readonly logger = new Logger(SqlRewriterService.name)

  /** Guards and rewrites model-authored SQL into what the database will actually run. */
  prepare(sql: string): RewrittenQuery {
    const statement = assertReadOnlyQuery(sql)
    const rewritten = rewriteSimilarity(statement)
    if (rewritten.occurrences > 0) {
      this.logger.debug(`Rewrote ${rewritten.occurrences} SIMILARITY call(s): ${rewritten.sql}`)
    }
    return rewritten
  }
}
