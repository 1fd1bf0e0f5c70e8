export type QueryRow = Record<string, unknown>

export interface QueryResult {
  columns: string[]
  rows: QueryRow[]
  /** True when more than `maxRows` rows matched and the rest were dropped. */
  truncated: boolean
}

export interface QueryOptions {
  signal?: AbortSignal
  maxRows?: number
}

/** Runs one read-only statement. */
export abstract class SqlExecutor {
  abstract query(sql: string, options?: QueryOptions): Promise<QueryResult>
}
