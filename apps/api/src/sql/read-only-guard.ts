import { ToolValidationError } from '../common/errors'
import { isSignificant, tokenizeSql } from './sql-lexer'

const READ_ONLY_LEADS = new Set(['SELECT', 'WITH'])

/**
 * Accepts a single SELECT (or WITH ... SELECT) statement and returns it without its
 * trailing semicolon. Anything else is rejected before it reaches the database.
 */
export function assertReadOnlyQuery(sql: string) {
  const tokens = tokenizeSql(sql)
  const significant = tokens.filter(isSignificant)

  if (significant.length === 0) {
    throw new ToolValidationError(['the query is empty'], 'Rejected query')
  }

  const lead = significant[0]
  if (lead.kind !== 'word' || !READ_ONLY_LEADS.has(lead.text.toUpperCase())) {
    throw new ToolValidationError(['only SELECT statements can be executed'], 'Rejected query')
  }

  const separators = significant.filter((token) => token.kind === 'punct' && token.text === ';')
  if (separators.length === 0) return sql.trim()

  const last = significant[significant.length - 1]
  if (separators.length > 1 || separators[0] !== last) {
    throw new ToolValidationError(['only one statement can be executed at a time'], 'Rejected query')
  }

  return sql.slice(0, last.start).trim()
}
