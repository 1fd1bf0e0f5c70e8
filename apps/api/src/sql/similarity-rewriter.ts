import { RewriteError } from '../common/errors'
import { isSignificant, tokenizeSql, type SqlToken } from './sql-lexer'
import { SIMILARITY_SCORES, SIMILARITY_TIERS, type TierDialect } from './similarity-tiers'

export interface SimilarityExpression {
  /** Offset of the `SIMILARITY` keyword. */
  start: number
  /** Offset just past the closing parenthesis. */
  end: number
  column: string
  term: string
  /** The term's literal exactly as written, quotes included. */
  literal: string
}

export interface RewrittenQuery {
  sql: string
  occurrences: number
}

const KEYWORD = 'SIMILARITY'

/** Locates every `SIMILARITY(column, 'term')` call outside literals, quoted identifiers and comments. */
export function findSimilarityExpressions(sql: string): SimilarityExpression[] {
  const tokens = tokenizeSql(sql)
  const found: SimilarityExpression[] = []

  let index = 0
  while (index < tokens.length) {
    const token = tokens[index]
    if (token.kind !== 'word' || token.text.toUpperCase() !== KEYWORD) {
      index += 1
      continue
    }

    const previous = previousSignificant(tokens, index)
    const open = nextSignificant(tokens, index)
    if ((previous && previous.token.text === '.') || !open || open.token.text !== '(') {
      index += 1
      continue
    }

    const call = readArguments(tokens, open.index, token.start)
    found.push(toExpression(sql, token, call.close, call.args))
    index = call.closeIndex + 1
  }

  return found
}

/** Replaces each `SIMILARITY(...)` call with a numeric CASE expression; everything else is kept verbatim. */
export function rewriteSimilarity(sql: string): RewrittenQuery {
  const expressions = findSimilarityExpressions(sql)
  if (expressions.length === 0) return { sql, occurrences: 0 }

  let out = ''
  let cursor = 0
  for (const expression of expressions) {
    out += sql.slice(cursor, expression.start)
    out += buildSimilarityCase(expression.column, expression.term)
    cursor = expression.end
  }
  out += sql.slice(cursor)

  return { sql: out, occurrences: expressions.length }
}

/** Renders the tiers as PostgreSQL; upper-casing runs under the "C" collation so only ASCII letters change. */
const sqlDialect: TierDialect<string, string, string> = {
  number: (value) => String(value),
  upper: (text) => `upper(${text} COLLATE "C")`,
  stripPattern: (text, pattern) => `regexp_replace(${text}, ${quoteSqlLiteral(pattern)}, '', 'g')`,
  soundex: (text) => `soundex(${text})`,
  position: (haystack, needle) => `strpos(${haystack}, ${needle})`,
  equals: (left, right) => `${left} = ${right}`,
  numberEquals: (left, right) => `${left} = ${right}`,
  greaterThan: (left, right) => `${left} > ${right}`,
  decay: (value, { floor, start, origin, step }) => `GREATEST(${floor}, ${start} - (${value} - ${origin}) * ${step})`,
}

function quoteSqlLiteral(text: string) {
  return `'${text.replace(/'/g, "''")}'`
}

/**
 * The tiered score as a PostgreSQL expression over the trimmed term. Tiers that cannot
 * match for this term are left out: the normalized tiers when the term normalizes to
 * nothing, the phonetic tier when the term has no Soundex code.
 */
export function buildSimilarityCase(column: string, term: string) {
  const value = `${column}::text`
  const literal = quoteSqlLiteral(term)
  const branches = SIMILARITY_TIERS.filter((tier) => tier.applies(term)).map((tier) => {
    const { when, then } = tier.build(sqlDialect, value, literal)
    return `WHEN ${when} THEN ${then}`
  })
  return `(CASE ${branches.join(' ')} ELSE ${SIMILARITY_SCORES.none} END)`
}

interface ArgumentList {
  args: SqlToken[][]
  close: SqlToken
  closeIndex: number
}

function readArguments(tokens: SqlToken[], openIndex: number, keywordOffset: number): ArgumentList {
  const args: SqlToken[][] = [[]]
  let depth = 0

  for (let index = openIndex + 1; index < tokens.length; index += 1) {
    const token = tokens[index]
    if (token.unterminated) break

    if (token.kind === 'punct') {
      if (token.text === '(') depth += 1
      if (token.text === ')') {
        if (depth === 0) return { args, close: token, closeIndex: index }
        depth -= 1
      }
      if (token.text === ',' && depth === 0) {
        args.push([])
        continue
      }
    }
    args[args.length - 1].push(token)
  }

  throw new RewriteError('SIMILARITY( is missing its closing parenthesis', keywordOffset)
}

function toExpression(sql: string, keyword: SqlToken, close: SqlToken, args: SqlToken[][]): SimilarityExpression {
  const offset = keyword.start
  if (args.length !== 2) {
    throw new RewriteError(`SIMILARITY expects 2 arguments (column, 'term'), got ${args.length}`, offset)
  }

  const columnTokens = args[0].filter(isSignificant)
  if (!isColumnReference(columnTokens)) {
    throw new RewriteError('SIMILARITY expects a column reference as its first argument', offset)
  }

  const termTokens = args[1].filter(isSignificant)
  const literal = termTokens[0]
  if (termTokens.length !== 1 || literal.kind !== 'string' || literal.value == null) {
    throw new RewriteError('SIMILARITY expects a single string literal as its second argument', offset)
  }

  const term = literal.value.trim()
  if (!term) {
    throw new RewriteError('SIMILARITY search term is empty', offset)
  }

  const first = columnTokens[0]
  const last = columnTokens[columnTokens.length - 1]
  return {
    start: keyword.start,
    end: close.end,
    column: sql.slice(first.start, last.end),
    term,
    literal: literal.text,
  }
}

// identifier ( '.' identifier )*
function isColumnReference(tokens: SqlToken[]) {
  if (tokens.length === 0 || tokens.length % 2 === 0) return false
  return tokens.every((token, index) => {
    if (index % 2 === 1) return token.kind === 'punct' && token.text === '.'
    return (token.kind === 'word' || token.kind === 'quoted') && !token.unterminated
  })
}

function previousSignificant(tokens: SqlToken[], index: number) {
  for (let i = index - 1; i >= 0; i -= 1) {
    if (isSignificant(tokens[i])) return { token: tokens[i], index: i }
  }
  return null
}

function nextSignificant(tokens: SqlToken[], index: number) {
  for (let i = index + 1; i < tokens.length; i += 1) {
    if (isSignificant(tokens[i])) return { token: tokens[i], index: i }
  }
  return null
}
