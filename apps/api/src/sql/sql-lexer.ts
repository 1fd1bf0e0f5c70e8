export type SqlTokenKind = 'word' | 'quoted' | 'string' | 'comment' | 'space' | 'number' | 'punct'

export interface SqlToken {
  kind: SqlTokenKind
  text: string
  start: number
  end: number
  /** Decoded content of a string literal or quoted identifier. */
  value?: string
  unterminated?: boolean
}

const WORD_START = /[A-Za-z_\u0080-\uffff]/
const WORD_PART = /[A-Za-z0-9_$\u0080-\uffff]/
const DIGIT = /[0-9]/
const SPACE = /\s/
const DOLLAR_TAG = /^\$([A-Za-z_][A-Za-z0-9_]*)?\$/

/**
 * Splits SQL text into tokens covering every character, so callers can rewrite
 * selected ranges and keep everything else byte for byte.
 */
export function tokenizeSql(sql: string): SqlToken[] {
  const tokens: SqlToken[] = []
  let pos = 0

  while (pos < sql.length) {
    const ch = sql[pos]
    const next = sql[pos + 1]
    let token: SqlToken

    if (SPACE.test(ch)) {
      token = readWhile(sql, pos, 'space', (c) => SPACE.test(c))
    } else if (ch === '-' && next === '-') {
      const newline = sql.indexOf('\n', pos)
      const end = newline === -1 ? sql.length : newline
      token = { kind: 'comment', text: sql.slice(pos, end), start: pos, end }
    } else if (ch === '/' && next === '*') {
      token = readBlockComment(sql, pos)
    } else if (ch === "'") {
      token = readQuoted(sql, pos, pos, 'string', "'", false)
    } else if ((ch === 'E' || ch === 'e') && next === "'") {
      token = readQuoted(sql, pos, pos + 1, 'string', "'", true)
    } else if (ch === '"') {
      token = readQuoted(sql, pos, pos, 'quoted', '"', false)
    } else if (ch === '$' && DOLLAR_TAG.test(sql.slice(pos))) {
      token = readDollarQuoted(sql, pos)
    } else if (WORD_START.test(ch)) {
      token = readWhile(sql, pos, 'word', (c) => WORD_PART.test(c))
    } else if (DIGIT.test(ch)) {
      token = readWhile(sql, pos, 'number', (c) => DIGIT.test(c) || c === '.')
    } else {
      token = { kind: 'punct', text: ch, start: pos, end: pos + 1 }
    }

    tokens.push(token)
    pos = token.end
  }

  return tokens
}

export function isSignificant(token: SqlToken) {
  return token.kind !== 'space' && token.kind !== 'comment'
}

function readWhile(sql: string, start: number, kind: SqlTokenKind, accept: (c: string) => boolean): SqlToken {
  let end = start + 1
  while (end < sql.length && accept(sql[end])) end += 1
  return { kind, text: sql.slice(start, end), start, end }
}

function readBlockComment(sql: string, start: number): SqlToken {
  const close = sql.indexOf('*/', start + 2)
  if (close === -1) {
    return { kind: 'comment', text: sql.slice(start), start, end: sql.length, unterminated: true }
  }
  const end = close + 2
  return { kind: 'comment', text: sql.slice(start, end), start, end }
}

function readQuoted(
  sql: string,
  start: number,
  openAt: number,
  kind: 'string' | 'quoted',
  quote: string,
  backslashEscapes: boolean,
): SqlToken {
  let value = ''
  let pos = openAt + 1
  while (pos < sql.length) {
    const ch = sql[pos]
    if (backslashEscapes && ch === '\\' && pos + 1 < sql.length) {
      value += sql[pos + 1]
      pos += 2
      continue
    }
    if (ch === quote) {
      if (sql[pos + 1] === quote) {
        value += quote
        pos += 2
        continue
      }
      const end = pos + 1
      return { kind, text: sql.slice(start, end), start, end, value }
    }
    value += ch
    pos += 1
  }
  return { kind, text: sql.slice(start), start, end: sql.length, value, unterminated: true }
}

function readDollarQuoted(sql: string, start: number): SqlToken {
  const match = DOLLAR_TAG.exec(sql.slice(start))
  const tag = match ? match[0] : '$$'
  const bodyStart = start + tag.length
  const close = sql.indexOf(tag, bodyStart)
  if (close === -1) {
    return {
      kind: 'string',
      text: sql.slice(start),
      start,
      end: sql.length,
      value: sql.slice(bodyStart),
      unterminated: true,
    }
  }
  const end = close + tag.length
  return { kind: 'string', text: sql.slice(start, end), start, end, value: sql.slice(bodyStart, close) }
}
