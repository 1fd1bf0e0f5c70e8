import { RewriteError } from '../common/errors'
import { evaluateSimilaritySql } from '../testing/similarity-sql-evaluator'
import { buildSimilarityCase, findSimilarityExpressions, rewriteSimilarity } from './similarity-rewriter'
import { scoreSimilarity } from './similarity-tiers'

const SUFFIXES = "'(INCORPORATED|CORPORATION|LIMITED|INC|LLC|LTD|CORP|GMBH|PLC)$'"
const upper = (expression: string) => `upper(${expression} COLLATE "C")`
const norm = (expression: string) =>
  `regexp_replace(regexp_replace(${upper(expression)}, '[^A-Z0-9]+', '', 'g'), ${SUFFIXES}, '', 'g')`

describe('buildSimilarityCase', () => {
  test('emits every tier for an ordinary term', () => {
    const position = `strpos(${upper('name::text')}, ${upper("'Acme'")})`
    expect(buildSimilarityCase('name', 'Acme')).toBe(
      '(CASE '
        + `WHEN ${upper('name::text')} = ${upper("'Acme'")} THEN 100 `
        + `WHEN ${position} = 1 THEN 90 `
        + `WHEN ${position} > 1 THEN GREATEST(80, 85 - (${position} - 2) * 2) `
        + `WHEN ${norm('name::text')} = ${norm("'Acme'")} THEN 75 `
        + "WHEN soundex(name::text) = soundex('Acme') THEN 70 "
        + `WHEN strpos(${norm('name::text')}, ${norm("'Acme'")}) > 0 THEN 65 `
        + 'ELSE 0 END)',
    )
  })

  test('quotes the term and doubles embedded quotes', () => {
    expect(buildSimilarityCase('vendor', "O'Brien")).toContain("soundex(vendor::text) = soundex('O''Brien') THEN 70")
  })

  test('omits the normalized tiers when the term is only a legal suffix', () => {
    const sql = buildSimilarityCase('v.name', 'Inc.')
    expect(sql).not.toContain('THEN 75')
    expect(sql).not.toContain('THEN 65')
    expect(sql).toContain("WHEN soundex(v.name::text) = soundex('Inc.') THEN 70")
  })

  test('omits the phonetic tier when the term has no letters', () => {
    const sql = buildSimilarityCase('invoice_number', '2024-001')
    expect(sql).not.toContain('soundex')
    expect(sql).toContain('THEN 75')
  })
})

describe('rewritten SQL scores', () => {
  const scoreInSql = (value: string, term: string) => {
    const { sql } = rewriteSimilarity(`SIMILARITY(vendor_name, '${term.replace(/'/g, "''")}')`)
    return evaluateSimilaritySql(sql, value)
  }

  test('ranks exact, prefix, normalized, phonetic and unrelated matches in order', () => {
    expect(scoreInSql('Acme Corp', 'Acme Corp')).toBe(100)
    expect(scoreInSql('Acme Corp', 'Acme')).toBe(90)
    expect(scoreInSql('Acme Corp', 'AcmeCorp')).toBe(75)
    expect(scoreInSql('Acme Corp', 'Akme Korp')).toBe(70)
    expect(scoreInSql('Acme Corp', 'Globex')).toBe(0)
  })

  test('ranks a vendor that differs by spacing and suffix above an unrelated one', () => {
    expect(scoreInSql('GlobalTech Inc.', 'Global Tech')).toBe(75)
    expect(scoreInSql('Initech LLC', 'Global Tech')).toBe(0)
  })

  test('scores a padded term as the trimmed term', () => {
    const { sql } = rewriteSimilarity("SELECT SIMILARITY(name, ' acme ') AS score FROM vendors")
    expect(sql).toContain(`${upper('name::text')} = ${upper("'acme'")} THEN 100`)
    expect(sql).not.toContain("' acme '")
    expect(scoreInSql('ACME', ' acme ')).toBe(100)
    expect(scoreInSql('Acme Holdings', ' acme ')).toBe(90)
  })

  test('keeps non-ASCII letters as they are when upper-casing', () => {
    expect(scoreInSql('STRAßE', 'straße')).toBe(100)
    expect(scoreInSql('Strasse', 'straße')).toBe(0)
  })

  const values = [
    'Acme Corp',
    'ACME',
    'The Acme Corp',
    'XYAcme',
    'GlobalTech Inc.',
    'Initech LLC',
    'Acme Widgets Holdings',
    "O'Brien Supply",
    'Müller GmbH',
    'Strasse',
    '2024-001',
  ]
  const terms = ['Acme', ' acme ', 'AcmeCorp', 'Akme Korp', 'Global Tech', 'widgets-holdings', "o'brien", 'Müller', 'straße', '001', 'Inc.']

  test.each(terms)('agrees with the in-process scorer for %p', (term) => {
    for (const value of values) {
      expect([value, scoreInSql(value, term)]).toEqual([value, scoreSimilarity(value, term.trim())])
    }
  })
})

describe('findSimilarityExpressions', () => {
  test('reports offsets, column text and decoded term', () => {
    const sql = "SELECT * FROM invoices i WHERE similarity (i.\"Vendor Name\", 'O''Brien') > 70"
    const [expression] = findSimilarityExpressions(sql)
    expect(expression).toEqual({
      start: sql.indexOf('similarity'),
      end: sql.indexOf(') > 70') + 1,
      column: 'i."Vendor Name"',
      term: "O'Brien",
      literal: "'O''Brien'",
    })
  })

  test('keeps parentheses and commas inside the term literal', () => {
    const [expression] = findSimilarityExpressions("SELECT SIMILARITY(vendor, 'Smith, Jones (UK)') AS s")
    expect(expression.term).toBe('Smith, Jones (UK)')
  })

  test.each([
    ['string literals', "SELECT 'SIMILARITY(a, ''b'')' AS s"],
    ['line comments', "-- SIMILARITY(a, 'b')\nSELECT 1"],
    ['block comments', "SELECT /* SIMILARITY(a, 'b') */ 1"],
    ['quoted identifiers', 'SELECT "SIMILARITY"(a) FROM t'],
    ['qualified function names', "SELECT ext.SIMILARITY(a, 'b') FROM t"],
    ['longer identifiers', "SELECT my_similarity(a, 'b') FROM t"],
    ['a column that is not called', 'SELECT similarity FROM scores'],
  ])('ignores the keyword in %s', (_label, sql) => {
    expect(findSimilarityExpressions(sql)).toEqual([])
  })

  test.each([
    ['one argument', "SELECT SIMILARITY(vendor_name) FROM t"],
    ['three arguments', "SELECT SIMILARITY(vendor_name, 'a', 'b') FROM t"],
    ['an expression as the column', "SELECT SIMILARITY(upper(vendor_name), 'a') FROM t"],
    ['a column as the term', 'SELECT SIMILARITY(vendor_name, buyer_name) FROM t'],
    ['a concatenated term', "SELECT SIMILARITY(vendor_name, 'a' || 'b') FROM t"],
    ['an empty term', "SELECT SIMILARITY(vendor_name, '   ') FROM t"],
    ['a missing closing parenthesis', "SELECT SIMILARITY(vendor_name, 'Acme' FROM t"],
    ['an unterminated term', "SELECT SIMILARITY(vendor_name, 'Acme) FROM t"],
  ])('rejects %s', (_label, sql) => {
    expect(() => findSimilarityExpressions(sql)).toThrow(RewriteError)
  })
})

describe('rewriteSimilarity', () => {
  test('replaces the call and keeps the rest of the statement verbatim', () => {
    const sql = "SELECT vendor_name\n  FROM Invoices WHERE SIMILARITY(vendor_name, 'Acme') >= 75 ORDER BY 1"
    const result = rewriteSimilarity(sql)
    expect(result.occurrences).toBe(1)
    expect(result.sql).toBe(
      "SELECT vendor_name\n  FROM Invoices WHERE "
        + buildSimilarityCase('vendor_name', 'Acme')
        + ' >= 75 ORDER BY 1',
    )
  })

  test('rewrites every occurrence', () => {
    const sql = "SELECT SIMILARITY(a.vendor, 'Acme') AS s1, SIMILARITY(b.vendor, 'Globex') AS s2 FROM a, b"
    const result = rewriteSimilarity(sql)
    expect(result.occurrences).toBe(2)
    expect(result.sql).toBe(
      'SELECT '
        + buildSimilarityCase('a.vendor', 'Acme')
        + ' AS s1, '
        + buildSimilarityCase('b.vendor', 'Globex')
        + ' AS s2 FROM a, b',
    )
  })

  test('returns the input untouched when there is nothing to rewrite', () => {
    const sql = 'SELECT COUNT(*) FROM invoices'
    expect(rewriteSimilarity(sql)).toEqual({ sql, occurrences: 0 })
  })

  test('is idempotent', () => {
    const sql = "SELECT * FROM contracts WHERE SIMILARITY(similarity, 'Acme') > 70 AND similarity(vendor, 'x') > 0"
    const once = rewriteSimilarity(sql)
    const twice = rewriteSimilarity(once.sql)
    expect(twice.sql).toBe(once.sql)
    expect(twice.occurrences).toBe(0)
  })
})
