import { AgentError } from '../common/errors'
import { assertReadOnlyQuery } from './read-only-guard'

function kindOf(run: () => unknown) {
  try {
    run()
  } catch (error) {
    return error instanceof AgentError ? error.kind : 'unexpected'
  }
  return 'none'
}

describe('assertReadOnlyQuery', () => {
  test('strips a single trailing semicolon', () => {
    expect(assertReadOnlyQuery('SELECT 1;  ')).toBe('SELECT 1')
    expect(assertReadOnlyQuery('SELECT 1; -- done')).toBe('SELECT 1')
  })

  test('accepts common table expressions after a leading comment', () => {
    const sql = '-- totals\nWITH x AS (SELECT 1 AS n) SELECT n FROM x'
    expect(assertReadOnlyQuery(`  ${sql}\n`)).toBe(sql)
  })

  test('ignores semicolons inside literals', () => {
    expect(assertReadOnlyQuery("SELECT ';' AS semi")).toBe("SELECT ';' AS semi")
  })

  test.each([
    ['an empty query', '  -- nothing\n'],
    ['a delete', 'DELETE FROM invoices'],
    ['an update hidden behind a comment', '/* SELECT */ UPDATE invoices SET total = 0'],
    ['stacked statements', 'SELECT 1; DROP TABLE invoices'],
    ['two trailing semicolons', 'SELECT 1;;'],
  ])('rejects %s', (_label, sql) => {
    expect(kindOf(() => assertReadOnlyQuery(sql))).toBe('ValidationError')
  })
})
