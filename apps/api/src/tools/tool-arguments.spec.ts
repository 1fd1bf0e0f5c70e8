import type { ToolParameter } from '@invoice-agent/shared'
import { ToolValidationError } from '../common/errors'
import { validateToolArguments } from './tool-arguments'

const parameters: Record<string, ToolParameter> = {
  sql_query: { type: 'string', required: true, description: 'query' },
  expiry_minutes: { type: 'integer', required: false, description: 'expiry' },
  attachments: { type: 'array', required: false, description: 'files' },
}

function problemsOf(input: unknown) {
  try {
    validateToolArguments(parameters, input)
  } catch (error) {
    if (error instanceof ToolValidationError) return error.problems
    throw error
  }
  return []
}

describe('validateToolArguments', () => {
  test('passes valid arguments through and drops null optionals', () => {
    expect(validateToolArguments(parameters, { sql_query: 'SELECT 1', expiry_minutes: 15, attachments: null })).toEqual({
      sql_query: 'SELECT 1',
      expiry_minutes: 15,
    })
  })

  test('reports every problem at once', () => {
    expect(problemsOf({ expiry_minutes: 1.5, attachments: 'a.csv', verbose: true })).toEqual([
      'missing required parameter "sql_query"',
      'parameter "expiry_minutes" must be an integer',
      'parameter "attachments" must be a array',
      'unexpected parameter "verbose"',
    ])
  })

  test('rejects input that is not an object', () => {
    expect(problemsOf(['SELECT 1'])).toEqual(['arguments must be a JSON object'])
    expect(problemsOf(null)).toEqual(['arguments must be a JSON object'])
  })
})
