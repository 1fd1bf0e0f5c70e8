import type { ToolParameter, ToolParameterType } from '@invoice-agent/shared'
import { ToolValidationError } from '../common/errors'
import { isRecord } from '../common/records'

function matchesType(value: unknown, type: ToolParameterType) {
  switch (type) {
    case 'string':
      return typeof value === 'string'
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value)
    case 'number':
      return typeof value === 'number' && Number.isFinite(value)
    case 'boolean':
      return typeof value === 'boolean'
    case 'array':
      return Array.isArray(value)
    case 'object':
      return isRecord(value)
  }
}

/**
 * Checks `input` against a tool's parameters and returns it without null-valued optional
 * entries. Every problem is reported at once.
 */
export function validateToolArguments(
  parameters: Record<string, ToolParameter>,
  input: unknown,
): Record<string, unknown> {
  if (!isRecord(input)) throw new ToolValidationError(['arguments must be a JSON object'])

  const problems: string[] = []
  const args: Record<string, unknown> = {}

  for (const [name, parameter] of Object.entries(parameters)) {
    const value = input[name]
    if (value == null) {
      if (parameter.required) problems.push(`missing required parameter "${name}"`)
      continue
    }
    if (!matchesType(value, parameter.type)) {
      problems.push(`parameter "${name}" must be ${parameter.type === 'integer' ? 'an' : 'a'} ${parameter.type}`)
      continue
    }
    args[name] = value
  }

  for (const name of Object.keys(input)) {
    if (!(name in parameters)) problems.push(`unexpected parameter "${name}"`)
  }

  if (problems.length > 0) throw new ToolValidationError(problems)
  return args
}

export function stringArg(args: Record<string, unknown>, name: string) {
  const value = args[name]
  if (typeof value !== 'string' || !value.trim()) {
    throw new ToolValidationError([`parameter "${name}" must be a non-empty string`])
  }
  return value.trim()
}

export function optionalStringArg(args: Record<string, unknown>, name: string) {
  const value = args[name]
  if (typeof value !== 'string') return undefined
  return value.trim() || undefined
}

export function optionalIntegerArg(args: Record<string, unknown>, name: string) {
  const value = args[name]
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined
}
