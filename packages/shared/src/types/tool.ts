import type { ErrorBody } from './errors'

export type ToolParameterType = 'string' | 'integer' | 'number' | 'boolean' | 'array' | 'object'

export interface ToolParameter {
  type: ToolParameterType
  required: boolean
  description: string
}

export interface ToolSpec {
  name: string
  displayName: string
  description: string
  requiresApproval: boolean
  parameters: Record<string, ToolParameter>
}

export interface ToolResult {
  success: boolean
  output: unknown
  error?: ErrorBody
  /** Set when the tool produced a draft that must be approved before it takes effect. */
  requiresConsent: boolean
}
