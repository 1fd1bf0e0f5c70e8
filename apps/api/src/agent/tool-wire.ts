import type { ToolParameter, ToolResult, ToolSpec } from '@invoice-agent/shared'

export type ToolInputSchema = {
  type: 'object'
  properties: Record<string, Record<string, unknown>>
  required: string[]
  additionalProperties: false
}

function parameterSchema(parameter: ToolParameter): Record<string, unknown> {
  const schema: Record<string, unknown> = { type: parameter.type, description: parameter.description }
  if (parameter.type === 'array') schema.items = {}
  return schema
}

/** JSON Schema for a tool's arguments, as both providers expect it. */
export function toInputSchema(spec: ToolSpec): ToolInputSchema {
  const properties: Record<string, Record<string, unknown>> = {}
  const required: string[] = []
  for (const [name, parameter] of Object.entries(spec.parameters)) {
    properties[name] = parameterSchema(parameter)
    if (parameter.required) required.push(name)
  }
  return { type: 'object', properties, required, additionalProperties: false }
}

/** Text the model reads for a tool result, clipped to `maxChars`. */
export function renderToolResult(result: ToolResult, maxChars: number) {
  const payload = result.success
    ? { success: true, output: result.output ?? null }
    : { success: false, error: result.error ?? { kind: 'InternalError', message: 'Tool failed' } }
  const json = JSON.stringify(payload)
  return json.length > maxChars ? `${json.slice(0, maxChars)}... [truncated]` : json
}
