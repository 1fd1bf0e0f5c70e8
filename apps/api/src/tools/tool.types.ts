import type { ToolParameter, ToolResult } from '@invoice-agent/shared'

export interface ToolContext {
  conversationId: string
  signal?: AbortSignal
}

export interface ToolDefinition {
  name: string
  displayName: string
  /** Static text, or built from the live schema description each time tools are listed. */
  description: string | ((schemaDescription: string) => string)
  requiresApproval: boolean
  parameters: Record<string, ToolParameter>
}

export interface ToolHandler {
  execute(args: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult>
  /** Second phase of a tool that requires approval; runs only after consent. */
  commit?(draft: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult>
}
