import type { ToolResult } from './tool'

export interface ToolCallRequest {
  id: string
  name: string
  input: Record<string, unknown>
  /** Raw argument text the provider could not parse as a JSON object. */
  malformedInput?: string
}

export interface UserTurn {
  role: 'user'
  content: string
}

export interface AssistantTurn {
  role: 'assistant'
  content: string
  toolCalls?: ToolCallRequest[]
}

export interface ToolResultTurn {
  role: 'tool'
  callId: string
  toolName: string
  result: ToolResult
}

export type ConversationTurn = UserTurn | AssistantTurn | ToolResultTurn
