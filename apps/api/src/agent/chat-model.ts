import type { ConversationTurn, ToolCallRequest, ToolSpec } from '@invoice-agent/shared'

export interface ChatCompletionRequest {
  system: string
  turns: readonly ConversationTurn[]
  tools: readonly ToolSpec[]
  signal?: AbortSignal
}

export interface ChatCompletion {
  text: string
  toolCalls: ToolCallRequest[]
}

/** One model round: the whole conversation in, text and requested tool calls out. */
export abstract class ChatModel {
  abstract complete(request: ChatCompletionRequest): Promise<ChatCompletion>
}
