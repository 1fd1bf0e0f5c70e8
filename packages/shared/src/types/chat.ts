import type { ConversationTurn } from './conversation'
import type { PendingActionView } from './approval'
import type { ErrorBody } from './errors'

export type ConsentDecision = 'approve' | 'reject'

export interface ChatRequest {
  conversationId: string
  history: ConversationTurn[]
  message?: string
  action?: {
    token: string
    decision: ConsentDecision
  }
}

export interface ChatAnswer {
  type: 'answer'
  text: string
  conversation: ConversationTurn[]
  error?: ErrorBody
  supersededActionToken?: string
}

export interface ChatActionRequired {
  type: 'action_required'
  actionRequired: 'consent'
  action: PendingActionView
  conversation: ConversationTurn[]
}

export interface ChatActionResolved {
  type: 'action_resolved'
  status: 'executed' | 'rejected'
  text: string
  action: PendingActionView
  conversation: ConversationTurn[]
}

export type ChatResponse = ChatAnswer | ChatActionRequired | ChatActionResolved
