import { Injectable, Logger } from '@nestjs/common'
import type { ChatRequest, ChatResponse, ConversationTurn } from '@invoice-agent/shared'
import { AgentService } from '../agent/agent.service'
import { buildExecutedFollowup, buildRejectedFollowup, toPendingActionView } from '../approvals/approval-followup'
import { ApprovalsService } from '../approvals/approvals.service'
import { throwIfCancelled } from '../common/cancellation'
import { assertConversationIntegrity } from '../common/conversation'
import { ToolValidationError } from '../common/errors'

@Injectable()
export class ChatService {
  private readonly logger = new Logger(ChatService.name)

  constructor(
    private readonly agent: AgentService,
    private readonly approvals: ApprovalsService,
  ) {}

  /** A new message runs the agent; an action resolves the pending consent request instead. */
  async handle(request: ChatRequest, signal?: AbortSignal): Promise<ChatResponse> {
    const { conversationId, history, message, action } = request
    if ((message === undefined) === (action === undefined)) {
      throw new ToolValidationError(['exactly one of "message" or "action" is required'], 'Invalid chat request')
    }

    assertConversationIntegrity(history)
    if (action) {
      return action.decision === 'approve'
        ? this.approve(conversationId, history, action.token)
        : this.reject(conversationId, history, action.token)
    }

    // Only a request that is going to run may discard the open draft.
    throwIfCancelled(signal)
    const superseded = await this.approvals.supersedeOpen(conversationId)
    const result = await this.agent.run({ conversationId, history, userMessage: message ?? '', signal })
    if (superseded && result.type === 'answer') return { ...result, supersededActionToken: superseded.token }
    return result
  }

  private async approve(conversationId: string, history: ConversationTurn[], token: string): Promise<ChatResponse> {
    const { action, result } = await this.approvals.approve(token, conversationId)
    const text = buildExecutedFollowup(action.toolName, result)
    this.logger.log(`Conversation ${conversationId} approved action ${token}`)
    return {
      type: 'action_resolved',
      status: 'executed',
      text,
      action: toPendingActionView(action),
      conversation: [...history, { role: 'assistant', content: text }],
    }
  }

  private async reject(conversationId: string, history: ConversationTurn[], token: string): Promise<ChatResponse> {
    const action = await this.approvals.reject(token, conversationId)
    const text = buildRejectedFollowup(action.toolName)
    return {
      type: 'action_resolved',
      status: 'rejected',
      text,
      action: toPendingActionView(action),
      conversation: [...history, { role: 'assistant', content: text }],
    }
  }
}
