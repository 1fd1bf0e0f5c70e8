import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import {
  DEFAULT_MAX_TOOL_ROUNDS,
  MAX_TOOL_ROUNDS_CEILING,
  ROUND_LIMIT_MESSAGE,
  type AssistantTurn,
  type ChatActionRequired,
  type ChatAnswer,
  type ConversationTurn,
  type ToolCallRequest,
  type ToolResult,
  type ToolSpec,
} from '@invoice-agent/shared'
import { toPendingActionView } from '../approvals/approval-followup'
import { ApprovalsService } from '../approvals/approvals.service'
import { throwIfCancelled } from '../common/cancellation'
import { assertConversationIntegrity } from '../common/conversation'
import { readIntEnv, readStringEnv } from '../common/env'
import { AgentError, ToolValidationError, describeError, toErrorBody } from '../common/errors'
import { isRecord } from '../common/records'
import { withSingleRetry } from '../common/retry'
import { ToolsService } from '../tools/tools.service'
import { ChatModel } from './chat-model'
import { DEFAULT_SYSTEM_PROMPT } from './system-prompt'

export interface AgentRunParams {
  conversationId: string
  history: readonly ConversationTurn[]
  userMessage: string
  maxRounds?: number
  signal?: AbortSignal
}

export type AgentRunResult = ChatAnswer | ChatActionRequired

const MALFORMED_INPUT_PREVIEW_CHARS = 200

function failedResult(error: unknown): ToolResult {
  return { success: false, output: null, error: toErrorBody(error), requiresConsent: false }
}

function skippedResult(): ToolResult {
  return {
    success: false,
    output: null,
    error: { kind: 'Skipped', message: 'Not executed: an earlier call in this round is waiting for the user\'s consent' },
    requiresConsent: false,
  }
}

@Injectable()
export class AgentService {
  private readonly logger = new Logger(AgentService.name)
  private readonly systemPrompt: string
  private readonly maxToolRounds: number

  constructor(
    private readonly model: ChatModel,
    private readonly tools: ToolsService,
    private readonly approvals: ApprovalsService,
    config: ConfigService,
  ) {
    this.systemPrompt = readStringEnv(config, 'AGENT_SYSTEM_PROMPT', DEFAULT_SYSTEM_PROMPT)
    this.maxToolRounds = readIntEnv(config, 'AGENT_MAX_TOOL_ROUNDS', DEFAULT_MAX_TOOL_ROUNDS, {
      min: 1,
      max: MAX_TOOL_ROUNDS_CEILING,
    })
  }

  /**
   * Drives the model/tool loop for one user message until the model answers, a tool asks
   * for consent, or the round limit is reached. Results of a round are only visible to the
   * model in the next round.
   */
  async run({ conversationId, history, userMessage, maxRounds, signal }: AgentRunParams): Promise<AgentRunResult> {
    assertConversationIntegrity(history)
    const conversation: ConversationTurn[] = [...history, { role: 'user', content: userMessage }]
    const rounds = Math.max(1, Math.min(maxRounds ?? this.maxToolRounds, MAX_TOOL_ROUNDS_CEILING))
    const tools = await this.tools.describeAll()

    for (let round = 1; round <= rounds; round += 1) {
      throwIfCancelled(signal)
      const completion = await this.completeRound(conversation, tools, signal)

      const assistant: AssistantTurn = {
        role: 'assistant',
        content: completion.text,
        ...(completion.toolCalls.length > 0 ? { toolCalls: completion.toolCalls } : {}),
      }
      conversation.push(assistant)

      if (completion.toolCalls.length === 0) {
        this.logger.log(`Conversation ${conversationId} answered after ${round} round(s)`)
        return { type: 'answer', text: completion.text, conversation }
      }

      const calls = completion.toolCalls
      for (let index = 0; index < calls.length; index += 1) {
        const call = calls[index]
        throwIfCancelled(signal)
        const result = await this.dispatch(call, conversationId, signal)
        conversation.push({ role: 'tool', callId: call.id, toolName: call.name, result })

        if (result.success && result.requiresConsent) {
          const draft = isRecord(result.output) ? result.output : {}
          const action = await this.approvals.open(conversationId, call.name, draft)
          for (const skipped of calls.slice(index + 1)) {
            conversation.push({ role: 'tool', callId: skipped.id, toolName: skipped.name, result: skippedResult() })
          }
          return { type: 'action_required', actionRequired: 'consent', action: toPendingActionView(action), conversation }
        }
      }
    }

    this.logger.warn(`Conversation ${conversationId} hit the limit of ${rounds} tool round(s)`)
    conversation.push({ role: 'assistant', content: ROUND_LIMIT_MESSAGE })
    return {
      type: 'answer',
      text: ROUND_LIMIT_MESSAGE,
      conversation,
      error: { kind: 'RoundLimitExceeded', message: `Stopped after ${rounds} round(s) of tool calls` },
    }
  }

  private async completeRound(
    conversation: readonly ConversationTurn[],
    tools: readonly ToolSpec[],
    signal?: AbortSignal,
  ) {
    try {
      return await withSingleRetry(
        () => this.model.complete({ system: this.systemPrompt, turns: conversation, tools, signal }),
        { label: 'Model call', logger: this.logger, signal },
      )
    } catch (error) {
      if (error instanceof AgentError && error.retryable) {
        throw new AgentError(error.kind, `${error.message}. Please try again.`, { cause: error })
      }
      throw error
    }
  }

  /** Runs one call; every failure except cancellation becomes a failed result the model can read. */
  private async dispatch(call: ToolCallRequest, conversationId: string, signal?: AbortSignal): Promise<ToolResult> {
    if (call.malformedInput !== undefined) {
      const preview = call.malformedInput.slice(0, MALFORMED_INPUT_PREVIEW_CHARS)
      return failedResult(new ToolValidationError([`arguments are not a JSON object: ${preview}`]))
    }

    try {
      return await withSingleRetry(() => this.tools.invoke(call.name, call.input, { conversationId, signal }), {
        label: `Tool ${call.name}`,
        logger: this.logger,
        signal,
      })
    } catch (error) {
      if (error instanceof AgentError && error.kind === 'RequestCancelled') throw error
      if (error instanceof AgentError) {
        this.logger.warn(`Tool ${call.name} failed with ${error.kind}: ${error.message}`)
      } else {
        this.logger.error(`Tool ${call.name} failed unexpectedly: ${describeError(error)}`, error instanceof Error ? error.stack : undefined)
      }
      return failedResult(error)
    }
  }
}
