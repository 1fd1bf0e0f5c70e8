import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import Anthropic from '@anthropic-ai/sdk'
import OpenAI from 'openai'
import type { ChatCompletionMessageParam, ChatCompletionTool } from 'openai/resources/chat/completions'
import { LLM_MODELS, type ConversationTurn, type LLMProvider, type ToolCallRequest } from '@invoice-agent/shared'
import { readIntEnv, readStringEnv } from '../common/env'
import {
  AgentError,
  RequestCancelledError,
  UpstreamTimeoutError,
  UpstreamUnavailableError,
  describeError,
} from '../common/errors'
import { isRecord } from '../common/records'
import { withTimeout } from '../common/timeout'
import { ChatModel, type ChatCompletion, type ChatCompletionRequest } from './chat-model'
import { renderToolResult, toInputSchema } from './tool-wire'

const SUPPORTED_PROVIDERS: readonly LLMProvider[] = ['anthropic', 'openai']

const PROVIDER_LABELS: Record<LLMProvider, string> = {
  anthropic: 'Anthropic',
  openai: 'OpenAI',
}

const PROVIDER_ENV_VARS: Record<LLMProvider, string> = {
  anthropic: 'ANTHROPIC_API_KEY',
  openai: 'OPENAI_API_KEY',
}

// the Messages API refuses empty assistant turns
const EMPTY_ASSISTANT_TEXT = '(no text)'

type AnthropicBlocks = Exclude<Anthropic.MessageParam['content'], string>

function isSupportedProvider(value: string): value is LLMProvider {
  return SUPPORTED_PROVIDERS.some((provider) => provider === value)
}

function toCallRequest(id: string, name: string, input: unknown, raw?: string): ToolCallRequest {
  if (isRecord(input)) return { id, name, input }
  return { id, name, input: {}, malformedInput: raw ?? String(JSON.stringify(input)) }
}

function parseArguments(id: string, name: string, raw: string): ToolCallRequest {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw.trim() || '{}')
  } catch {
    return { id, name, input: {}, malformedInput: raw }
  }
  return toCallRequest(id, name, parsed, raw)
}

/** Chat model backed by Anthropic or OpenAI, with native tool calling on both. */
@Injectable()
export class LLMService extends ChatModel {
  private readonly logger = new Logger(LLMService.name)
  private readonly provider: LLMProvider
  private readonly model: string
  private readonly maxTokens: number
  private readonly timeoutMs: number
  private readonly toolResultMaxChars: number
  private readonly apiKeys: Record<LLMProvider, string | undefined>
  private anthropicClient?: Anthropic
  private openaiClient?: OpenAI

  constructor(config: ConfigService) {
    super()
    const configured = readStringEnv(config, 'DEFAULT_LLM_PROVIDER', 'anthropic').toLowerCase()
    this.provider = isSupportedProvider(configured) ? configured : 'anthropic'
    this.model = readStringEnv(config, 'LLM_MODEL', LLM_MODELS[this.provider])
    this.maxTokens = readIntEnv(config, 'LLM_MAX_TOKENS', 4096, { min: 256, max: 32_000 })
    this.timeoutMs = readIntEnv(config, 'LLM_TIMEOUT_MS', 60_000, { min: 1_000, max: 600_000 })
    this.toolResultMaxChars = readIntEnv(config, 'TOOL_RESULT_MAX_CHARS', 8_000, { min: 500, max: 100_000 })
    this.apiKeys = {
      anthropic: readStringEnv(config, PROVIDER_ENV_VARS.anthropic),
      openai: readStringEnv(config, PROVIDER_ENV_VARS.openai),
    }
  }

  async complete(request: ChatCompletionRequest): Promise<ChatCompletion> {
    try {
      return await withTimeout(
        `${PROVIDER_LABELS[this.provider]} model`,
        this.timeoutMs,
        (signal) => (this.provider === 'anthropic' ? this.completeAnthropic(request, signal) : this.completeOpenAI(request, signal)),
        request.signal,
      )
    } catch (error) {
      throw this.toAgentError(error)
    }
  }

  private async completeAnthropic(request: ChatCompletionRequest, signal: AbortSignal): Promise<ChatCompletion> {
    const response = await this.anthropic().messages.create(
      {
        model: this.model,
        max_tokens: this.maxTokens,
        system: request.system,
        messages: this.toAnthropicMessages(request.turns),
        tools: request.tools.map((tool) => ({
          name: tool.name,
          description: tool.description,
          input_schema: toInputSchema(tool),
        })),
      },
      { signal },
    )

    const text = response.content
      .flatMap((block) => (block.type === 'text' ? [block.text] : []))
      .join('\n')
      .trim()
    const toolCalls = response.content.flatMap((block) =>
      block.type === 'tool_use' ? [toCallRequest(block.id, block.name, block.input)] : [],
    )
    return { text, toolCalls }
  }

  private async completeOpenAI(request: ChatCompletionRequest, signal: AbortSignal): Promise<ChatCompletion> {
    const tools: ChatCompletionTool[] = request.tools.map((tool) => ({
      type: 'function' as const,
      function: { name: tool.name, description: tool.description, parameters: toInputSchema(tool) },
    }))
    const response = await this.openai().chat.completions.create(
      {
        model: this.model,
        max_tokens: this.maxTokens,
        messages: [{ role: 'system', content: request.system }, ...this.toOpenAIMessages(request.turns)],
        ...(tools.length > 0 ? { tools } : {}),
      },
      { signal },
    )

    const message = response.choices[0]?.message
    if (!message) throw new UpstreamUnavailableError('The language model returned no choices')
    return {
      text: (message.content ?? '').trim(),
      toolCalls: (message.tool_calls ?? []).map((call) => parseArguments(call.id, call.function.name, call.function.arguments)),
    }
  }

  private toAnthropicMessages(turns: readonly ConversationTurn[]): Anthropic.MessageParam[] {
    const messages: Anthropic.MessageParam[] = []
    // consecutive tool results travel together in one user message
    const push = (role: 'user' | 'assistant', blocks: AnthropicBlocks) => {
      const last = messages[messages.length - 1]
      if (last && last.role === role && Array.isArray(last.content)) {
        last.content.push(...blocks)
        return
      }
      messages.push({ role, content: blocks })
    }

    for (const turn of turns) {
      if (turn.role === 'user') {
        push('user', [{ type: 'text', text: turn.content }])
      } else if (turn.role === 'assistant') {
        const blocks: AnthropicBlocks = []
        if (turn.content.trim()) blocks.push({ type: 'text', text: turn.content })
        for (const call of turn.toolCalls ?? []) {
          blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: call.input })
        }
        if (blocks.length === 0) blocks.push({ type: 'text', text: EMPTY_ASSISTANT_TEXT })
        push('assistant', blocks)
      } else {
        push('user', [
          {
            type: 'tool_result',
            tool_use_id: turn.callId,
            content: renderToolResult(turn.result, this.toolResultMaxChars),
            is_error: !turn.result.success,
          },
        ])
      }
    }
    return messages
  }

  private toOpenAIMessages(turns: readonly ConversationTurn[]): ChatCompletionMessageParam[] {
    return turns.map((turn): ChatCompletionMessageParam => {
      if (turn.role === 'user') return { role: 'user', content: turn.content }
      if (turn.role === 'tool') {
        return {
          role: 'tool',
          tool_call_id: turn.callId,
          content: renderToolResult(turn.result, this.toolResultMaxChars),
        }
      }
      const calls = turn.toolCalls ?? []
      if (calls.length === 0) return { role: 'assistant', content: turn.content }
      return {
        role: 'assistant',
        content: turn.content || null,
        tool_calls: calls.map((call) => ({
          id: call.id,
          type: 'function' as const,
          function: { name: call.name, arguments: call.malformedInput ?? JSON.stringify(call.input) },
        })),
      }
    })
  }

  private anthropic() {
    this.anthropicClient ??= new Anthropic({ apiKey: this.resolveApiKey('anthropic'), maxRetries: 0, timeout: this.timeoutMs })
    return this.anthropicClient
  }

  private openai() {
    this.openaiClient ??= new OpenAI({ apiKey: this.resolveApiKey('openai'), maxRetries: 0, timeout: this.timeoutMs })
    return this.openaiClient
  }

  private resolveApiKey(provider: LLMProvider) {
    const key = this.apiKeys[provider]
    if (!key || this.isPlaceholderKey(key)) {
      throw new AgentError(
        'InternalError',
        `${PROVIDER_LABELS[provider]} API key is not configured. Set ${PROVIDER_ENV_VARS[provider]} in apps/api/.env.`,
      )
    }
    return key
  }

  private isPlaceholderKey(value: string) {
    const normalized = value.trim().toLowerCase()
    if (!normalized) return true
    if (normalized === 'not-set') return true
    if (normalized === 'changeme' || normalized === 'change-me') return true
    if (normalized.includes('...')) return true
    return false
  }

  private toAgentError(error: unknown): AgentError {
    if (error instanceof AgentError) return error
    if (error instanceof Anthropic.APIUserAbortError || error instanceof OpenAI.APIUserAbortError) {
      return new RequestCancelledError()
    }
    if (error instanceof Anthropic.APIConnectionTimeoutError || error instanceof OpenAI.APIConnectionTimeoutError) {
      return new UpstreamTimeoutError('The language model did not respond in time')
    }
    if (error instanceof Anthropic.APIError || error instanceof OpenAI.APIError) {
      const { status } = error
      if (status === 408) return new UpstreamTimeoutError('The language model did not respond in time')
      if (status == null || status === 429 || status >= 500) {
        this.logger.warn(`Model call failed (${status ?? 'no response'}): ${error.message}`)
        return new UpstreamUnavailableError('The language model is unavailable', { cause: error })
      }
      this.logger.error(`Model rejected the request (HTTP ${status}): ${error.message}`)
      return new AgentError('InternalError', `The language model rejected the request (HTTP ${status})`, { cause: error })
    }
    this.logger.warn(`Model call failed: ${describeError(error)}`)
    return new UpstreamUnavailableError('The language model is unreachable', { cause: error })
  }
}
