import type { AssistantTurn, ConversationTurn } from '@invoice-agent/shared'
import { ToolValidationError } from './errors'

/**
 * Checks that every tool turn answers a call requested by the assistant turn right before
 * it, that no call is answered twice, and that no requested call is left unanswered when
 * the conversation moves on.
 */
export function assertConversationIntegrity(turns: readonly ConversationTurn[]) {
  const problems: string[] = []
  let open: Map<string, string> | null = null
  let answered = new Set<string>()

  const closeRound = (index: number) => {
    if (!open) return
    for (const callId of open.keys()) {
      if (!answered.has(callId)) problems.push(`turn ${index}: tool call ${callId} has no result`)
    }
    open = null
  }

  turns.forEach((turn, index) => {
    if (turn.role === 'tool') {
      const expectedName = open?.get(turn.callId)
      if (expectedName == null) {
        problems.push(`turn ${index}: tool result ${turn.callId} does not answer a pending call`)
      } else if (answered.has(turn.callId)) {
        problems.push(`turn ${index}: tool call ${turn.callId} is answered more than once`)
      } else if (expectedName !== turn.toolName) {
        problems.push(`turn ${index}: tool result ${turn.callId} names ${turn.toolName}, expected ${expectedName}`)
      } else {
        answered.add(turn.callId)
      }
      return
    }

    closeRound(index)
    if (turn.role === 'assistant' && turn.toolCalls?.length) {
      open = collectCalls(turn, index, problems)
      answered = new Set()
    }
  })
  closeRound(turns.length)

  if (problems.length > 0) throw new ToolValidationError(problems, 'Malformed conversation history')
}

function collectCalls(turn: AssistantTurn, index: number, problems: string[]) {
  const calls = new Map<string, string>()
  for (const call of turn.toolCalls ?? []) {
    if (calls.has(call.id)) {
      problems.push(`turn ${index}: tool call id ${call.id} is repeated`)
      continue
    }
    calls.set(call.id, call.name)
  }
  return calls
}
