import { TOOL_NAMES } from '@invoice-agent/shared'
import { AgentService } from '../agent/agent.service'
import { ApprovalsService } from '../approvals/approvals.service'
import { InMemoryPendingActionStore } from '../approvals/pending-action.store'
import { ScriptedChatModel, answer, callTools } from '../testing/scripted-chat-model'
import { createToolStack } from '../testing/tool-stack'
import { ChatService } from './chat.service'

const emailCall = {
  id: 'call-email',
  name: TOOL_NAMES.emailConsent,
  input: { to: 'ana@example.com', subject: 'Q3 invoices', body: 'See the export.' },
}

function setup() {
  const stack = createToolStack()
  const approvals = new ApprovalsService(new InMemoryPendingActionStore(stack.config), stack.tools, stack.config)
  const model = new ScriptedChatModel()
  const chat = new ChatService(new AgentService(model, stack.tools, approvals, stack.config), approvals)
  return { ...stack, approvals, model, chat }
}

async function draftEmail(chat: ChatService, model: ScriptedChatModel) {
  model.push(callTools(emailCall))
  const response = await chat.handle({ conversationId: 'c1', history: [], message: 'Email Ana the Q3 invoices' })
  if (response.type !== 'action_required') throw new Error(`expected action_required, got ${response.type}`)
  return response
}

describe('ChatService', () => {
  test('sends only after an explicit approval, and only once', async () => {
    const { chat, model, transport } = setup()
    const pending = await draftEmail(chat, model)
    expect(transport.sent).toHaveLength(0)

    const approveRequest = {
      conversationId: 'c1',
      history: pending.conversation,
      action: { token: pending.action.token, decision: 'approve' as const },
    }
    const resolved = await chat.handle(approveRequest)

    const text = 'I ran `request_email_consent` successfully.\n\nResult:\n'
      + JSON.stringify({ messageId: 'email-1', to: ['ana@example.com'], subject: 'Q3 invoices', attachments: [] }, null, 2)
    expect(resolved).toMatchObject({ type: 'action_resolved', status: 'executed', text, action: { status: 'executed' } })
    expect(resolved.conversation).toEqual([...pending.conversation, { role: 'assistant', content: text }])
    expect(transport.sent).toHaveLength(1)

    await expect(chat.handle(approveRequest)).rejects.toMatchObject({ kind: 'ActionAlreadyExecuted' })
    expect(transport.sent).toHaveLength(1)
  })

  test('rejecting a draft discards it without sending', async () => {
    const { chat, model, transport } = setup()
    const pending = await draftEmail(chat, model)

    const resolved = await chat.handle({
      conversationId: 'c1',
      history: pending.conversation,
      action: { token: pending.action.token, decision: 'reject' },
    })

    expect(resolved).toMatchObject({
      type: 'action_resolved',
      status: 'rejected',
      text: 'Okay, I cancelled `request_email_consent`. Nothing was sent.',
      action: { status: 'rejected', resolution: 'cancelled' },
    })
    expect(transport.sent).toHaveLength(0)
  })

  test('a new message supersedes the open draft', async () => {
    const { chat, model, approvals, transport } = setup()
    const pending = await draftEmail(chat, model)
    model.push(answer('Sure, what would you like instead?'))

    const response = await chat.handle({ conversationId: 'c1', history: pending.conversation, message: 'Actually, wait.' })

    expect(response).toMatchObject({ type: 'answer', supersededActionToken: pending.action.token })
    await expect(approvals.get(pending.action.token)).resolves.toMatchObject({ status: 'rejected', resolution: 'superseded' })
    await expect(
      chat.handle({
        conversationId: 'c1',
        history: pending.conversation,
        action: { token: pending.action.token, decision: 'approve' },
      }),
    ).rejects.toMatchObject({ kind: 'NoPendingAction' })
    expect(transport.sent).toHaveLength(0)
  })

  test('a follow-up with a malformed history leaves the open draft approvable', async () => {
    const { chat, model, approvals, transport } = setup()
    const pending = await draftEmail(chat, model)
    const history = [
      ...pending.conversation,
      {
        role: 'tool' as const,
        callId: 'call-ghost',
        toolName: TOOL_NAMES.sqlQuery,
        result: { success: true, output: null, requiresConsent: false },
      },
    ]

    await expect(chat.handle({ conversationId: 'c1', history, message: 'Any update?' })).rejects.toMatchObject({
      kind: 'ValidationError',
      message: `Malformed conversation history: turn ${pending.conversation.length}: tool result call-ghost does not answer a pending call`,
    })
    await expect(approvals.get(pending.action.token)).resolves.toMatchObject({ status: 'draft' })
    expect(model.requests).toHaveLength(1)

    await chat.handle({
      conversationId: 'c1',
      history: pending.conversation,
      action: { token: pending.action.token, decision: 'approve' },
    })
    expect(transport.sent).toHaveLength(1)
  })

  test('a cancelled follow-up leaves the open draft in place', async () => {
    const { chat, model, approvals } = setup()
    const pending = await draftEmail(chat, model)
    const controller = new AbortController()
    controller.abort()

    await expect(
      chat.handle({ conversationId: 'c1', history: pending.conversation, message: 'Actually, wait.' }, controller.signal),
    ).rejects.toMatchObject({ kind: 'RequestCancelled' })
    await expect(approvals.get(pending.action.token)).resolves.toMatchObject({ status: 'draft' })
  })

  test('requires exactly one of message or action', async () => {
    const { chat } = setup()
    await expect(chat.handle({ conversationId: 'c1', history: [] })).rejects.toMatchObject({
      kind: 'ValidationError',
      message: 'Invalid chat request: exactly one of "message" or "action" is required',
    })
    await expect(
      chat.handle({ conversationId: 'c1', history: [], message: 'hi', action: { token: 't', decision: 'approve' } }),
    ).rejects.toMatchObject({ kind: 'ValidationError' })
  })
})
