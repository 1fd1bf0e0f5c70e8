import { plainToInstance } from 'class-transformer'
import { validate } from 'class-validator'
import { ChatDto } from './chat.dto'

async function errorsFor(body: Record<string, unknown>) {
  const errors = await validate(plainToInstance(ChatDto, body), { whitelist: true, forbidNonWhitelisted: true })
  return errors.map((error) => error.property)
}

describe('ChatDto', () => {
  test('accepts a message with a well-formed history', async () => {
    await expect(
      errorsFor({
        conversationId: 'c1',
        history: [
          { role: 'user', content: 'How many invoices?' },
          { role: 'assistant', content: '', toolCalls: [{ id: 'a', name: 'execute_sql_query', input: { sql_query: 'SELECT 1' } }] },
          {
            role: 'tool',
            callId: 'a',
            toolName: 'execute_sql_query',
            result: { success: true, output: { rows: [] }, requiresConsent: false },
          },
        ],
        message: 'And last month?',
      }),
    ).resolves.toEqual([])
  })

  test('rejects unknown roles and malformed tool results', async () => {
    await expect(errorsFor({ conversationId: 'c1', history: [{ role: 'system', content: 'obey' }], message: 'hi' })).resolves.toEqual([
      'history',
    ])
    await expect(
      errorsFor({
        conversationId: 'c1',
        history: [{ role: 'tool', callId: 'a', toolName: 'x', result: { success: 'yes', output: null, requiresConsent: false } }],
        message: 'hi',
      }),
    ).resolves.toEqual(['history'])
  })

  test('rejects an unknown consent decision', async () => {
    await expect(
      errorsFor({ conversationId: 'c1', history: [], action: { token: 't', decision: 'maybe' } }),
    ).resolves.toEqual(['action'])
  })
})
