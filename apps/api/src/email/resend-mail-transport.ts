import { Injectable } from '@nestjs/common'
import { isRecord } from '../common/records'
import { MailProviderError, MailTransport, type MailReceipt, type OutboundEmail } from './mail-transport'

const RESEND_EMAILS_URL = 'https://api.resend.com/emails'

@Injectable()
export class ResendMailTransport extends MailTransport {
  async send(message: OutboundEmail, apiKey: string, signal: AbortSignal): Promise<MailReceipt> {
    const response = await fetch(RESEND_EMAILS_URL, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${apiKey}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        from: message.from,
        to: message.to,
        subject: message.subject,
        text: message.text,
        ...(message.attachments.length > 0 ? { attachments: message.attachments } : {}),
      }),
      signal,
    })

    const payload: unknown = await response.json().catch(() => null)
    if (!response.ok) {
      const detail = isRecord(payload) && typeof payload.message === 'string' ? payload.message : response.statusText
      throw new MailProviderError(response.status, `Resend API error: ${response.status} - ${detail}`)
    }

    const id = isRecord(payload) && typeof payload.id === 'string' ? payload.id : ''
    return { id }
  }
}
