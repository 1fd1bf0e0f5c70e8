import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import type { EmailDraft } from '@invoice-agent/shared'
import { readIntEnv, readStringEnv } from '../common/env'
import { AgentError, DeliveryFailedError, UpstreamUnavailableError, describeError } from '../common/errors'
import { withTimeout } from '../common/timeout'
import { MailProviderError, MailTransport, type MailReceipt } from './mail-transport'

@Injectable()
export class EmailService {
  private readonly logger = new Logger(EmailService.name)

  constructor(
    private readonly transport: MailTransport,
    private readonly config: ConfigService,
  ) {}

  /** Delivers an approved draft. Credentials are resolved here, at send time, and nowhere else. */
  async send(draft: EmailDraft, signal?: AbortSignal): Promise<MailReceipt> {
    const apiKey = readStringEnv(this.config, 'RESEND_API_KEY')
    const fromAddress = readStringEnv(this.config, 'EMAIL_FROM_ADDRESS')
    if (!apiKey || !fromAddress) {
      throw new DeliveryFailedError('Email delivery is not configured. Set RESEND_API_KEY and EMAIL_FROM_ADDRESS.')
    }
    const fromName = readStringEnv(this.config, 'EMAIL_FROM_NAME', 'Invoice Agent')
    const timeoutMs = readIntEnv(this.config, 'EMAIL_TIMEOUT_MS', 15_000, { min: 1_000, max: 120_000 })

    try {
      const receipt = await withTimeout(
        'Email delivery',
        timeoutMs,
        (abort) =>
          this.transport.send(
            {
              from: `${fromName} <${fromAddress}>`,
              to: draft.to,
              subject: draft.subject,
              text: draft.body,
              attachments: draft.attachments.map((attachment) => ({
                filename: attachment.filename,
                path: attachment.url,
              })),
            },
            apiKey,
            abort,
          ),
        signal,
      )
      this.logger.log(`Email ${receipt.id || '(no id)'} sent to ${draft.to.length} recipient(s)`)
      return receipt
    } catch (error) {
      throw this.toAgentError(error)
    }
  }

  private toAgentError(error: unknown): AgentError {
    if (error instanceof AgentError) return error
    if (error instanceof MailProviderError) {
      if (error.status === 429 || error.status >= 500) {
        return new UpstreamUnavailableError(error.message, { cause: error })
      }
      return new DeliveryFailedError(error.message)
    }
    this.logger.warn(`Email provider unreachable: ${describeError(error)}`)
    return new UpstreamUnavailableError('The email provider is unreachable', { cause: error })
  }
}
