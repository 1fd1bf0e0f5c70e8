import { Injectable } from '@nestjs/common'
import { TOOL_NAMES, type ToolResult } from '@invoice-agent/shared'
import { EmailService } from '../../email/email.service'
import type { ToolContext, ToolDefinition } from '../tool.types'
import { MAX_ATTACHMENTS, buildEmailDraft, readEmailDraft } from './email-draft'

/**
 * Two-phase email: `execute` only drafts, `commit` sends once the user has approved the draft.
 */
@Injectable()
export class EmailConsentTool {
  constructor(private readonly email: EmailService) {}

  get def(): ToolDefinition {
    return {
      name: TOOL_NAMES.emailConsent,
      displayName: 'Send Email (requires approval)',
      description:
        'Prepare an email for the user to review. Nothing is sent until the user explicitly approves the draft; '
        + 'the user may also reject it. To attach exported files, pass the download links returned by '
        + `${TOOL_NAMES.exportCsv} or ${TOOL_NAMES.exportReport} (at most ${MAX_ATTACHMENTS}).`,
      requiresApproval: true,
      parameters: {
        to: { type: 'string', required: true, description: 'Recipient addresses separated by commas.' },
        subject: { type: 'string', required: true, description: 'Subject line.' },
        body: { type: 'string', required: true, description: 'Plain-text message body.' },
        attachments: {
          type: 'array',
          required: false,
          description: 'Files to attach, as a list of {"url": "...", "filename": "..."} objects.',
        },
      },
    }
  }

  async execute(args: Record<string, unknown>, _ctx: ToolContext): Promise<ToolResult> {
    return { success: true, output: buildEmailDraft(args), requiresConsent: true }
  }

  async commit(draft: Record<string, unknown>, ctx: ToolContext): Promise<ToolResult> {
    const email = readEmailDraft(draft)
    const receipt = await this.email.send(email, ctx.signal)
    return {
      success: true,
      output: {
        messageId: receipt.id,
        to: email.to,
        subject: email.subject,
        attachments: email.attachments.map((attachment) => attachment.filename),
      },
      requiresConsent: false,
    }
  }
}
