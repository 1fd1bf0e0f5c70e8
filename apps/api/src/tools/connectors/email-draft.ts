import { isURL } from 'class-validator'
import type { EmailAttachmentRef, EmailDraft } from '@invoice-agent/shared'
import { ToolValidationError } from '../../common/errors'
import { isRecord } from '../../common/records'
import { parseRecipients } from '../../email/recipients'
import { stringArg } from '../tool-arguments'

export const MAX_ATTACHMENTS = 10
const SUBJECT_MAX_LENGTH = 200

function isAttachmentUrl(value: string) {
  return isURL(value, { protocols: ['https', 'http'], require_protocol: true, require_tld: false })
}

function readAttachments(value: unknown, problems: string[]): EmailAttachmentRef[] {
  if (value == null) return []
  if (!Array.isArray(value)) {
    problems.push('"attachments" must be an array')
    return []
  }
  if (value.length > MAX_ATTACHMENTS) {
    problems.push(`at most ${MAX_ATTACHMENTS} attachments are allowed`)
    return []
  }

  const attachments: EmailAttachmentRef[] = []
  value.forEach((entry, index) => {
    const url = isRecord(entry) && typeof entry.url === 'string' ? entry.url.trim() : ''
    const filename = isRecord(entry) && typeof entry.filename === 'string' ? entry.filename.trim() : ''
    if (!url || !isAttachmentUrl(url)) {
      problems.push(`attachment ${index + 1} needs an http(s) "url"`)
      return
    }
    if (!filename) {
      problems.push(`attachment ${index + 1} needs a "filename"`)
      return
    }
    attachments.push({ url, filename })
  })
  return attachments
}

/** Builds the draft shown to the user for consent. */
export function buildEmailDraft(args: Record<string, unknown>): EmailDraft {
  const to = parseRecipients(stringArg(args, 'to'))
  const subject = stringArg(args, 'subject')
  const body = stringArg(args, 'body')
  const problems: string[] = []
  if (subject.length > SUBJECT_MAX_LENGTH) problems.push(`"subject" is longer than ${SUBJECT_MAX_LENGTH} characters`)
  const attachments = readAttachments(args.attachments, problems)
  if (problems.length > 0) throw new ToolValidationError(problems)
  return { to, subject, body, attachments }
}

/** Reads a stored draft back before it is sent. */
export function readEmailDraft(draft: Record<string, unknown>): EmailDraft {
  const problems: string[] = []
  const to = Array.isArray(draft.to) ? draft.to.filter((entry): entry is string => typeof entry === 'string') : []
  if (to.length === 0) problems.push('draft has no recipients')
  const subject = typeof draft.subject === 'string' ? draft.subject : ''
  const body = typeof draft.body === 'string' ? draft.body : ''
  if (!subject || !body) problems.push('draft is missing its subject or body')
  const attachments = readAttachments(draft.attachments, problems)
  if (problems.length > 0) throw new ToolValidationError(problems, 'Malformed email draft')
  return { to, subject, body, attachments }
}
