import { isEmail } from 'class-validator'
import { ToolValidationError } from '../common/errors'

const NAMED_ADDRESS = /<([^<>]+)>\s*$/

/** Splits a comma or semicolon separated list, accepting `Name <address>` entries. */
export function parseRecipients(text: string) {
  const recipients: string[] = []
  const invalid: string[] = []
  const seen = new Set<string>()

  for (const entry of text.split(/[,;]/)) {
    const trimmed = entry.trim()
    if (!trimmed) continue
    const address = (NAMED_ADDRESS.exec(trimmed)?.[1] ?? trimmed).trim()
    if (!isEmail(address)) {
      invalid.push(trimmed)
      continue
    }
    const key = address.toLowerCase()
    if (seen.has(key)) continue
    seen.add(key)
    recipients.push(address)
  }

  if (invalid.length > 0) {
    throw new ToolValidationError(invalid.map((entry) => `"${entry}" is not a valid email address`))
  }
  if (recipients.length === 0) {
    throw new ToolValidationError(['at least one recipient is required'])
  }
  return recipients
}
