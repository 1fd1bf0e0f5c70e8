export interface OutboundEmail {
  from: string
  to: string[]
  subject: string
  text: string
  /** Files the provider fetches from `path` and attaches. */
  attachments: Array<{ filename: string; path: string }>
}

export interface MailReceipt {
  id: string
}

/** Raised by a transport when the provider answers with a non-2xx status. */
export class MailProviderError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message)
    this.name = 'MailProviderError'
  }
}

export abstract class MailTransport {
  abstract send(message: OutboundEmail, apiKey: string, signal: AbortSignal): Promise<MailReceipt>
}
