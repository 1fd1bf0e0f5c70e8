export type PendingActionStatus = 'draft' | 'approved' | 'executed' | 'rejected'
export type PendingActionResolution = 'approved' | 'cancelled' | 'expired' | 'superseded'

export interface PendingActionOutcome {
  success: boolean
  output: unknown
  error?: string
}

export interface PendingAction {
  token: string
  conversationId: string
  toolName: string
  draft: Record<string, unknown>
  status: PendingActionStatus
  createdAt: string
  expiresAt: string
  resolvedAt: string | null
  resolution?: PendingActionResolution
  result?: PendingActionOutcome
}

export type PendingActionView = Pick<
  PendingAction,
  'token' | 'toolName' | 'draft' | 'status' | 'expiresAt' | 'resolution'
>

export interface EmailAttachmentRef {
  url: string
  filename: string
}

export interface EmailDraft {
  to: string[]
  subject: string
  body: string
  attachments: EmailAttachmentRef[]
}
