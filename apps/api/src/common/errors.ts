import type { ErrorBody, ErrorKind } from '@invoice-agent/shared'

const ERROR_STATUS: Record<ErrorKind, number> = {
  ValidationError: 400,
  UnknownTool: 400,
  RewriteError: 400,
  QueryFailed: 400,
  UpstreamTimeout: 504,
  UpstreamUnavailable: 503,
  IssuerUnavailable: 503,
  SerializationError: 500,
  DeliveryFailed: 502,
  NoPendingAction: 404,
  ActionAlreadyExecuted: 409,
  PendingActionConflict: 409,
  RoundLimitExceeded: 200,
  RequestCancelled: 499,
  Skipped: 409,
  NotFound: 404,
  InternalError: 500,
}

const RETRYABLE_KINDS: ReadonlySet<ErrorKind> = new Set<ErrorKind>([
  'UpstreamTimeout',
  'UpstreamUnavailable',
  'IssuerUnavailable',
])

export class AgentError extends Error {
  readonly kind: ErrorKind
  readonly status: number
  readonly retryable: boolean

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = kind
    this.kind = kind
    this.status = ERROR_STATUS[kind]
    this.retryable = RETRYABLE_KINDS.has(kind)
  }

  toBody(): ErrorBody {
    return { kind: this.kind, message: this.message }
  }
}

export class ToolValidationError extends AgentError {
  constructor(readonly problems: string[], prefix = 'Invalid arguments') {
    super('ValidationError', `${prefix}: ${problems.join('; ')}`)
  }
}

export class UnknownToolError extends AgentError {
  constructor(readonly toolName: string) {
    super('UnknownTool', `Unknown tool: ${toolName}`)
  }
}

export class RewriteError extends AgentError {
  constructor(message: string, readonly offset?: number) {
    super('RewriteError', offset == null ? message : `${message} (at offset ${offset})`)
  }
}

export class QueryFailedError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('QueryFailed', message, options)
  }
}

export class UpstreamTimeoutError extends AgentError {
  constructor(message: string) {
    super('UpstreamTimeout', message)
  }
}

export class UpstreamUnavailableError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('UpstreamUnavailable', message, options)
  }
}

export class IssuerUnavailableError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('IssuerUnavailable', message, options)
  }
}

export class ArtifactSerializationError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SerializationError', message, options)
  }
}

export class DeliveryFailedError extends AgentError {
  constructor(message: string) {
    super('DeliveryFailed', message)
  }
}

export class NoPendingActionError extends AgentError {
  constructor(token: string) {
    super('NoPendingAction', `No pending action for token ${token}`)
  }
}

export class ActionAlreadyExecutedError extends AgentError {
  constructor(token: string) {
    super('ActionAlreadyExecuted', `Action ${token} was already approved`)
  }
}

export class PendingActionConflictError extends AgentError {
  constructor(readonly openToken: string) {
    super('PendingActionConflict', `Another action (${openToken}) is waiting for consent in this conversation`)
  }
}

export class RequestCancelledError extends AgentError {
  constructor() {
    super('RequestCancelled', 'The request was cancelled')
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof AgentError && error.retryable
}

/** Body handed back to the model or the caller; unexpected errors never leak their message. */
export function toErrorBody(error: unknown): ErrorBody {
  if (error instanceof AgentError) return error.toBody()
  return { kind: 'InternalError', message: 'Internal error' }
}

export function describeError(error: unknown) {
  if (error instanceof Error) return error.message
  return typeof error === 'string' ? error : 'Unknown error'
}
