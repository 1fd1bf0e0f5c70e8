export type ErrorKind =
  | 'ValidationError'
  | 'UnknownTool'
  | 'RewriteError'
  | 'QueryFailed'
  | 'UpstreamTimeout'
  | 'UpstreamUnavailable'
  | 'IssuerUnavailable'
  | 'SerializationError'
  | 'DeliveryFailed'
  | 'NoPendingAction'
  | 'ActionAlreadyExecuted'
  | 'PendingActionConflict'
  | 'RoundLimitExceeded'
  | 'RequestCancelled'
  | 'Skipped'
  | 'NotFound'
  | 'InternalError'

export interface ErrorBody {
  kind: ErrorKind
  message: string
}
