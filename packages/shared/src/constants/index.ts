export const API_VERSION = 'v1'

/** Default model per provider, overridden by LLM_MODEL. */
export const LLM_MODELS = {
  anthropic: 'claude-sonnet-4-5',
  openai: 'gpt-4o',
} as const

export const APPROVAL_TIMEOUT_MS = 5 * 60 * 1000 // 5 minutes

export const DEFAULT_MAX_TOOL_ROUNDS = 6
export const MAX_TOOL_ROUNDS_CEILING = 12

export const ARTIFACT_DEFAULT_EXPIRY_MINUTES = 60
export const ARTIFACT_MAX_EXPIRY_MINUTES = 7 * 24 * 60 // presigned URL ceiling

export const TOOL_NAMES = {
  sqlQuery: 'execute_sql_query',
  exportCsv: 'export_query_to_csv',
  exportReport: 'export_query_report',
  emailConsent: 'request_email_consent',
} as const

export const ROUND_LIMIT_MESSAGE =
  'I could not complete the request within the allowed number of steps. Please narrow the question and try again.'
