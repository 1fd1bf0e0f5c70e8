import type { PendingAction, PendingActionView, ToolResult } from '@invoice-agent/shared'

const FOLLOWUP_OUTPUT_MAX_CHARS = 4000

function renderOutput(output: unknown) {
  if (output == null) return ''
  if (typeof output === 'string') return output.slice(0, FOLLOWUP_OUTPUT_MAX_CHARS)
  const json = JSON.stringify(output, null, 2)
  if (!json) return ''
  return json.length > FOLLOWUP_OUTPUT_MAX_CHARS ? `${json.slice(0, FOLLOWUP_OUTPUT_MAX_CHARS)}...` : json
}

export function toPendingActionView(action: PendingAction): PendingActionView {
  return {
    token: action.token,
    toolName: action.toolName,
    draft: action.draft,
    status: action.status,
    expiresAt: action.expiresAt,
    ...(action.resolution ? { resolution: action.resolution } : {}),
  }
}

/** Assistant text appended to the conversation once an approved action has run. */
export function buildExecutedFollowup(toolName: string, result: ToolResult) {
  if (!result.success) {
    return `I ran \`${toolName}\`, but it failed: ${result.error?.message ?? 'unknown error'}.`
  }
  const rendered = renderOutput(result.output)
  if (!rendered) return `I ran \`${toolName}\` successfully.`
  return `I ran \`${toolName}\` successfully.\n\nResult:\n${rendered}`
}

export function buildRejectedFollowup(toolName: string) {
  return `Okay, I cancelled \`${toolName}\`. Nothing was sent.`
}
