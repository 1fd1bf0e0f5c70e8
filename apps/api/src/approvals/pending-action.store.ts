import { Injectable } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import type { PendingAction, PendingActionStatus } from '@invoice-agent/shared'
import { readIntEnv } from '../common/env'

/** Source of truth for consent state, keyed by action token. */
export abstract class PendingActionStore {
  abstract get(token: string): Promise<PendingAction | undefined>
  abstract insert(action: PendingAction): Promise<void>
  /** Replaces the action only if its stored status is still `expected`. */
  abstract compareAndSet(token: string, expected: PendingActionStatus, next: PendingAction): Promise<boolean>
  abstract findOpenDraft(conversationId: string): Promise<PendingAction | undefined>
}

export const DEFAULT_RESOLVED_RETENTION_MS = 60 * 60 * 1000

/**
 * Keeps actions in process. Resolved actions, and drafts left to expire, are dropped once
 * they are older than the retention window; approved actions stay until they finish.
 */
@Injectable()
export class InMemoryPendingActionStore extends PendingActionStore {
  private readonly actions = new Map<string, PendingAction>()
  /** conversationId -> token of its draft */
  private readonly openDrafts = new Map<string, string>()
  private readonly retentionMs: number

  constructor(config: ConfigService) {
    super()
    this.retentionMs = readIntEnv(config, 'RESOLVED_ACTION_RETENTION_MS', DEFAULT_RESOLVED_RETENTION_MS, { min: 0 })
  }

  get size() {
    return this.actions.size
  }

  async get(token: string) {
    const action = this.actions.get(token)
    if (!action) return undefined
    if (this.isPastRetention(action, Date.now())) {
      this.remove(token, action)
      return undefined
    }
    return structuredClone(action)
  }

  async insert(action: PendingAction) {
    this.prune()
    if (this.actions.has(action.token)) throw new Error(`Pending action ${action.token} already exists`)
    this.actions.set(action.token, structuredClone(action))
    if (action.status === 'draft') this.openDrafts.set(action.conversationId, action.token)
  }

  async compareAndSet(token: string, expected: PendingActionStatus, next: PendingAction) {
    const current = this.actions.get(token)
    if (!current || current.status !== expected) return false
    this.actions.set(token, structuredClone(next))
    if (next.status === 'draft') {
      this.openDrafts.set(next.conversationId, token)
    } else if (this.openDrafts.get(current.conversationId) === token) {
      this.openDrafts.delete(current.conversationId)
    }
    return true
  }

  async findOpenDraft(conversationId: string) {
    const token = this.openDrafts.get(conversationId)
    const action = token == null ? undefined : this.actions.get(token)
    return action?.status === 'draft' ? structuredClone(action) : undefined
  }

  private prune() {
    const now = Date.now()
    for (const [token, action] of this.actions) {
      if (this.isPastRetention(action, now)) this.remove(token, action)
    }
  }

  private isPastRetention(action: PendingAction, now: number) {
    const settledAt = settledTime(action)
    return settledAt != null && now - settledAt >= this.retentionMs
  }

  private remove(token: string, action: PendingAction) {
    this.actions.delete(token)
    if (this.openDrafts.get(action.conversationId) === token) this.openDrafts.delete(action.conversationId)
  }
}

function settledTime(action: PendingAction) {
  switch (action.status) {
    case 'executed':
    case 'rejected':
      return action.resolvedAt == null ? null : Date.parse(action.resolvedAt)
    case 'draft':
      return Date.parse(action.expiresAt)
    case 'approved':
      return null
  }
}
