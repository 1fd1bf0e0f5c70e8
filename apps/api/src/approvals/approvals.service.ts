import { randomUUID } from 'node:crypto'
import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { APPROVAL_TIMEOUT_MS, type PendingAction, type ToolResult } from '@invoice-agent/shared'
import { readIntEnv } from '../common/env'
import {
  ActionAlreadyExecutedError,
  NoPendingActionError,
  PendingActionConflictError,
  describeError,
  toErrorBody,
} from '../common/errors'
import { withSingleRetry } from '../common/retry'
import { ToolsService } from '../tools/tools.service'
import { PendingActionStore } from './pending-action.store'

export interface ApprovalOutcome {
  action: PendingAction
  result: ToolResult
}

/**
 * Consent gate over tools that require approval.
 * draft -> approved -> executed, or draft -> rejected (cancelled, expired or superseded).
 */
@Injectable()
export class ApprovalsService {
  private readonly logger = new Logger(ApprovalsService.name)
  private readonly timeoutMs: number

  constructor(
    private readonly store: PendingActionStore,
    private readonly tools: ToolsService,
    config: ConfigService,
  ) {
    this.timeoutMs = readIntEnv(config, 'CONSENT_TIMEOUT_MS', APPROVAL_TIMEOUT_MS, {
      min: 1_000,
      max: 24 * 60 * 60 * 1000,
    })
  }

  async open(conversationId: string, toolName: string, draft: Record<string, unknown>): Promise<PendingAction> {
    const existing = await this.findOpen(conversationId)
    if (existing) throw new PendingActionConflictError(existing.token)

    const now = Date.now()
    const action: PendingAction = {
      token: randomUUID(),
      conversationId,
      toolName,
      draft,
      status: 'draft',
      createdAt: new Date(now).toISOString(),
      expiresAt: new Date(now + this.timeoutMs).toISOString(),
      resolvedAt: null,
    }
    await this.store.insert(action)
    this.logger.log(`Action ${action.token} (${toolName}) is waiting for consent in ${conversationId}`)
    return action
  }

  async get(token: string): Promise<PendingAction> {
    const action = await this.store.get(token)
    if (!action) throw new NoPendingActionError(token)
    return this.expireIfDue(action)
  }

  async approve(token: string, conversationId: string): Promise<ApprovalOutcome> {
    const current = await this.requireDraft(token, conversationId)
    const approved: PendingAction = {
      ...current,
      status: 'approved',
      resolution: 'approved',
      resolvedAt: new Date().toISOString(),
    }
    if (!(await this.store.compareAndSet(token, 'draft', approved))) {
      throw this.transitionError(await this.get(token))
    }
    this.logger.log(`Action ${token} approved; running ${current.toolName}`)

    // Once approved, the commit runs to completion even if the caller goes away.
    let result: ToolResult
    try {
      result = await withSingleRetry(
        () => this.tools.commit(current.toolName, current.draft, { conversationId }),
        { label: `Commit of ${current.toolName}`, logger: this.logger },
      )
    } catch (error) {
      this.logger.warn(`Action ${token} failed: ${describeError(error)}`)
      result = { success: false, output: null, error: toErrorBody(error), requiresConsent: false }
    }

    const executed: PendingAction = {
      ...approved,
      status: 'executed',
      result: {
        success: result.success,
        output: result.output,
        ...(result.error ? { error: result.error.message } : {}),
      },
    }
    if (!(await this.store.compareAndSet(token, 'approved', executed))) {
      throw new Error(`Action ${token} left the approved state while it was running`)
    }
    this.logger.log(`Action ${token} executed (${result.success ? 'succeeded' : 'failed'})`)
    return { action: executed, result }
  }

  async reject(token: string, conversationId: string): Promise<PendingAction> {
    const current = await this.requireDraft(token, conversationId)
    const rejected = this.rejected(current, 'cancelled')
    if (!(await this.store.compareAndSet(token, 'draft', rejected))) {
      throw this.transitionError(await this.get(token))
    }
    this.logger.log(`Action ${token} rejected by the user`)
    return rejected
  }

  /** Discards the open draft of a conversation, if any, because the user moved on. */
  async supersedeOpen(conversationId: string): Promise<PendingAction | undefined> {
    const open = await this.findOpen(conversationId)
    if (!open) return undefined
    const superseded = this.rejected(open, 'superseded')
    if (!(await this.store.compareAndSet(open.token, 'draft', superseded))) return undefined
    this.logger.log(`Action ${open.token} superseded by a new message`)
    return superseded
  }

  private async findOpen(conversationId: string) {
    const open = await this.store.findOpenDraft(conversationId)
    if (!open) return undefined
    const current = await this.expireIfDue(open)
    return current.status === 'draft' ? current : undefined
  }

  private async requireDraft(token: string, conversationId: string) {
    const action = await this.store.get(token)
    if (!action || action.conversationId !== conversationId) throw new NoPendingActionError(token)
    const current = await this.expireIfDue(action)
    if (current.status !== 'draft') throw this.transitionError(current)
    return current
  }

  private transitionError(action: PendingAction) {
    if (action.status === 'approved' || action.status === 'executed') {
      return new ActionAlreadyExecutedError(action.token)
    }
    return new NoPendingActionError(action.token)
  }

  private async expireIfDue(action: PendingAction): Promise<PendingAction> {
    if (action.status !== 'draft' || Date.parse(action.expiresAt) > Date.now()) return action
    const expired = this.rejected(action, 'expired')
    if (await this.store.compareAndSet(action.token, 'draft', expired)) {
      this.logger.log(`Action ${action.token} expired without consent`)
      return expired
    }
    return (await this.store.get(action.token)) ?? expired
  }

  private rejected(action: PendingAction, resolution: 'cancelled' | 'expired' | 'superseded'): PendingAction {
    return { ...action, status: 'rejected', resolution, resolvedAt: new Date().toISOString() }
  }
}
