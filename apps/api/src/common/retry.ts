import type { Logger } from '@nestjs/common'
import { setTimeout as sleep } from 'node:timers/promises'
import { throwIfCancelled } from './cancellation'
import { AgentError, isRetryable } from './errors'

export const RETRY_DELAY_MS = 250

export interface SingleRetryOptions {
  label: string
  logger?: Logger
  signal?: AbortSignal
  delayMs?: number
}

/** Runs `operation`, retrying it exactly once when it fails with a retryable error. */
export async function withSingleRetry<T>(operation: () => Promise<T>, options: SingleRetryOptions): Promise<T> {
  try {
    return await operation()
  } catch (error) {
    if (!isRetryable(error)) throw error
    throwIfCancelled(options.signal)
    const kind = error instanceof AgentError ? error.kind : 'error'
    options.logger?.warn(`${options.label} failed with ${kind}; retrying once`)
    const delayMs = options.delayMs ?? RETRY_DELAY_MS
    if (delayMs > 0) await sleep(delayMs)
    throwIfCancelled(options.signal)
    return operation()
  }
}
