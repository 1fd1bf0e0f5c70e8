import { RequestCancelledError, UpstreamTimeoutError } from './errors'

/**
 * Runs `operation` with its own abort signal, failing with `UpstreamTimeout` after `ms`
 * and with `RequestCancelled` when `parent` aborts first. Either way the operation's
 * signal is aborted so the underlying call can stop.
 */
export async function withTimeout<T>(
  label: string,
  ms: number,
  operation: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) throw new RequestCancelledError()

  const controller = new AbortController()
  let timer: NodeJS.Timeout | undefined
  let onParentAbort: (() => void) | undefined

  const bounded = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new UpstreamTimeoutError(`${label} did not respond within ${ms}ms`))
      controller.abort()
    }, ms)
    onParentAbort = () => {
      reject(new RequestCancelledError())
      controller.abort()
    }
    parent?.addEventListener('abort', onParentAbort, { once: true })
  })

  try {
    return await Promise.race([operation(controller.signal), bounded])
  } finally {
    clearTimeout(timer)
    if (onParentAbort) parent?.removeEventListener('abort', onParentAbort)
  }
}
