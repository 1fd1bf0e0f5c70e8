import { QueryFailedError, UpstreamUnavailableError } from './errors'
import { withSingleRetry } from './retry'
import { withTimeout } from './timeout'

describe('withSingleRetry', () => {
  test('retries a retryable failure once', async () => {
    const operation = jest
      .fn<Promise<string>, []>()
      .mockRejectedValueOnce(new UpstreamUnavailableError('storage returned 503'))
      .mockResolvedValueOnce('ok')

    await expect(withSingleRetry(operation, { label: 'upload', delayMs: 0 })).resolves.toBe('ok')
    expect(operation).toHaveBeenCalledTimes(2)
  })

  test('gives up after the second retryable failure', async () => {
    const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new UpstreamUnavailableError('down'))

    await expect(withSingleRetry(operation, { label: 'upload', delayMs: 0 })).rejects.toMatchObject({
      kind: 'UpstreamUnavailable',
    })
    expect(operation).toHaveBeenCalledTimes(2)
  })

  test('does not retry a non-retryable failure', async () => {
    const operation = jest.fn<Promise<string>, []>().mockRejectedValue(new QueryFailedError('syntax error'))

    await expect(withSingleRetry(operation, { label: 'query', delayMs: 0 })).rejects.toMatchObject({
      kind: 'QueryFailed',
    })
    expect(operation).toHaveBeenCalledTimes(1)
  })

  test('stops before retrying when the caller has gone away', async () => {
    const controller = new AbortController()
    const operation = jest.fn<Promise<string>, []>().mockImplementation(async () => {
      controller.abort()
      throw new UpstreamUnavailableError('down')
    })

    await expect(
      withSingleRetry(operation, { label: 'upload', delayMs: 0, signal: controller.signal }),
    ).rejects.toMatchObject({ kind: 'RequestCancelled' })
    expect(operation).toHaveBeenCalledTimes(1)
  })
})

describe('withTimeout', () => {
  test('returns the result of a fast operation', async () => {
    await expect(withTimeout('model', 1000, async () => 42)).resolves.toBe(42)
  })

  test('fails with UpstreamTimeout and aborts the operation signal', async () => {
    let seen: AbortSignal | undefined
    const pending = withTimeout('model', 10, (signal) => {
      seen = signal
      return new Promise<never>(() => undefined)
    })

    await expect(pending).rejects.toMatchObject({
      kind: 'UpstreamTimeout',
      message: 'model did not respond within 10ms',
    })
    expect(seen?.aborted).toBe(true)
  })

  test('fails with RequestCancelled when the parent signal aborts', async () => {
    const parent = new AbortController()
    const pending = withTimeout('model', 1000, () => new Promise<never>(() => undefined), parent.signal)
    parent.abort()

    await expect(pending).rejects.toMatchObject({ kind: 'RequestCancelled' })
  })

  test('refuses to start under an already aborted parent', async () => {
    const parent = new AbortController()
    parent.abort()
    const operation = jest.fn(async () => 1)

    await expect(withTimeout('model', 1000, operation, parent.signal)).rejects.toMatchObject({
      kind: 'RequestCancelled',
    })
    expect(operation).not.toHaveBeenCalled()
  })
})
