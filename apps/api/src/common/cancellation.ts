import { RequestCancelledError } from './errors'

export function throwIfCancelled(signal?: AbortSignal) {
  if (signal?.aborted) throw new RequestCancelledError()
}
