import { toCancellationError } from "./cancel.js"

/** Resolves after `ms`; rejects with a cancellation as soon as `signal` aborts. */
export const sleep = (ms: number, signal?: AbortSignal): Promise<void> => {
  if (signal?.aborted) {
    return Promise.reject(toCancellationError(signal))
  }
  if (ms <= 0) {
    return Promise.resolve()
  }
  return new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer)
      if (signal) {
        reject(toCancellationError(signal))
      }
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort)
      resolve()
    }, ms)
    signal?.addEventListener("abort", onAbort, { once: true })
  })
}
