export class CancellationError extends Error {
  constructor(message = "Operation cancelled") {
    super(message)
    this.name = "CancellationError"
  }
}

export const toCancellationError = (signal: AbortSignal): CancellationError => {
  const reason: unknown = signal.reason
  if (reason instanceof CancellationError) {
    return reason
  }
  if (reason instanceof Error) {
    return new CancellationError(reason.message)
  }
  if (typeof reason === "string" && reason.trim()) {
    return new CancellationError(reason)
  }
  return new CancellationError()
}

export const throwIfAborted = (signal: AbortSignal | undefined): void => {
  if (!signal?.aborted) {
    return
  }
  throw toCancellationError(signal)
}

export const isCancellationError = (value: unknown): boolean => {
  if (value instanceof CancellationError) {
    return true
  }
  if (!(value instanceof Error)) {
    return false
  }
  return value.name === "AbortError" || value.name === "CancellationError"
}

/**
 * Settles with `promise`, unless `signal` aborts first, in which case it
 * rejects with a {@link CancellationError} without waiting for `promise`.
 */
export const raceAbort = <T>(promise: Promise<T>, signal: AbortSignal): Promise<T> => {
  if (signal.aborted) {
    return Promise.reject(toCancellationError(signal))
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => {
      reject(toCancellationError(signal))
    }
    signal.addEventListener("abort", onAbort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort)
        reject(toError(error))
      },
    )
  })
}

export const getErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

export const toError = (value: unknown): Error =>
  value instanceof Error ? value : new Error(getErrorMessage(value))
