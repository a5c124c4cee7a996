import type { Unsubscribe } from "../events/types.js"
import { getErrorMessage } from "../utils/cancel.js"

export type PaginatorLog = (scope: string, message: string) => void

/** Wraps `log` so that a throwing callback is reported on stderr instead of escaping. */
export const guardLog = (log: PaginatorLog | undefined): PaginatorLog | undefined => {
  if (!log) {
    return undefined
  }
  return (scope, message) => {
    try {
      log(scope, message)
    } catch (error: unknown) {
      console.warn(`[${scope}] Log callback failed: ${getErrorMessage(error)}`)
    }
  }
}

/**
 * Fetches one page of items. Pages are 0-indexed.
 *
 * `signal` aborts once the paginator no longer wants the result (a newer page
 * was requested, the paginator was paused or disposed). Honouring it is
 * optional: the paginator stops waiting either way.
 */
export interface DataSource<T> {
  fetch(page: number, pageSize: number, signal: AbortSignal): Promise<readonly T[]>
}

/** Lets the host pause page reactions, e.g. while its view is in the background. */
export interface ActivitySignal {
  readonly isActive: boolean
  subscribe(listener: (active: boolean) => void): Unsubscribe
}

export interface PaginatorOptions {
  defaultPage?: number
  pageSize?: number
  maxPage?: number
  activity?: ActivitySignal
  log?: PaginatorLog
}
