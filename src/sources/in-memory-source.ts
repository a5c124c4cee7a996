import type { DataSource } from "../paginator/types.js"
import { isCancellationError } from "../utils/cancel.js"
import { sleep } from "../utils/sleep.js"

export type FetchOutcome = "ok" | "failed" | "cancelled"

export interface FetchRecord {
  page: number
  pageSize: number
  /** Items returned; 0 unless `outcome` is "ok". */
  count: number
  outcome: FetchOutcome
}

export interface InMemoryDataSourceConfig {
  latencyMs?: number
  /** Pages that fail instead of returning items. */
  failPages?: Iterable<number>
  /** How many attempts of each failing page fail before it succeeds. Defaults to 1. */
  failAttempts?: number
}

/**
 * Serves fixed items page by page. Stands in for a remote repository in the
 * demo CLI and in tests.
 */
export class InMemoryDataSource<T> implements DataSource<T> {
  readonly history: FetchRecord[] = []

  private readonly failPages: Set<number>
  private readonly failuresByPage = new Map<number, number>()

  constructor(
    private readonly items: readonly T[],
    private readonly config: InMemoryDataSourceConfig = {},
  ) {
    this.failPages = new Set(config.failPages ?? [])
  }

  async fetch(page: number, pageSize: number, signal: AbortSignal): Promise<readonly T[]> {
    const record: FetchRecord = { page, pageSize, count: 0, outcome: "ok" }
    this.history.push(record)
    try {
      await sleep(this.config.latencyMs ?? 0, signal)
      if (this.shouldFail(page)) {
        throw new Error(`Failed to load page ${page}`)
      }
      const start = page * pageSize
      const slice = this.items.slice(start, start + pageSize)
      record.count = slice.length
      return slice
    } catch (error: unknown) {
      record.outcome = isCancellationError(error) ? "cancelled" : "failed"
      throw error
    }
  }

  private shouldFail(page: number): boolean {
    if (!this.failPages.has(page)) {
      return false
    }
    const failures = this.failuresByPage.get(page) ?? 0
    if (failures >= (this.config.failAttempts ?? 1)) {
      return false
    }
    this.failuresByPage.set(page, failures + 1)
    return true
  }
}
