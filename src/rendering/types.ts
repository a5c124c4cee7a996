import type { PaginatorState } from "../paginator/state.js"
import type { FetchRecord } from "../sources/in-memory-source.js"

export interface RunSettings {
  pageSize: number
  maxPage: number
  defaultPage: number
  totalItems: number
  latencyMs: number
  scrolls: number
}

export interface RunSummary {
  state: PaginatorState<unknown>
  fetches: readonly FetchRecord[]
}

export interface CliRenderer {
  header(settings: RunSettings): void
  snapshot(state: PaginatorState<unknown>): void
  errorToast(message: string): void
  summary(summary: RunSummary): void
  logVerbose(scope: string, message: string, elapsedSec: number): void
  warn(message: string): void
  error(message: string): void
}
