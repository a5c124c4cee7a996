import type { PaginatorState } from "../paginator/state.js"
import { describeState } from "./format.js"
import type { CliRenderer, RunSettings, RunSummary } from "./types.js"

export class PlainRenderer implements CliRenderer {
  private lastLine = ""

  header(settings: RunSettings): void {
    console.log("=== Paginator Demo ===")
    console.log(`Page size:  ${settings.pageSize}`)
    console.log(`Pages:      ${settings.defaultPage}..${settings.maxPage - 1}`)
    console.log(`Items:      ${settings.totalItems}`)
    console.log(`Latency:    ${settings.latencyMs}ms`)
    console.log(`Scrolls:    ${settings.scrolls}`)
    console.log("")
  }

  snapshot(state: PaginatorState<unknown>): void {
    const line = `[state] ${describeState(state)}`
    if (line === this.lastLine) {
      return
    }
    console.log(line)
    this.lastLine = line
  }

  errorToast(message: string): void {
    console.log(`[ERR] ${message}`)
  }

  summary(summary: RunSummary): void {
    console.log("")
    console.log("=== Run Complete ===")
    console.log(`Items:    ${summary.state.items.length}`)
    console.log(`Page:     ${summary.state.currentPage}`)
    console.log(`Max:      ${summary.state.maximumReached ? "reached" : "not reached"}`)
    console.log("")
    console.log("Page  Size  Items  Outcome")
    for (const fetch of summary.fetches) {
      console.log(
        `${String(fetch.page).padEnd(5)} ${String(fetch.pageSize).padEnd(5)} ${String(fetch.count).padEnd(6)} ${fetch.outcome}`,
      )
    }
  }

  logVerbose(scope: string, message: string, elapsedSec: number): void {
    console.log(`[+${elapsedSec.toFixed(2)}s] [${scope}] ${message}`)
  }

  warn(message: string): void {
    console.warn(message)
  }

  error(message: string): void {
    console.error(message)
  }
}
