import type { PaginatorState } from "../paginator/state.js"

export const describeState = (state: PaginatorState<unknown>): string => {
  const parts = [`page=${state.currentPage}`, `items=${state.items.length}`]
  if (state.isLoading) {
    parts.push("loading")
  }
  if (state.maximumReached) {
    parts.push("max reached")
  }
  if (state.error !== null) {
    parts.push(`error="${state.error}"`)
  }
  return parts.join(" ")
}
