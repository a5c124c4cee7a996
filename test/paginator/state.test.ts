import { describe, expect, it } from "vitest"

import {
  createInitialState,
  loadingStarted,
  maximumReached,
  pageFailed,
  pageLoaded,
} from "../../src/paginator/state.js"

describe("paginator state transitions", () => {
  it("starts idle and empty on the given page", () => {
    expect(createInitialState<string>(4)).toEqual({
      isLoading: false,
      items: [],
      error: null,
      maximumReached: false,
      currentPage: 4,
    })
  })

  it("produces frozen snapshots without touching the previous one", () => {
    const initial = createInitialState<string>(0)
    const loading = loadingStarted(initial)

    expect(loading).not.toBe(initial)
    expect(initial.isLoading).toBe(false)
    expect(Object.isFrozen(loading)).toBe(true)

    const loaded = pageLoaded(loading, 0, ["a", "b"])
    expect(Object.isFrozen(loaded.items)).toBe(true)
    expect(loading.items).toEqual([])
  })

  it("appends items, settles the page and clears a previous error", () => {
    const failed = pageFailed(pageLoaded(createInitialState<string>(0), 0, ["a"]), 1, "timeout")
    const loaded = pageLoaded(loadingStarted(failed), 2, ["c"])

    expect(loaded).toEqual({
      isLoading: false,
      items: ["a", "c"],
      error: null,
      maximumReached: false,
      currentPage: 2,
    })
  })

  it("keeps the same items array for an empty page", () => {
    const loaded = pageLoaded(createInitialState<string>(0), 0, ["a"])
    expect(pageLoaded(loaded, 1, []).items).toBe(loaded.items)
  })

  it("keeps items on failure and settles the failed page", () => {
    const loaded = pageLoaded(createInitialState<string>(0), 0, ["a"])
    expect(pageFailed(loadingStarted(loaded), 1, "timeout")).toEqual({
      isLoading: false,
      items: ["a"],
      error: "timeout",
      maximumReached: false,
      currentPage: 1,
    })
  })

  it("marks the maximum without losing anything else", () => {
    const failed = pageFailed(createInitialState<string>(0), 3, "timeout")
    expect(maximumReached(loadingStarted(failed))).toEqual({
      isLoading: false,
      items: [],
      error: "timeout",
      maximumReached: true,
      currentPage: 3,
    })
  })
})
