import { describe, expect, it, vi } from "vitest"

import { StateStore } from "../../src/events/state-store.js"

describe("StateStore", () => {
  it("replays the current value and then every change", () => {
    const store = new StateStore(1)
    const listener = vi.fn()

    store.subscribe(listener)
    store.set(2)
    store.update((value) => value * 10)

    expect(listener.mock.calls).toEqual([[1], [2], [20]])
    expect(store.value).toBe(20)
  })

  it("drops values equal to the current one", () => {
    const store = new StateStore("a")
    const listener = vi.fn()
    store.subscribe(listener)

    expect(store.set("a")).toBe(false)
    expect(store.set("b")).toBe(true)
    expect(listener).toHaveBeenCalledTimes(2)
  })

  it("uses a custom equality when given one", () => {
    const store = new StateStore(
      { id: 1, label: "first" },
      { equals: (current, next) => current.id === next.id },
    )

    expect(store.set({ id: 1, label: "renamed" })).toBe(false)
    expect(store.value.label).toBe("first")
  })

  it("stops delivering after unsubscribe", () => {
    const store = new StateStore(0)
    const listener = vi.fn()
    const unsubscribe = store.subscribe(listener)

    unsubscribe()
    store.set(1)

    expect(listener).toHaveBeenCalledTimes(1)
    expect(store.listenerCount).toBe(0)
  })

  it("delivers values set from a listener in order to every listener", () => {
    const store = new StateStore(0)
    const first: number[] = []
    const second: number[] = []
    store.subscribe((value) => {
      first.push(value)
      if (value === 1) {
        store.set(2)
      }
    })
    store.subscribe((value) => {
      second.push(value)
    })

    store.set(1)

    expect(first).toEqual([0, 1, 2])
    expect(second).toEqual([0, 1, 2])
  })

  it("reports listener failures and keeps notifying the others", () => {
    const onListenerError = vi.fn()
    const store = new StateStore(0, { onListenerError })
    const healthy = vi.fn()
    store.subscribe((value) => {
      if (value > 0) {
        throw new Error("listener broke")
      }
    })
    store.subscribe(healthy)

    store.set(1)

    expect(onListenerError).toHaveBeenCalledWith(new Error("listener broke"))
    expect(healthy).toHaveBeenLastCalledWith(1)
  })

  it("rethrows listener failures without an error handler", () => {
    const store = new StateStore(0)
    store.subscribe((value) => {
      if (value === 1) {
        throw new Error("listener broke")
      }
    })

    expect(() => store.set(1)).toThrow("listener broke")
    expect(store.set(2)).toBe(true)
  })
})
