import { describe, expect, it, vi } from "vitest"

import { SupervisorScope } from "../../src/paginator/supervisor.js"
import { CancellationError, throwIfAborted } from "../../src/utils/cancel.js"

const createScope = () => {
  const onFailure = vi.fn()
  const log = vi.fn()
  const scope = new SupervisorScope({ name: "io", onFailure, log })
  return { scope, onFailure, log }
}

describe("SupervisorScope", () => {
  it("runs launched work after the caller returns", async () => {
    const { scope } = createScope()
    const body = vi.fn()

    scope.launch(body)
    expect(body).not.toHaveBeenCalled()
    expect(scope.busy).toBe(true)

    await scope.whenIdle()
    expect(body).toHaveBeenCalledTimes(1)
    expect(scope.busy).toBe(false)
  })

  it("reports a failure once and logs it", async () => {
    const { scope, onFailure, log } = createScope()
    const failure = new Error("disk full")

    scope.launch(() => {
      throw failure
    })
    await scope.whenIdle()

    expect(onFailure).toHaveBeenCalledTimes(1)
    expect(onFailure).toHaveBeenCalledWith(failure)
    expect(log).toHaveBeenCalledWith("io", "Caught disk full")
  })

  it("keeps sibling work running when one unit fails", async () => {
    const { scope, onFailure } = createScope()
    const sibling = vi.fn()

    scope.launch(() => Promise.reject(new Error("boom")))
    scope.launch(async () => {
      await Promise.resolve()
      sibling()
    })
    await scope.whenIdle()

    expect(onFailure).toHaveBeenCalledTimes(1)
    expect(sibling).toHaveBeenCalledTimes(1)
  })

  it("does not report cancellations", async () => {
    const { scope, onFailure, log } = createScope()
    const abortError = new Error("The operation was aborted")
    abortError.name = "AbortError"

    scope.launch(() => {
      throw new CancellationError("superseded")
    })
    scope.launch(() => {
      throw abortError
    })
    await scope.whenIdle()

    expect(onFailure).not.toHaveBeenCalled()
    expect(log).toHaveBeenCalledWith("io", "Caught superseded")
  })

  it("aborts running work and skips new work once cancelled", async () => {
    const { scope, onFailure } = createScope()
    const body = vi.fn(async (signal: AbortSignal) => {
      await new Promise((resolve) => {
        signal.addEventListener("abort", resolve, { once: true })
      })
      throwIfAborted(signal)
    })
    scope.launch(body)
    await new Promise((resolve) => {
      setTimeout(resolve, 0)
    })
    expect(body).toHaveBeenCalledTimes(1)

    scope.cancel()
    const late = vi.fn()
    scope.launch(late)
    await scope.whenIdle()

    expect(scope.cancelled).toBe(true)
    expect(late).not.toHaveBeenCalled()
    expect(onFailure).not.toHaveBeenCalled()
  })

  it("skips work whose own signal already aborted", async () => {
    const { scope } = createScope()
    const controller = new AbortController()
    controller.abort()
    const body = vi.fn()

    scope.launch(body, controller.signal)
    await scope.whenIdle()

    expect(body).not.toHaveBeenCalled()
  })

  it("still reports a failure when the log callback throws", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined)
    const onFailure = vi.fn()
    const scope = new SupervisorScope({
      name: "io",
      onFailure,
      log: () => {
        throw new Error("logger down")
      },
    })
    const failure = new Error("disk full")

    scope.launch(() => {
      throw failure
    })
    await scope.whenIdle()

    expect(onFailure).toHaveBeenCalledTimes(1)
    expect(onFailure).toHaveBeenCalledWith(failure)
    expect(warn).toHaveBeenCalledWith("[io] Log callback failed: logger down")
    warn.mockRestore()
  })
})
