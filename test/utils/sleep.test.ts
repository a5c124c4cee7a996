import { describe, expect, it } from "vitest"

import { CancellationError } from "../../src/utils/cancel.js"
import { sleep } from "../../src/utils/sleep.js"

describe("sleep", () => {
  it("resolves right away for non-positive delays", async () => {
    await expect(sleep(0)).resolves.toBeUndefined()
  })

  it("rejects when the signal is already aborted", async () => {
    const controller = new AbortController()
    controller.abort("stop")

    await expect(sleep(10, controller.signal)).rejects.toThrow(new CancellationError("stop"))
  })

  it("stops waiting when the signal aborts", async () => {
    const controller = new AbortController()
    const pending = sleep(60_000, controller.signal)

    controller.abort(new Error("Interrupted by user"))

    await expect(pending).rejects.toThrow("Interrupted by user")
  })
})
