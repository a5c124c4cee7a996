import { describe, expect, it } from "vitest"

import { createDemoItems } from "../../src/sources/demo-items.js"
import { InMemoryDataSource } from "../../src/sources/in-memory-source.js"

const signal = new AbortController().signal

describe("InMemoryDataSource", () => {
  it("slices pages from the backing items", async () => {
    const source = new InMemoryDataSource(["a", "b", "c", "d", "e"])

    await expect(source.fetch(0, 2, signal)).resolves.toEqual(["a", "b"])
    await expect(source.fetch(2, 2, signal)).resolves.toEqual(["e"])
    await expect(source.fetch(3, 2, signal)).resolves.toEqual([])

    expect(source.history).toEqual([
      { page: 0, pageSize: 2, count: 2, outcome: "ok" },
      { page: 2, pageSize: 2, count: 1, outcome: "ok" },
      { page: 3, pageSize: 2, count: 0, outcome: "ok" },
    ])
  })

  it("fails configured pages for the configured number of attempts", async () => {
    const source = new InMemoryDataSource(["a", "b", "c"], { failPages: [1], failAttempts: 2 })

    await expect(source.fetch(1, 1, signal)).rejects.toThrow("Failed to load page 1")
    await expect(source.fetch(1, 1, signal)).rejects.toThrow("Failed to load page 1")
    await expect(source.fetch(1, 1, signal)).resolves.toEqual(["b"])

    expect(source.history.map((entry) => entry.outcome)).toEqual(["failed", "failed", "ok"])
  })

  it("records cancelled fetches", async () => {
    const source = new InMemoryDataSource(["a"], { latencyMs: 60_000 })
    const controller = new AbortController()
    const pending = source.fetch(0, 1, controller.signal)

    controller.abort("superseded")

    await expect(pending).rejects.toThrow("superseded")
    expect(source.history).toEqual([{ page: 0, pageSize: 1, count: 0, outcome: "cancelled" }])
  })
})

describe("createDemoItems", () => {
  it("numbers items from one with padded labels", () => {
    expect(createDemoItems(2)).toEqual([
      { id: 0, label: "Item #001" },
      { id: 1, label: "Item #002" },
    ])
    expect(createDemoItems(-3)).toEqual([])
  })
})
