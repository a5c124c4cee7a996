import { Command } from "commander"
import { z } from "zod"

import { readEnvConfig } from "./config.js"
import { Paginator } from "./paginator/paginator.js"
import { DEFAULT_PAGE_NUMBER, DEFAULT_PAGE_SIZE, MAX_PAGE } from "./paginator/settings.js"
import type { PaginatorLog } from "./paginator/types.js"
import type { CliRenderer } from "./rendering/types.js"
import { createDemoItems, type DemoItem } from "./sources/demo-items.js"
import { InMemoryDataSource } from "./sources/in-memory-source.js"
import { throwIfAborted } from "./utils/cancel.js"

export interface CliOptions {
  pageSize: number
  maxPage: number
  defaultPage: number
  totalItems: number
  latencyMs: number
  failPages: number[]
  failAttempts: number
  retryFailed: boolean
  scrolls: number
  plain: boolean
  verbose: boolean
}

const integerOption = (min: number, max: number) =>
  z
    .union([z.string(), z.number()])
    .transform((v) => Number(v))
    .pipe(z.number().int().min(min).max(max))

const cliOptionsSchema = z.object({
  pageSize: integerOption(1, 1000),
  maxPage: integerOption(0, 10_000),
  defaultPage: integerOption(0, 10_000),
  totalItems: integerOption(0, 1_000_000),
  latencyMs: integerOption(0, 60_000),
  failPages: z.preprocess(
    (val) => (Array.isArray(val) ? val.map((v) => String(v)) : []),
    z.array(integerOption(0, 10_000)),
  ),
  failAttempts: integerOption(1, 100),
  retryFailed: z.boolean().default(false),
  scrolls: integerOption(0, 10_000),
  plain: z.boolean().default(false),
  verbose: z.boolean().default(false),
})

export const createProgram = (): Command => {
  const env = readEnvConfig()
  const program = new Command()
  program
    .name("pagewise")
    .description("Scroll through an in-memory data source with an incremental paginator")
    .option("--page-size <number>", "Items per page", env.pageSize ?? String(DEFAULT_PAGE_SIZE))
    .option("--max-page <number>", "Page index that ends pagination", env.maxPage ?? String(MAX_PAGE))
    .option(
      "--default-page <number>",
      "Page loaded on startup",
      env.defaultPage ?? String(DEFAULT_PAGE_NUMBER),
    )
    .option("--total-items <number>", "Items available in the data source", "45")
    .option("--latency-ms <number>", "Simulated latency per fetch", env.latencyMs ?? "150")
    .option("--fail-pages <pages...>", "Pages whose fetch fails")
    .option("--fail-attempts <number>", "Failed attempts per failing page", "1")
    .option("--retry-failed", "Retry a page when its fetch fails", false)
    .option("--scrolls <number>", "Number of scroll-to-end events to simulate", "12")
    .option("--plain", "Plain output without colors or spinners", false)
    .option("--verbose", "Show paginator logs", false)
  return program
}

export const parseOptions = (program: Command): CliOptions => {
  const opts = program.opts<Record<string, unknown>>()
  const parsed = cliOptionsSchema.safeParse({
    pageSize: opts["pageSize"],
    maxPage: opts["maxPage"],
    defaultPage: opts["defaultPage"],
    totalItems: opts["totalItems"],
    latencyMs: opts["latencyMs"],
    failPages: opts["failPages"],
    failAttempts: opts["failAttempts"],
    retryFailed: opts["retryFailed"] ?? false,
    scrolls: opts["scrolls"],
    plain: opts["plain"] ?? false,
    verbose: opts["verbose"] ?? false,
  })
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const path = issue.path.join(".")
    throw new Error(`Invalid option${path ? ` (${path})` : ""}: ${issue.message}`)
  }
  return parsed.data
}

/**
 * Plays the UI layer: renders every snapshot, toasts every error and fires a
 * scroll-to-end event each time the previous page settled.
 */
export const runDemo = async (
  options: CliOptions,
  renderer: CliRenderer,
  signal: AbortSignal,
): Promise<number> => {
  const t0 = Date.now()
  const log: PaginatorLog | undefined = options.verbose
    ? (scope, message) => {
        renderer.logVerbose(scope, message, (Date.now() - t0) / 1000)
      }
    : undefined

  const source = new InMemoryDataSource<DemoItem>(createDemoItems(options.totalItems), {
    latencyMs: options.latencyMs,
    failPages: options.failPages,
    failAttempts: options.failAttempts,
  })

  renderer.header({
    pageSize: options.pageSize,
    maxPage: options.maxPage,
    defaultPage: options.defaultPage,
    totalItems: options.totalItems,
    latencyMs: options.latencyMs,
    scrolls: options.scrolls,
  })

  const paginator = new Paginator(source, {
    pageSize: options.pageSize,
    maxPage: options.maxPage,
    defaultPage: options.defaultPage,
    log,
  })
  const onAbort = () => {
    paginator.dispose()
  }
  signal.addEventListener("abort", onAbort, { once: true })
  const unsubscribeState = paginator.subscribe((state) => {
    renderer.snapshot(state)
  })
  const unsubscribeErrors = paginator.onError((error) => {
    renderer.errorToast(error.message)
    if (options.retryFailed) {
      paginator.retry()
    }
  })

  try {
    await paginator.whenIdle()
    for (let scroll = 0; scroll < options.scrolls; scroll += 1) {
      throwIfAborted(signal)
      if (paginator.state.maximumReached) {
        break
      }
      paginator.loadNextPage()
      await paginator.whenIdle()
    }
    throwIfAborted(signal)
    renderer.summary({ state: paginator.state, fetches: source.history })
    return 0
  } finally {
    signal.removeEventListener("abort", onAbort)
    unsubscribeState()
    unsubscribeErrors()
    paginator.dispose()
  }
}
