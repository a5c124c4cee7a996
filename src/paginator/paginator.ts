import { SingleEvent } from "../events/single-event.js"
import { StateStore } from "../events/state-store.js"
import type { Listener, Unsubscribe } from "../events/types.js"
import {
  CancellationError,
  getErrorMessage,
  isCancellationError,
  raceAbort,
  toCancellationError,
  toError,
} from "../utils/cancel.js"
import { resolvePaginatorSettings, type PaginatorSettings } from "./settings.js"
import {
  createInitialState,
  loadingStarted,
  maximumReached,
  pageFailed,
  pageLoaded,
  type PaginatorState,
} from "./state.js"
import { SupervisorScope } from "./supervisor.js"
import {
  guardLog,
  type ActivitySignal,
  type DataSource,
  type PaginatorLog,
  type PaginatorOptions,
} from "./types.js"

interface InflightLoad {
  page: number
  generation: number
  controller: AbortController
}

/**
 * Drives incremental loading of pages from a {@link DataSource}.
 *
 * The paginator starts loading `defaultPage` as soon as it is constructed.
 * Every change of the internal page cursor dispatches one fetch; when the
 * cursor moves again before that fetch settles, the older fetch is abandoned
 * and only the latest page is merged. Failures never reach the caller: they
 * land in {@link PaginatorState.error} and on the {@link errors} channel.
 */
export class Paginator<T> {
  /** One-shot failures, each delivered to a single observer. */
  readonly errors: SingleEvent<Error>

  private readonly settings: PaginatorSettings
  private readonly log: PaginatorLog | undefined
  private readonly activity: ActivitySignal | undefined
  private readonly store: StateStore<PaginatorState<T>>
  private readonly cursor: StateStore<number>
  // Fetches and merges.
  private readonly reactorScope: SupervisorScope
  // loadNextPage / retry.
  private readonly commandScope: SupervisorScope

  private generation = 0
  private inflight: InflightLoad | null = null
  private settledPage: number | null = null
  private halted = false
  private disposed = false
  private readonly detach: Unsubscribe[] = []

  constructor(
    private readonly dataSource: DataSource<T>,
    options: PaginatorOptions = {},
  ) {
    this.settings = resolvePaginatorSettings(options)
    this.log = guardLog(options.log)
    this.activity = options.activity

    const reportListenerError = (error: unknown): void => {
      this.log?.("events", `Listener failed: ${getErrorMessage(error)}`)
    }
    this.errors = new SingleEvent<Error>({ onObserverError: reportListenerError })
    this.store = new StateStore(createInitialState<T>(this.settings.defaultPage), {
      onListenerError: reportListenerError,
    })
    this.cursor = new StateStore(this.settings.defaultPage, {
      onListenerError: reportListenerError,
    })

    const forwardFailure = (error: unknown): void => {
      this.errors.emit(toError(error))
    }
    this.reactorScope = new SupervisorScope({
      name: "reactor",
      onFailure: forwardFailure,
      log: this.log,
    })
    this.commandScope = new SupervisorScope({
      name: "command",
      onFailure: forwardFailure,
      log: this.log,
    })

    this.detach.push(
      this.cursor.subscribe((page) => {
        this.onPageChanged(page)
      }),
    )
    if (this.activity) {
      this.detach.push(
        this.activity.subscribe((active) => {
          this.onActivityChanged(active)
        }),
      )
    }
  }

  get state(): PaginatorState<T> {
    return this.store.value
  }

  get pageSize(): number {
    return this.settings.pageSize
  }

  get maxPage(): number {
    return this.settings.maxPage
  }

  /** Replays the latest snapshot, then every later one in order. */
  subscribe(listener: Listener<PaginatorState<T>>): Unsubscribe {
    return this.store.subscribe(listener)
  }

  onError(observer: Listener<Error>): Unsubscribe {
    return this.errors.observe(observer)
  }

  /**
   * Requests the page after the current one. Ignored while a page is loading,
   * once the maximum page was reached, and after {@link dispose}.
   */
  loadNextPage(): void {
    if (this.disposed || this.store.value.isLoading) {
      return
    }
    this.commandScope.launch(() => {
      const { currentPage, maximumReached: reached } = this.store.value
      if (!reached && currentPage <= this.settings.maxPage) {
        this.cursor.update((page) => page + 1)
      }
    })
  }

  /** Loads the current page again after it failed. */
  retry(): void {
    if (!this.canRetry()) {
      return
    }
    this.commandScope.launch(() => {
      if (this.canRetry()) {
        this.log?.("command", `retrying page ${this.cursor.value}`)
        this.dispatch(this.cursor.value)
      }
    })
  }

  /** Resolves once no fetch or command is outstanding. */
  async whenIdle(): Promise<void> {
    while (this.reactorScope.busy || this.commandScope.busy) {
      await Promise.all([this.reactorScope.whenIdle(), this.commandScope.whenIdle()])
    }
  }

  /** Cancels outstanding work and stops reacting. Snapshots already emitted stay valid. */
  dispose(): void {
    if (this.disposed) {
      return
    }
    this.disposed = true
    this.halted = true
    for (const unsubscribe of this.detach.splice(0)) {
      unsubscribe()
    }
    this.abortInflight("paginator disposed")
    this.commandScope.cancel()
    this.reactorScope.cancel()
  }

  private canRetry(): boolean {
    const { isLoading, error } = this.store.value
    return !this.disposed && !this.halted && this.isActive() && !isLoading && error !== null
  }

  private isActive(): boolean {
    return this.activity?.isActive ?? true
  }

  private onPageChanged(page: number): void {
    if (this.halted) {
      return
    }
    if (!this.isActive()) {
      this.abortInflight(`page ${page} requested while inactive`)
      this.log?.("reactor", `page ${page} deferred until resumed`)
      return
    }
    this.dispatch(page)
  }

  private onActivityChanged(active: boolean): void {
    if (this.halted) {
      return
    }
    if (!active) {
      this.abortInflight("paginator paused")
      return
    }
    const page = this.cursor.value
    if (this.inflight === null && this.settledPage !== page) {
      this.log?.("reactor", `resuming page ${page}`)
      this.dispatch(page)
    }
  }

  private dispatch(page: number): void {
    this.abortInflight(`superseded by page ${page}`)

    if (page >= this.settings.maxPage) {
      this.halted = true
      this.settledPage = page
      this.store.update(maximumReached)
      this.log?.("reactor", `maximum page ${this.settings.maxPage} reached`)
      return
    }

    this.generation += 1
    const load: InflightLoad = {
      page,
      generation: this.generation,
      controller: new AbortController(),
    }
    this.inflight = load
    this.store.update(loadingStarted)
    this.log?.("reactor", `loading page ${page}`)
    this.reactorScope.launch(async (signal) => {
      try {
        await this.load(load, signal)
      } finally {
        if (this.inflight === load) {
          this.inflight = null
        }
      }
    }, load.controller.signal)
  }

  private async load(load: InflightLoad, signal: AbortSignal): Promise<void> {
    let items: readonly T[]
    try {
      items = await raceAbort(
        this.dataSource.fetch(load.page, this.settings.pageSize, signal),
        signal,
      )
    } catch (error: unknown) {
      if (signal.aborted) {
        throw toCancellationError(signal)
      }
      this.settledPage = load.page
      this.store.update((state) => pageFailed(state, load.page, getErrorMessage(error)))
      // The source's own abort is a failed page, not a supersede.
      if (isCancellationError(error)) {
        throw new Error(getErrorMessage(error), { cause: error })
      }
      throw error
    }

    if (load.generation !== this.generation) {
      throw new CancellationError(`page ${load.page} result discarded`)
    }
    this.settledPage = load.page
    this.store.update((state) => pageLoaded(state, load.page, items))
    this.log?.("reactor", `page ${load.page} merged (${items.length} items)`)
  }

  private abortInflight(reason: string): void {
    const load = this.inflight
    if (!load) {
      return
    }
    this.inflight = null
    this.log?.("reactor", `page ${load.page} cancelled: ${reason}`)
    load.controller.abort(new CancellationError(reason))
  }
}
