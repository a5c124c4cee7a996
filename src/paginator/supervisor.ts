import { CancellationError, getErrorMessage, isCancellationError, throwIfAborted } from "../utils/cancel.js"
import { guardLog, type PaginatorLog } from "./types.js"

export type JobBody = (signal: AbortSignal) => Promise<void> | void

export interface SupervisorScopeConfig {
  name: string
  /** Receives every failure that is not a cancellation, once. */
  onFailure: (error: unknown) => void
  log?: PaginatorLog
}

/**
 * A lane of independent units of work. Each unit runs deferred, inside its
 * own failure boundary: a unit that throws is logged and reported, and never
 * affects its siblings or the code that launched it.
 */
export class SupervisorScope {
  private readonly controller = new AbortController()
  private readonly running = new Set<Promise<void>>()
  private readonly log: PaginatorLog | undefined

  constructor(private readonly config: SupervisorScopeConfig) {
    this.log = guardLog(config.log)
  }

  get name(): string {
    return this.config.name
  }

  get busy(): boolean {
    return this.running.size > 0
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted
  }

  /**
   * Schedules `body`. The signal it receives aborts when either the scope is
   * cancelled or `signal` aborts.
   */
  launch(body: JobBody, signal?: AbortSignal): void {
    const jobSignal = signal
      ? AbortSignal.any([this.controller.signal, signal])
      : this.controller.signal
    const job = this.run(body, jobSignal).finally(() => {
      this.running.delete(job)
    })
    this.running.add(job)
  }

  cancel(reason = `${this.config.name} scope cancelled`): void {
    if (this.cancelled) {
      return
    }
    this.controller.abort(new CancellationError(reason))
  }

  async whenIdle(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running])
    }
  }

  private async run(body: JobBody, signal: AbortSignal): Promise<void> {
    await Promise.resolve()
    try {
      throwIfAborted(signal)
      await body(signal)
    } catch (error: unknown) {
      this.log?.(this.config.name, `Caught ${getErrorMessage(error)}`)
      if (isCancellationError(error)) {
        return
      }
      this.config.onFailure(error)
    }
  }
}
