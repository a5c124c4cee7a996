import type { Listener, ListenerErrorHandler, Unsubscribe } from "./types.js"

export interface StateStoreOptions<T> {
  /** Values considered equal to the current one are dropped. Defaults to `Object.is`. */
  equals?: (current: T, next: T) => boolean
  onListenerError?: ListenerErrorHandler
}

/**
 * Holds a current value and broadcasts every change to its listeners.
 * New listeners receive the latest value straight away.
 *
 * Values set from inside a listener are queued, so every listener observes
 * the same total order of values.
 */
export class StateStore<T> {
  private current: T
  private readonly listeners = new Set<Listener<T>>()
  private readonly queue: T[] = []
  private draining = false
  private readonly equals: (current: T, next: T) => boolean

  constructor(
    initial: T,
    private readonly options: StateStoreOptions<T> = {},
  ) {
    this.current = initial
    this.equals = options.equals ?? Object.is
  }

  get value(): T {
    return this.current
  }

  get listenerCount(): number {
    return this.listeners.size
  }

  set(next: T): boolean {
    if (this.equals(this.current, next)) {
      return false
    }
    this.current = next
    this.dispatch(next)
    return true
  }

  update(transform: (current: T) => T): T {
    this.set(transform(this.current))
    return this.current
  }

  subscribe(listener: Listener<T>): Unsubscribe {
    this.listeners.add(listener)
    this.notify(listener, this.current)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private dispatch(value: T): void {
    this.queue.push(value)
    if (this.draining) {
      return
    }
    this.draining = true
    try {
      while (this.queue.length > 0) {
        const [next] = this.queue.splice(0, 1)
        for (const listener of [...this.listeners]) {
          if (this.listeners.has(listener)) {
            this.notify(listener, next)
          }
        }
      }
    } finally {
      this.draining = false
    }
  }

  private notify(listener: Listener<T>, value: T): void {
    try {
      listener(value)
    } catch (error: unknown) {
      if (!this.options.onListenerError) {
        throw error
      }
      this.options.onListenerError(error)
    }
  }
}
