import type { Listener, ListenerErrorHandler, Unsubscribe } from "./types.js"

export interface SingleEventOptions {
  onObserverError?: ListenerErrorHandler
}

/**
 * One-shot notification channel. Each emitted value is handed to exactly one
 * observer, the earliest attached, and never redelivered.
 *
 * With nobody observing, the latest value is held (capacity 1) and handed to
 * the next observer that attaches.
 */
export class SingleEvent<T> {
  private pending: { value: T } | null = null
  private readonly observers: Listener<T>[] = []

  constructor(private readonly options: SingleEventOptions = {}) {}

  get hasPending(): boolean {
    return this.pending !== null
  }

  emit(value: T): void {
    const observer = this.observers.at(0)
    if (!observer) {
      this.pending = { value }
      return
    }
    this.deliver(observer, value)
  }

  observe(observer: Listener<T>): Unsubscribe {
    this.observers.push(observer)
    const pending = this.pending
    if (pending && this.observers.length === 1) {
      this.pending = null
      this.deliver(observer, pending.value)
    }
    return () => {
      const index = this.observers.indexOf(observer)
      if (index !== -1) {
        this.observers.splice(index, 1)
      }
    }
  }

  private deliver(observer: Listener<T>, value: T): void {
    try {
      observer(value)
    } catch (error: unknown) {
      if (!this.options.onObserverError) {
        throw error
      }
      this.options.onObserverError(error)
    }
  }
}
