import { StateStore } from "../events/state-store.js"
import type { Unsubscribe } from "../events/types.js"
import type { ActivitySignal } from "./types.js"

/** Manually driven {@link ActivitySignal}. */
export class ActivityToggle implements ActivitySignal {
  private readonly store: StateStore<boolean>

  constructor(active = true) {
    this.store = new StateStore(active)
  }

  get isActive(): boolean {
    return this.store.value
  }

  subscribe(listener: (active: boolean) => void): Unsubscribe {
    return this.store.subscribe(listener)
  }

  pause(): void {
    this.store.set(false)
  }

  resume(): void {
    this.store.set(true)
  }
}
