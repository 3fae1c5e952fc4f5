import type { ListenerTarget } from "../types.js"

export type EventHandlers = Record<string, (event: Event) => void>

/**
 * Scoped event subscriptions on a single target.
 *
 * Every handler is attached in the constructor and detached together by
 * {@link EventListenerGuard.release}, which may be called any number of times.
 */
export class EventListenerGuard {
  #target: ListenerTarget
  #handlers: [string, (event: Event) => void][]
  #released: boolean

  constructor(target: ListenerTarget, handlers: EventHandlers) {
    this.#target = target
    this.#handlers = Object.entries(handlers)
    this.#released = false
    for (const [type, handler] of this.#handlers) {
      target.addEventListener(type, handler)
    }
  }

  get released(): boolean {
    return this.#released
  }

  release(): void {
    if (this.#released) return
    this.#released = true
    for (const [type, handler] of this.#handlers) {
      this.#target.removeEventListener(type, handler)
    }
  }
}
