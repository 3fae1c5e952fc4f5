import type { StorageError } from "../errors.js"

export type FutureState<T> =
  | { status: "pending" }
  | { status: "fulfilled"; value: T }
  | { status: "rejected"; error: StorageError }

export type SettledState<T> = Exclude<FutureState<T>, { status: "pending" }>

type Waiter<T> = {
  resolve: (value: T) => void
  reject: (error: StorageError) => void
}

/**
 * Explicit pending/settled holder behind every future in this package.
 *
 * The state moves out of `pending` once. Promises are only created when a caller
 * awaits, so a rejection nobody observes never surfaces as an unhandled rejection.
 */
export abstract class Future<T> implements PromiseLike<T> {
  #state: FutureState<T> = { status: "pending" }
  #waiters: Waiter<T>[] = []

  get status(): FutureState<T>["status"] {
    return this.#state.status
  }

  /**
   * Whether some caller is currently awaiting this future
   */
  protected get observed(): boolean {
    return this.#waiters.length > 0
  }

  /**
   * @returns `false` if the future had already settled
   */
  protected settle(state: SettledState<T>): boolean {
    if (this.#state.status !== "pending") return false
    this.#state = state

    const waiters = this.#waiters
    this.#waiters = []
    for (const waiter of waiters) {
      if (state.status === "fulfilled") waiter.resolve(state.value)
      else waiter.reject(state.error)
    }
    return true
  }

  then<R1 = T, R2 = never>(
    onfulfilled?: ((value: T) => R1 | PromiseLike<R1>) | null,
    onrejected?: ((reason: unknown) => R2 | PromiseLike<R2>) | null
  ): Promise<R1 | R2> {
    return new Promise<T>((resolve, reject) => {
      const state = this.#state
      switch (state.status) {
        case "pending":
          this.#waiters.push({ resolve, reject })
          break
        case "fulfilled":
          resolve(state.value)
          break
        case "rejected":
          reject(state.error)
          break
      }
    }).then(onfulfilled, onrejected)
  }

  catch<R = never>(onrejected?: ((reason: unknown) => R | PromiseLike<R>) | null): Promise<T | R> {
    return this.then(undefined, onrejected)
  }
}
