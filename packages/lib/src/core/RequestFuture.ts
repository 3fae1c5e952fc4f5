import type { RequestTarget } from "../types.js"
import { StorageError, StorageErrorKind, toStorageError } from "../errors.js"
import { EventListenerGuard } from "./EventListenerGuard.js"
import { Future, type SettledState } from "./Future.js"

export type RequestFutureOptions = {
  /**
   * Stops observing the request once aborted, e.g. `AbortSignal.timeout(5_000)`.
   * The request itself keeps running; its outcome is discarded.
   */
  signal?: AbortSignal
}

const identity = <T>(value: T): T => value

/**
 * Future over a single one-shot IndexedDB request.
 *
 * Settles exactly once with the request's result or a {@link StorageError}.
 * Errors are marked as handled only when somebody is awaiting the future when
 * they arrive; otherwise the engine escalates them to the transaction.
 */
export class RequestFuture<T> extends Future<T> {
  #guards: EventListenerGuard[] = []
  #request: RequestTarget<unknown> | null = null

  private constructor() {
    super()
  }

  static wrap<T>(request: RequestTarget<T>, options?: RequestFutureOptions): RequestFuture<T> {
    return RequestFuture.wrapWith<T, T>(request, identity, options)
  }

  static wrapWith<R, T>(
    request: RequestTarget<R>,
    map: (result: R) => T,
    options: RequestFutureOptions = {}
  ): RequestFuture<T> {
    const future = new RequestFuture<T>()
    future.#attach(request, map, options.signal)
    return future
  }

  /**
   * Creates the request and wraps it. A synchronous throw from `issue` becomes a
   * rejected future.
   */
  static issue<T>(issue: () => RequestTarget<T>, options?: RequestFutureOptions): RequestFuture<T> {
    return RequestFuture.issueWith<T, T>(issue, identity, options)
  }

  static issueWith<R, T>(
    issue: () => RequestTarget<R>,
    map: (result: R) => T,
    options?: RequestFutureOptions
  ): RequestFuture<T> {
    let request: RequestTarget<R>
    try {
      request = issue()
    } catch (error) {
      return RequestFuture.rejected(toStorageError(error))
    }
    return RequestFuture.wrapWith(request, map, options)
  }

  static resolved<T>(value: T): RequestFuture<T> {
    const future = new RequestFuture<T>()
    future.settle({ status: "fulfilled", value })
    return future
  }

  static rejected<T>(error: StorageError): RequestFuture<T> {
    const future = new RequestFuture<T>()
    future.settle({ status: "rejected", error })
    return future
  }

  /**
   * Stops observing the request. Pending awaiters reject with `Aborted`. The
   * request keeps running; its outcome is discarded, and an error it reports
   * later is marked handled so it does not abort the transaction.
   * @returns `false` if the future had already settled
   */
  cancel(reason?: unknown): boolean {
    const cancelled = this.settle({
      status: "rejected",
      error: new StorageError(StorageErrorKind.Aborted, "request observation was cancelled", {
        cause: reason,
      }),
    })
    this.#release()
    if (cancelled) this.#discardOutcome()
    return cancelled
  }

  #attach<R>(request: RequestTarget<R>, map: (result: R) => T, signal?: AbortSignal) {
    this.#request = request
    if (signal?.aborted) {
      this.cancel(signal.reason)
      return
    }
    // the event may have fired before we got here
    if (request.readyState === "done") {
      this.#finish(resultOf(request, map))
      return
    }

    this.#guards.push(
      new EventListenerGuard(request, {
        success: () => this.#finish(resultOf(request, map)),
        error: (event) => {
          if (this.status === "pending" && this.observed) {
            event.preventDefault()
            event.stopPropagation()
          }
          this.#finish({
            status: "rejected",
            error: toStorageError(request.error, "request failed without reporting an error"),
          })
        },
      })
    )
    if (signal) {
      this.#guards.push(new EventListenerGuard(signal, { abort: () => this.cancel(signal.reason) }))
    }
  }

  #finish(state: SettledState<T>) {
    this.settle(state)
    this.#release()
  }

  #release() {
    for (const guard of this.#guards) guard.release()
    this.#guards = []
  }

  #discardOutcome() {
    const request = this.#request
    if (request === null || request.readyState === "done") return
    const guard: EventListenerGuard = new EventListenerGuard(request, {
      success: () => guard.release(),
      error: (event) => {
        event.preventDefault()
        event.stopPropagation()
        guard.release()
      },
    })
  }
}

function resultOf<R, T>(request: RequestTarget<R>, map: (result: R) => T): SettledState<T> {
  try {
    if (request.error) {
      return { status: "rejected", error: toStorageError(request.error) }
    }
    return { status: "fulfilled", value: map(request.result) }
  } catch (error) {
    return { status: "rejected", error: toStorageError(error) }
  }
}
