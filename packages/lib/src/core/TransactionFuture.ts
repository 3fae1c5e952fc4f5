import type { TransactionState, TransactionTarget } from "../types.js"
import { StorageError, StorageErrorKind, toStorageError } from "../errors.js"
import { EventListenerGuard } from "./EventListenerGuard.js"
import { Future, type SettledState } from "./Future.js"

/**
 * Observes a transaction until its first terminal signal.
 *
 * - `complete` fulfils
 * - `abort` rejects with `Aborted`
 * - an `error` nobody handled rejects with that error's classification
 *
 * Whatever fires afterwards is ignored. Requests issued inside the transaction
 * are not touched; they settle on their own.
 */
export class TransactionFuture extends Future<void> {
  #guard: EventListenerGuard | null = null

  private constructor() {
    super()
  }

  static observe(transaction: TransactionTarget): TransactionFuture {
    const future = new TransactionFuture()
    future.#guard = new EventListenerGuard(transaction, {
      complete: () => future.#finish({ status: "fulfilled", value: undefined }),
      abort: () => future.#finish({ status: "rejected", error: abortError(transaction.error) }),
      error: (event) => {
        // handled by whoever awaited the request
        if (event.defaultPrevented) return
        future.#finish({
          status: "rejected",
          error: toStorageError(errorOf(event.target) ?? transaction.error, "transaction failed"),
        })
      },
    })
    return future
  }

  static rejected(error: StorageError): TransactionFuture {
    const future = new TransactionFuture()
    future.settle({ status: "rejected", error })
    return future
  }

  get state(): TransactionState {
    switch (this.status) {
      case "pending":
        return "active"
      case "fulfilled":
        return "committed"
      case "rejected":
        return "aborted"
    }
  }

  #finish(state: SettledState<void>) {
    this.settle(state)
    this.#guard?.release()
  }
}

function abortError(cause: DOMException | null): StorageError {
  const message = cause ? `transaction was aborted (${cause.name})` : "transaction was aborted"
  return new StorageError(StorageErrorKind.Aborted, message, { cause: cause ?? undefined })
}

function errorOf(target: EventTarget | null): unknown {
  if (typeof target === "object" && target !== null && "error" in target) {
    return target.error
  }
  return null
}
