import type { DatabaseContext, RequestTarget, TransactionOptions, TransactionState } from "./types.js"
import { StorageError, StorageErrorKind, toStorageError } from "./errors.js"
import { RequestFuture, type RequestFutureOptions } from "./core/RequestFuture.js"
import { TransactionFuture } from "./core/TransactionFuture.js"
import { ObjectStore } from "./ObjectStore.js"

/**
 * A unit of work over one or more object stores.
 *
 * The engine commits it once its queue of requests drains and aborts it on the
 * first error nobody handled. {@link Transaction.future} reports which of the two
 * happened.
 */
export class Transaction {
  readonly storeNames: string[]
  readonly mode: IDBTransactionMode
  #native: IDBTransaction | null
  #future: TransactionFuture
  #failure: StorageError | null
  #context: DatabaseContext

  private constructor(
    native: IDBTransaction | null,
    failure: StorageError | null,
    future: TransactionFuture,
    storeNames: string[],
    mode: IDBTransactionMode,
    context: DatabaseContext
  ) {
    this.#native = native
    this.#failure = failure
    this.#future = future
    this.storeNames = storeNames
    this.mode = mode
    this.#context = context
  }

  /**
   * Starts a transaction on `db`. If the engine refuses (unknown store, closing
   * connection...), the transaction comes back already failed and every request
   * issued on it rejects with that failure.
   */
  static open(
    db: IDBDatabase,
    storeNames: string[],
    mode: IDBTransactionMode,
    options: TransactionOptions | undefined,
    context: DatabaseContext
  ): Transaction {
    try {
      return Transaction.observe(db.transaction(storeNames, mode, options), context)
    } catch (error) {
      return Transaction.failed(toStorageError(error), storeNames, mode, context)
    }
  }

  static observe(native: IDBTransaction, context: DatabaseContext): Transaction {
    return new Transaction(
      native,
      null,
      TransactionFuture.observe(native),
      Array.from(native.objectStoreNames),
      native.mode,
      context
    )
  }

  static failed(
    error: StorageError,
    storeNames: string[],
    mode: IDBTransactionMode,
    context: DatabaseContext
  ): Transaction {
    return new Transaction(null, error, TransactionFuture.rejected(error), storeNames, mode, context)
  }

  get state(): TransactionState {
    return this.#future.state
  }

  /**
   * The underlying `IDBTransaction`, or `null` if it could not be created
   */
  get native(): IDBTransaction | null {
    return this.#native
  }

  /**
   * Why the transaction failed, or `null` while it is active, once it committed,
   * or when it was aborted explicitly
   */
  get error(): StorageError | null {
    if (this.#failure) return this.#failure
    const error = this.#native?.error
    return error ? toStorageError(error) : null
  }

  future(): TransactionFuture {
    return this.#future
  }

  objectStore<V = unknown>(name: string): ObjectStore<V> {
    return new ObjectStore<V>(this, name, () => this.#require().objectStore(name))
  }

  /**
   * @internal
   * Issues a request in this transaction, or rejects with `InvalidState` once it
   * has committed or aborted.
   */
  request<R, T>(
    issue: () => RequestTarget<R>,
    map: (result: R) => T,
    options?: RequestFutureOptions
  ): RequestFuture<T> {
    const unavailable = this.#unavailable()
    if (unavailable) return RequestFuture.rejected(unavailable)
    return RequestFuture.issueWith(issue, map, options)
  }

  /**
   * @internal
   */
  compareKeys(a: IDBValidKey, b: IDBValidKey): number {
    return this.#context.factory.cmp(a, b)
  }

  /**
   * Rolls the transaction back. Does nothing once it has committed or aborted.
   */
  abort(): void {
    if (this.#native === null || this.state !== "active") return
    try {
      this.#native.abort()
    } catch (error) {
      this.#context.onError("[idb-futures]: error aborting transaction", error)
    }
  }

  /**
   * Asks the engine to commit without waiting for the queue to drain.
   */
  commit(): void {
    if (this.#native === null || this.state !== "active") return
    try {
      this.#native.commit()
    } catch (error) {
      this.#context.onError("[idb-futures]: error committing transaction", error)
    }
  }

  /**
   * Runs `callback` and waits for the transaction to commit. If the callback
   * throws, the transaction is aborted and the error rethrown.
   */
  async run<R>(callback: (transaction: this) => R | PromiseLike<R>): Promise<Awaited<R>> {
    try {
      const result = await callback(this)
      await this.#future
      return result
    } catch (error) {
      this.abort()
      throw error
    }
  }

  #unavailable(): StorageError | null {
    if (this.#failure) return this.#failure
    switch (this.state) {
      case "active":
        return null
      case "committed":
        return new StorageError(StorageErrorKind.InvalidState, "transaction has already committed")
      case "aborted":
        return new StorageError(StorageErrorKind.InvalidState, "transaction has already been aborted")
    }
  }

  #require(): IDBTransaction {
    if (this.#native === null) {
      throw this.#failure ?? new StorageError(StorageErrorKind.InvalidState, "transaction unavailable")
    }
    return this.#native
  }
}
