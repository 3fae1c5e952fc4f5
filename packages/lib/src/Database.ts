import type { DatabaseContext, OpenDatabaseConfig, Query, TransactionOptions } from "./types.js"
import type { ObjectStore } from "./ObjectStore.js"
import type { RequestFuture } from "./core/RequestFuture.js"
import { StorageError, StorageErrorKind } from "./errors.js"
import { EventListenerGuard } from "./core/EventListenerGuard.js"
import { Transaction } from "./Transaction.js"
import { isVersionChangeEvent } from "./utils.js"

const closeConnection = (db: Database) => db.close()

/**
 * An open connection, as returned by `openDatabase`.
 *
 * The single-store helpers (`get`, `put`, ...) each run in a transaction of their
 * own; writes resolve once that transaction has committed.
 */
export class Database {
  #native: IDBDatabase
  #context: DatabaseContext
  #guard: EventListenerGuard
  #closed: boolean

  constructor(
    native: IDBDatabase,
    context: DatabaseContext,
    onVersionChange: OpenDatabaseConfig["onVersionChange"] = closeConnection
  ) {
    this.#native = native
    this.#context = context
    this.#closed = false
    this.#guard = new EventListenerGuard(native, {
      versionchange: (event) => {
        if (isVersionChangeEvent(event)) onVersionChange(this, event)
      },
      // the engine closed the connection on its own (storage cleared, ...)
      close: () => this.#markClosed(),
    })
  }

  get name(): string {
    return this.#native.name
  }

  get version(): number {
    return this.#native.version
  }

  get storeNames(): string[] {
    return Array.from(this.#native.objectStoreNames)
  }

  get closed(): boolean {
    return this.#closed
  }

  get native(): IDBDatabase {
    return this.#native
  }

  transaction(
    storeNames: string | string[],
    mode: IDBTransactionMode = "readonly",
    options?: TransactionOptions
  ): Transaction {
    const names = typeof storeNames === "string" ? [storeNames] : storeNames
    if (this.#closed) {
      const error = new StorageError(
        StorageErrorKind.InvalidState,
        `database "${this.name}" is closed`
      )
      return Transaction.failed(error, names, mode, this.#context)
    }
    return Transaction.open(this.#native, names, mode, options, this.#context)
  }

  get<V = unknown>(storeName: string, query: Query): RequestFuture<V | null> {
    return this.#read<V>(storeName).get(query)
  }

  getAll<V = unknown>(storeName: string, query?: Query | null, count?: number): RequestFuture<V[]> {
    return this.#read<V>(storeName).getAll(query, count)
  }

  count(storeName: string, query?: Query): RequestFuture<number> {
    return this.#read(storeName).count(query)
  }

  /**
   * Writes `value` under `key`, replacing any record there. For stores with
   * out-of-line keys; use {@link Database.putValue} when the store has a key path.
   */
  put<V>(storeName: string, key: IDBValidKey, value: V): Promise<IDBValidKey> {
    return this.#write<V, IDBValidKey>(storeName, (store) => store.put(value, key))
  }

  /**
   * Like {@link Database.put}, but rejects with `ConstraintViolation` if `key` is taken
   */
  add<V>(storeName: string, key: IDBValidKey, value: V): Promise<IDBValidKey> {
    return this.#write<V, IDBValidKey>(storeName, (store) => store.add(value, key))
  }

  /**
   * Writes `value` to a store whose key comes from its key path or generator
   */
  putValue<V>(storeName: string, value: V): Promise<IDBValidKey> {
    return this.#write<V, IDBValidKey>(storeName, (store) => store.put(value))
  }

  addValue<V>(storeName: string, value: V): Promise<IDBValidKey> {
    return this.#write<V, IDBValidKey>(storeName, (store) => store.add(value))
  }

  delete(storeName: string, query: Query): Promise<void> {
    return this.#write<unknown, void>(storeName, (store) => store.delete(query))
  }

  clear(storeName: string): Promise<void> {
    return this.#write<unknown, void>(storeName, (store) => store.clear())
  }

  close(): void {
    this.#native.close()
    this.#markClosed()
  }

  #read<V = unknown>(storeName: string): ObjectStore<V> {
    return this.transaction(storeName, "readonly").objectStore<V>(storeName)
  }

  async #write<V, T>(
    storeName: string,
    operation: (store: ObjectStore<V>) => PromiseLike<T>
  ): Promise<T> {
    const tx = this.transaction(storeName, "readwrite")
    const result = await tx.run(() => operation(tx.objectStore<V>(storeName)))
    return result
  }

  #markClosed() {
    this.#closed = true
    this.#guard.release()
  }
}
