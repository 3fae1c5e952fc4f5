import type { Query } from "./types.js"
import type { RequestFuture } from "./core/RequestFuture.js"
import { toStorageError } from "./errors.js"
import { QuerySource } from "./QuerySource.js"
import { Index } from "./StoreIndex.js"

export class ObjectStore<V = unknown> extends QuerySource<V, IDBObjectStore> {
  get indexNames(): string[] {
    return Array.from(this.#store().indexNames)
  }

  /**
   * `null` for stores with out-of-line keys
   */
  get keyPath(): string | string[] | null {
    return this.#store().keyPath
  }

  get autoIncrement(): boolean {
    return this.#store().autoIncrement
  }

  /**
   * Writes `value`, replacing any record at the same key
   */
  put(value: V, key?: IDBValidKey): RequestFuture<IDBValidKey> {
    return this.transaction.request(
      () => this.source().put(value, key),
      (storedKey) => storedKey
    )
  }

  /**
   * Writes `value`; rejects with `ConstraintViolation` if the key is taken
   */
  add(value: V, key?: IDBValidKey): RequestFuture<IDBValidKey> {
    return this.transaction.request(
      () => this.source().add(value, key),
      (storedKey) => storedKey
    )
  }

  delete(query: Query): RequestFuture<void> {
    return this.transaction.request<undefined, void>(
      () => this.source().delete(query),
      () => undefined
    )
  }

  clear(): RequestFuture<void> {
    return this.transaction.request<undefined, void>(
      () => this.source().clear(),
      () => undefined
    )
  }

  index(name: string): Index<V> {
    return new Index<V>(this.transaction, name, () => this.source().index(name))
  }

  /**
   * Only available while migrating.
   * @see https://developer.mozilla.org/en-US/docs/Web/API/IDBObjectStore/createIndex
   */
  createIndex(name: string, keyPath: string | string[], options?: IDBIndexParameters): Index<V> {
    try {
      this.#store().createIndex(name, keyPath, options)
    } catch (error) {
      throw toStorageError(error)
    }
    return this.index(name)
  }

  /**
   * Only available while migrating.
   */
  deleteIndex(name: string): void {
    try {
      this.#store().deleteIndex(name)
    } catch (error) {
      throw toStorageError(error)
    }
  }

  #store(): IDBObjectStore {
    try {
      return this.source()
    } catch (error) {
      throw toStorageError(error)
    }
  }
}
