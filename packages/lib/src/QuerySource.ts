import type { Query } from "./types.js"
import type { Transaction } from "./Transaction.js"
import type { RequestFuture } from "./core/RequestFuture.js"
import { CursorStream } from "./core/CursorStream.js"

/**
 * Read operations shared by object stores and indexes
 */
export abstract class QuerySource<V, S extends IDBObjectStore | IDBIndex> {
  constructor(
    protected transaction: Transaction,
    public name: string,
    protected source: () => S
  ) {}

  /**
   * Resolves `null` when no record matches; a missing key is not an error.
   */
  get(query: Query): RequestFuture<V | null> {
    return this.transaction.request(
      () => this.source().get(query),
      (value: V | undefined): V | null => value ?? null
    )
  }

  getKey(query: Query): RequestFuture<IDBValidKey | null> {
    return this.transaction.request(
      () => this.source().getKey(query),
      (key) => key ?? null
    )
  }

  getAll(query?: Query | null, count?: number): RequestFuture<V[]> {
    return this.transaction.request(
      () => this.source().getAll(query, count),
      (values: V[]) => values
    )
  }

  getAllKeys(query?: Query | null, count?: number): RequestFuture<IDBValidKey[]> {
    return this.transaction.request(
      () => this.source().getAllKeys(query, count),
      (keys) => keys
    )
  }

  count(query?: Query): RequestFuture<number> {
    return this.transaction.request(
      () => this.source().count(query),
      (count) => count
    )
  }

  openCursor(query?: Query | null, direction: IDBCursorDirection = "next"): CursorStream<V> {
    return new CursorStream<V>(
      this.transaction,
      () => this.source().openCursor(query, direction),
      direction
    )
  }
}
