import type { CursorEntry } from "../types.js"
import type { Transaction } from "../Transaction.js"
import type { RequestFuture } from "./RequestFuture.js"
import { StorageError, StorageErrorKind } from "../errors.js"

type CursorRequest = IDBRequest<IDBCursorWithValue | null>

/**
 * Lazy, forward-only sequence over an IndexedDB cursor.
 *
 * Every operation (`advance`, `skip`, `delete`, `update`) is a request on the
 * cursor and only one may be outstanding at a time: a call made while another
 * is in flight rejects with `InvalidState` and leaves the stream as it was.
 * Once exhausted the stream stays exhausted; open a new cursor to iterate again.
 *
 * @example
 * ```ts
 * const stream = tx.objectStore("todos").openCursor()
 * for (let entry = await stream.advance(); entry; entry = await stream.advance()) {
 *   if (entry.value.done) await stream.delete()
 * }
 * ```
 */
export class CursorStream<V> implements AsyncIterable<CursorEntry<V>> {
  #transaction: Transaction
  #direction: IDBCursorDirection
  #request: CursorRequest | null
  #cursor: IDBCursorWithValue | null
  #opening: RequestFuture<void>
  #positioned: boolean
  #exhausted: boolean
  #busy: boolean

  constructor(transaction: Transaction, open: () => CursorRequest, direction: IDBCursorDirection) {
    this.#transaction = transaction
    this.#direction = direction
    this.#request = null
    this.#cursor = null
    this.#positioned = false
    this.#exhausted = false
    this.#busy = false
    this.#opening = transaction.request(
      () => {
        const request = open()
        this.#request = request
        return request
      },
      (cursor) => this.#track(cursor)
    )
  }

  get exhausted(): boolean {
    return this.#exhausted
  }

  /**
   * The record the cursor is on, or `null` before the first advance and after exhaustion
   */
  get current(): CursorEntry<V> | null {
    const cursor = this.#cursor
    if (!this.#positioned || cursor === null) return null
    return { key: cursor.key, primaryKey: cursor.primaryKey, value: cursor.value }
  }

  /**
   * Moves to the next record, or to the first record at or past `key`.
   * @returns `null` once the cursor is exhausted
   */
  async advance(key?: IDBValidKey): Promise<CursorEntry<V> | null> {
    if (this.#exhausted) return null
    this.#acquire()
    try {
      if (!this.#positioned) {
        const cursor = await this.#position()
        if (cursor === null || key === undefined || this.#reached(cursor.key, key)) {
          return this.current
        }
      }
      await this.#move((cursor) => cursor.continue(key))
      return this.current
    } finally {
      this.#busy = false
    }
  }

  /**
   * Skips `count` records past the current one.
   * @returns `null` once the cursor is exhausted
   */
  async skip(count: number): Promise<CursorEntry<V> | null> {
    if (this.#exhausted) return null
    this.#acquire()
    try {
      if (!this.#positioned && (await this.#position()) === null) {
        return null
      }
      await this.#move((cursor) => cursor.advance(count))
      return this.current
    } finally {
      this.#busy = false
    }
  }

  /**
   * Deletes the current record. The cursor stays where it is.
   */
  async delete(): Promise<void> {
    this.#acquire()
    try {
      const cursor = this.#currentCursor()
      await this.#transaction.request(
        () => cursor.delete(),
        () => undefined
      )
    } finally {
      this.#busy = false
    }
  }

  /**
   * Replaces the current record's value.
   */
  async update(value: V): Promise<IDBValidKey> {
    this.#acquire()
    try {
      const cursor = this.#currentCursor()
      return await this.#transaction.request(
        () => cursor.update(value),
        (key) => key
      )
    } finally {
      this.#busy = false
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<CursorEntry<V>, void, undefined> {
    for (let entry = await this.advance(); entry !== null; entry = await this.advance()) {
      yield entry
    }
  }

  #acquire() {
    if (this.#busy) {
      throw new StorageError(
        StorageErrorKind.InvalidState,
        "a cursor operation is already in progress; await it before issuing another"
      )
    }
    this.#busy = true
  }

  async #position(): Promise<IDBCursorWithValue | null> {
    await this.#opening
    this.#positioned = true
    return this.#cursor
  }

  #move(step: (cursor: IDBCursorWithValue) => void): RequestFuture<void> {
    return this.#transaction.request(
      () => {
        const request = this.#request
        if (request === null) {
          throw new StorageError(StorageErrorKind.InvalidState, "cursor was never opened")
        }
        step(this.#currentCursor())
        return request
      },
      (cursor) => this.#track(cursor)
    )
  }

  #currentCursor(): IDBCursorWithValue {
    if (!this.#positioned || this.#cursor === null) {
      throw new StorageError(StorageErrorKind.InvalidState, "cursor has no current record")
    }
    return this.#cursor
  }

  #track(cursor: IDBCursorWithValue | null) {
    this.#cursor = cursor
    if (cursor === null) this.#exhausted = true
  }

  #reached(current: IDBValidKey, target: IDBValidKey): boolean {
    const order = this.#transaction.compareKeys(current, target)
    return this.#direction.startsWith("prev") ? order <= 0 : order >= 0
  }
}
