import type { Database } from "./Database.js"
import type { ObjectStore } from "./ObjectStore.js"
import type { Transaction } from "./Transaction.js"

/**
 * Anything handlers can be attached to and detached from.
 * DOM `EventTarget`s (requests, transactions, connections, `AbortSignal`) satisfy it.
 */
export interface ListenerTarget {
  addEventListener(type: string, listener: (event: Event) => void): void
  removeEventListener(type: string, listener: (event: Event) => void): void
}

/**
 * The slice of `IDBRequest` a {@link RequestFuture} relies on.
 */
export interface RequestTarget<T> extends ListenerTarget {
  readonly readyState: IDBRequestReadyState
  readonly result: T
  readonly error: DOMException | null
}

/**
 * The slice of `IDBTransaction` a {@link TransactionFuture} relies on.
 */
export interface TransactionTarget extends ListenerTarget {
  readonly error: DOMException | null
}

export type TransactionState = "active" | "committed" | "aborted"

export type TransactionOptions = {
  /**
   * https://developer.mozilla.org/en-US/docs/Web/API/IDBTransaction/durability
   */
  durability?: IDBTransactionDurability
}

export type CursorEntry<V> = {
  key: IDBValidKey
  primaryKey: IDBValidKey
  value: V
}

export type Query = IDBValidKey | IDBKeyRange

export type ErrorLogger = typeof console.error

export type DatabaseContext = {
  factory: IDBFactory
  onError: ErrorLogger
}

export type UpgradeContext = {
  oldVersion: number
  newVersion: number
  /**
   * The implicit `versionchange` transaction. It commits by itself once the
   * migration's requests drain.
   */
  transaction: Transaction
  /**
   * Names of the stores that exist at this point of the migration
   */
  readonly storeNames: string[]
  /**
   * Creates an object store. Throws synchronously, as the engine does.
   */
  createStore: <V = unknown>(name: string, options?: IDBObjectStoreParameters) => ObjectStore<V>
  /**
   * Deletes an object store. Throws synchronously, as the engine does.
   */
  deleteStore: (name: string) => void
}

/**
 * May be async, but must only await requests in `ctx.transaction`: awaiting
 * anything else (timers, `fetch`...) lets the upgrade transaction commit
 * underneath it, after which the migration can no longer be rolled back.
 */
export type MigrationCallback = (ctx: UpgradeContext) => void | Promise<void>

export type OpenDatabaseConfig = {
  /**
   * Database version - increment this to trigger an [upgradeneeded](https://developer.mozilla.org/en-US/docs/Web/API/IDBOpenDBRequest/upgradeneeded_event) event
   */
  version: number
  /**
   * Migrates the schema from `ctx.oldVersion` to `ctx.newVersion`. Runs inside the
   * implicit upgrade transaction. If it throws, the upgrade is rolled back and the
   * open rejects with `MigrationFailed`.
   *
   * Only await requests made in `ctx.transaction`. If the transaction commits
   * before the callback settles, the open still rejects with `MigrationFailed`,
   * but the database stays at the new version.
   */
  migrate?: MigrationCallback
  /**
   * @default globalThis.indexedDB
   */
  factory?: IDBFactory
  /**
   * Called when other connections keep the upgrade (or deletion) waiting
   */
  onBlocked?: (oldVersion: number, newVersion: number | null) => void
  /**
   * Called when another connection wants to upgrade or delete the database.
   * @default closes this connection
   */
  onVersionChange?: (db: Database, event: IDBVersionChangeEvent) => void
  /**
   * Receives errors that have no future to reject, such as a failed rollback
   * @default console.error
   */
  onError?: ErrorLogger
}

export type DeleteDatabaseConfig = Pick<OpenDatabaseConfig, "factory" | "onBlocked">
