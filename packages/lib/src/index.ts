export { Database } from "./Database.js"
export { Transaction } from "./Transaction.js"
export { ObjectStore } from "./ObjectStore.js"
export { Index } from "./StoreIndex.js"
export { QuerySource } from "./QuerySource.js"
export { StorageError, StorageErrorKind, toStorageError, isStorageError } from "./errors.js"
export * from "./core/index.js"
export type * from "./types.js"

import type { DeleteDatabaseConfig, OpenDatabaseConfig } from "./types.js"
import type { Database } from "./Database.js"
import { toStorageError } from "./errors.js"
import { EventListenerGuard } from "./core/EventListenerGuard.js"
import { RequestFuture } from "./core/RequestFuture.js"
import { UpgradeController } from "./core/UpgradeController.js"
import { assertValidVersion, createContext, isVersionChangeEvent } from "./utils.js"

/**
 * Opens (creating or upgrading as needed) the database `name` at `config.version`.
 *
 * Resolves once the open request succeeded and, if an upgrade ran, once
 * `config.migrate` returned and the upgrade transaction committed. A migration
 * that throws rejects with `MigrationFailed` and leaves the previous version in place.
 *
 * @example
 * ```ts
 * const db = await openDatabase("notes", {
 *   version: 1,
 *   migrate: ({ oldVersion, createStore }) => {
 *     if (oldVersion < 1) createStore("notes", { keyPath: "id" })
 *   },
 * })
 * ```
 */
export async function openDatabase(name: string, config: OpenDatabaseConfig): Promise<Database> {
  assertValidVersion(config.version)
  const context = createContext(config)

  let request: IDBOpenDBRequest
  try {
    request = context.factory.open(name, config.version)
  } catch (error) {
    throw toStorageError(error)
  }

  const controller = new UpgradeController(request, {
    migrate: config.migrate,
    onBlocked: config.onBlocked,
    onVersionChange: config.onVersionChange,
    context,
  })
  return controller.result()
}

/**
 * Deletes the database `name`. Resolves once every connection has closed and the
 * data is gone; deleting a database that does not exist succeeds.
 */
export async function deleteDatabase(name: string, config: DeleteDatabaseConfig = {}): Promise<void> {
  const { factory } = createContext(config)

  let request: IDBOpenDBRequest
  try {
    request = factory.deleteDatabase(name)
  } catch (error) {
    throw toStorageError(error)
  }

  const guard = new EventListenerGuard(request, {
    blocked: (event) => {
      if (isVersionChangeEvent(event)) config.onBlocked?.(event.oldVersion, event.newVersion)
    },
  })
  try {
    await RequestFuture.wrap(request)
  } finally {
    guard.release()
  }
}
