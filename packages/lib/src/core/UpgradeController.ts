import type { DatabaseContext, OpenDatabaseConfig, UpgradeContext } from "../types.js"
import { StorageError, StorageErrorKind, toStorageError } from "../errors.js"
import { Database } from "../Database.js"
import { Transaction } from "../Transaction.js"
import { isVersionChangeEvent } from "../utils.js"
import { EventListenerGuard } from "./EventListenerGuard.js"
import { RequestFuture } from "./RequestFuture.js"

export type UpgradeState =
  | { phase: "opening" }
  | { phase: "migrating"; oldVersion: number; newVersion: number; transaction: Transaction }
  | { phase: "awaiting-open-result"; transaction: Transaction }
  | { phase: "opened"; db: Database }
  | { phase: "open-failed"; error: StorageError }

export type UpgradePhase = UpgradeState["phase"]

export type UpgradeControllerConfig = Pick<
  OpenDatabaseConfig,
  "migrate" | "onBlocked" | "onVersionChange"
> & {
  context: DatabaseContext
}

type MigrationOutcome = { ok: true } | { ok: false; error: StorageError }

type Upgrade = {
  transaction: Transaction
  outcome: Promise<MigrationOutcome>
}

/**
 * Joins an open request with the (optional) migration it triggers.
 *
 * `opening → migrating → awaiting-open-result → opened | open-failed`, or straight
 * from `opening` to `opened | open-failed` when no upgrade is needed. The database
 * is only handed out once the migration callback returned, the upgrade
 * transaction committed and the open request succeeded.
 */
export class UpgradeController {
  #state: UpgradeState
  #config: UpgradeControllerConfig
  #open: RequestFuture<IDBDatabase>
  #guard: EventListenerGuard
  #upgrade: Upgrade | null
  #result: Promise<Database> | null

  constructor(request: IDBOpenDBRequest, config: UpgradeControllerConfig) {
    this.#state = { phase: "opening" }
    this.#config = config
    this.#upgrade = null
    this.#result = null
    this.#open = RequestFuture.wrap(request)
    this.#guard = new EventListenerGuard(request, {
      upgradeneeded: (event) => this.#onUpgradeNeeded(request, event),
      blocked: (event) => {
        if (isVersionChangeEvent(event)) config.onBlocked?.(event.oldVersion, event.newVersion)
      },
    })
  }

  get state(): UpgradeState {
    return this.#state
  }

  get phase(): UpgradePhase {
    return this.#state.phase
  }

  result(): Promise<Database> {
    this.#result ??= this.#join()
    return this.#result
  }

  #onUpgradeNeeded(request: IDBOpenDBRequest, event: Event) {
    const native = request.transaction
    if (!isVersionChangeEvent(event) || native === null) return

    const db = request.result
    const transaction = Transaction.observe(native, this.#config.context)
    const oldVersion = event.oldVersion
    const newVersion = event.newVersion ?? db.version
    this.#state = { phase: "migrating", oldVersion, newVersion, transaction }

    const ctx: UpgradeContext = {
      oldVersion,
      newVersion,
      transaction,
      get storeNames() {
        return Array.from(db.objectStoreNames)
      },
      createStore: <V = unknown>(name: string, options?: IDBObjectStoreParameters) => {
        try {
          db.createObjectStore(name, options)
        } catch (error) {
          throw toStorageError(error)
        }
        return transaction.objectStore<V>(name)
      },
      deleteStore: (name) => {
        try {
          db.deleteObjectStore(name)
        } catch (error) {
          throw toStorageError(error)
        }
      },
    }
    this.#upgrade = { transaction, outcome: this.#migrate(ctx) }
  }

  async #migrate(ctx: UpgradeContext): Promise<MigrationOutcome> {
    const { oldVersion, newVersion, transaction } = ctx
    let thrown: { error: unknown } | null = null
    try {
      await this.#config.migrate?.(ctx)
    } catch (error) {
      thrown = { error }
    }

    // the callback awaited something outside the transaction, which let it commit
    if (transaction.state === "committed") {
      return migrationFailed(
        `the upgrade to version ${newVersion} was already committed before its migration finished and cannot be rolled back`,
        thrown?.error
      )
    }
    if (thrown) {
      transaction.abort()
      return migrationFailed(
        `migration from version ${oldVersion} to ${newVersion} failed`,
        thrown.error
      )
    }
    if (this.#state.phase === "migrating") {
      this.#state = { phase: "awaiting-open-result", transaction }
    }
    return { ok: true }
  }

  async #join(): Promise<Database> {
    try {
      const native = await this.#settle()
      const db = new Database(native, this.#config.context, this.#config.onVersionChange)
      this.#state = { phase: "opened", db }
      return db
    } catch (error) {
      const failure = toStorageError(error)
      this.#state = { phase: "open-failed", error: failure }
      throw failure
    } finally {
      this.#guard.release()
    }
  }

  async #settle(): Promise<IDBDatabase> {
    let native: IDBDatabase
    try {
      native = await this.#open
    } catch (error) {
      throw (await this.#upgradeFailure()) ?? error
    }

    const failure = await this.#upgradeFailure()
    if (failure) {
      native.close()
      throw failure
    }
    return native
  }

  async #upgradeFailure(): Promise<StorageError | null> {
    const upgrade = this.#upgrade
    if (upgrade === null) return null

    const outcome = await upgrade.outcome
    if (!outcome.ok) return outcome.error
    try {
      await upgrade.transaction.future()
    } catch (error) {
      return new StorageError(
        StorageErrorKind.MigrationFailed,
        "upgrade transaction did not commit",
        { cause: error }
      )
    }
    return null
  }
}

const migrationFailed = (message: string, cause: unknown): MigrationOutcome => ({
  ok: false,
  error: new StorageError(StorageErrorKind.MigrationFailed, message, { cause }),
})
