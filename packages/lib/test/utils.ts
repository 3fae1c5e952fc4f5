import type { ListenerTarget, MigrationCallback, RequestTarget, TransactionTarget } from "../src/types.js"
import { openDatabase, type Database } from "../src/index.js"

export const uniqueName = (prefix = "test-db") => `${prefix}-${crypto.randomUUID()}`

/**
 * Awaits `future` and returns what it rejected with
 */
export async function captureError(future: PromiseLike<unknown>): Promise<unknown> {
  try {
    await future
  } catch (error) {
    return error
  }
  throw new Error("Expected the operation to fail, but it succeeded")
}

const createStores =
  (storeNames: string[]): MigrationCallback =>
  ({ createStore }) => {
    for (const name of storeNames) createStore(name)
  }

/**
 * Opens a fresh database with out-of-line-key stores named `storeNames`
 */
export function openTestDatabase(...storeNames: string[]): Promise<Database> {
  return openDatabase(uniqueName(), {
    version: 1,
    migrate: createStores(storeNames.length > 0 ? storeNames : ["items"]),
  })
}

export async function seed(db: Database, storeName: string, entries: [IDBValidKey, unknown][]) {
  await db.transaction(storeName, "readwrite").run(async (tx) => {
    const store = tx.objectStore(storeName)
    for (const [key, value] of entries) await store.put(value, key)
  })
}

/**
 * EventTarget that keeps count of the listeners currently attached
 */
class CountingTarget implements ListenerTarget {
  #target = new EventTarget()
  listenerCount = 0

  addEventListener(type: string, listener: (event: Event) => void) {
    this.listenerCount++
    this.#target.addEventListener(type, listener)
  }

  removeEventListener(type: string, listener: (event: Event) => void) {
    this.listenerCount--
    this.#target.removeEventListener(type, listener)
  }

  dispatch(type: string, init: EventInit = {}): Event {
    const event = new Event(type, init)
    this.#target.dispatchEvent(event)
    return event
  }
}

export class FakeRequest<T> extends CountingTarget implements RequestTarget<T> {
  readyState: IDBRequestReadyState = "pending"
  error: DOMException | null = null

  constructor(public result: T) {
    super()
  }

  /**
   * Completes the request without firing anything
   */
  markDone(result: T) {
    this.readyState = "done"
    this.result = result
  }

  succeed(result: T): Event {
    this.markDone(result)
    return this.dispatch("success")
  }

  fail(error: DOMException): Event {
    this.readyState = "done"
    this.error = error
    return this.dispatch("error", { bubbles: true, cancelable: true })
  }
}

export class FakeTransaction extends CountingTarget implements TransactionTarget {
  error: DOMException | null = null
}
