import { toStorageError } from "./errors.js"
import { QuerySource } from "./QuerySource.js"

export class Index<V = unknown> extends QuerySource<V, IDBIndex> {
  get keyPath(): string | string[] {
    return this.#index().keyPath
  }

  get unique(): boolean {
    return this.#index().unique
  }

  get multiEntry(): boolean {
    return this.#index().multiEntry
  }

  #index(): IDBIndex {
    try {
      return this.source()
    } catch (error) {
      throw toStorageError(error)
    }
  }
}
