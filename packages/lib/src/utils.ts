import type { DatabaseContext, OpenDatabaseConfig } from "./types.js"
import { StorageError, StorageErrorKind } from "./errors.js"

export const isVersionChangeEvent = (event: Event): event is IDBVersionChangeEvent =>
  "oldVersion" in event && "newVersion" in event

export function createContext(config: Pick<OpenDatabaseConfig, "factory" | "onError">): DatabaseContext {
  const factory = config.factory ?? (typeof indexedDB === "undefined" ? null : indexedDB)
  if (factory === null) {
    throw new StorageError(
      StorageErrorKind.EngineError,
      "IndexedDB is not available in this environment; pass a `factory`"
    )
  }
  return { factory, onError: config.onError ?? console.error }
}

export function assertValidVersion(version: number) {
  if (!Number.isInteger(version) || version < 1) {
    throw new StorageError(
      StorageErrorKind.EngineError,
      `version must be a positive integer with no decimal places, got ${version}`
    )
  }
}
