export enum StorageErrorKind {
  NotFound = "NotFound",
  ConstraintViolation = "ConstraintViolation",
  InvalidState = "InvalidState",
  Aborted = "Aborted",
  MigrationFailed = "MigrationFailed",
  EngineError = "EngineError",
}

const ERROR_PREFIX = "[idb-futures]:"

/**
 * Error every future in this package rejects with.
 * The engine's original `DOMException` (or whatever was thrown) is kept as `cause`.
 */
export class StorageError extends Error {
  readonly kind: StorageErrorKind

  constructor(kind: StorageErrorKind, message: string, options?: { cause?: unknown }) {
    super(`${ERROR_PREFIX} ${message}`, options)
    this.name = "StorageError"
    this.kind = kind
  }
}

const KIND_BY_DOM_EXCEPTION: Record<string, StorageErrorKind> = {
  NotFoundError: StorageErrorKind.NotFound,
  ConstraintError: StorageErrorKind.ConstraintViolation,
  InvalidStateError: StorageErrorKind.InvalidState,
  TransactionInactiveError: StorageErrorKind.InvalidState,
  ReadOnlyError: StorageErrorKind.InvalidState,
  InvalidAccessError: StorageErrorKind.InvalidState,
  AbortError: StorageErrorKind.Aborted,
}

const hasName = (value: unknown): value is { name: string; message?: unknown } =>
  typeof value === "object" && value !== null && "name" in value && typeof value.name === "string"

/**
 * Maps an engine error onto the {@link StorageErrorKind} taxonomy.
 * A `StorageError` passes through untouched.
 */
export function toStorageError(error: unknown, fallbackMessage = "request failed"): StorageError {
  if (error instanceof StorageError) return error
  if (!hasName(error)) {
    return new StorageError(StorageErrorKind.EngineError, fallbackMessage, { cause: error })
  }
  const kind = KIND_BY_DOM_EXCEPTION[error.name] ?? StorageErrorKind.EngineError
  const message =
    typeof error.message === "string" && error.message.length > 0
      ? `${error.name}: ${error.message}`
      : error.name
  return new StorageError(kind, message, { cause: error })
}

export const isStorageError = (error: unknown, kind?: StorageErrorKind): error is StorageError =>
  error instanceof StorageError && (kind === undefined || error.kind === kind)
