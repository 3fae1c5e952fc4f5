import { describe, expect, it, vi } from "vitest"
import { TransactionFuture } from "../src/core/TransactionFuture.js"
import { StorageErrorKind, isStorageError } from "../src/errors.js"
import { openDatabase } from "../src/index.js"
import { FakeTransaction, captureError, openTestDatabase, uniqueName } from "./utils.js"

describe("TransactionFuture", () => {
  it("fulfils on complete", async () => {
    const transaction = new FakeTransaction()
    const future = TransactionFuture.observe(transaction)
    expect(future.state).toBe("active")

    transaction.dispatch("complete")

    await future
    expect(future.state).toBe("committed")
    expect(transaction.listenerCount).toBe(0)
  })

  it("rejects with Aborted on abort", async () => {
    const transaction = new FakeTransaction()
    const future = TransactionFuture.observe(transaction)

    transaction.dispatch("abort")

    const error = await captureError(future)
    expect(isStorageError(error, StorageErrorKind.Aborted)).toBe(true)
    expect(error).toHaveProperty("message", "[idb-futures]: transaction was aborted")
    expect(future.state).toBe("aborted")
  })

  it("names the cause of an abort", async () => {
    const transaction = new FakeTransaction()
    const future = TransactionFuture.observe(transaction)

    transaction.error = new DOMException("disk full", "QuotaExceededError")
    transaction.dispatch("abort")

    const error = await captureError(future)
    expect(error).toHaveProperty(
      "message",
      "[idb-futures]: transaction was aborted (QuotaExceededError)"
    )
  })

  it("honours only the first terminal signal", async () => {
    const transaction = new FakeTransaction()
    const future = TransactionFuture.observe(transaction)

    transaction.error = new DOMException("disk full", "QuotaExceededError")
    transaction.dispatch("error", { cancelable: true })
    transaction.dispatch("abort")
    transaction.dispatch("complete")

    const error = await captureError(future)
    expect(isStorageError(error, StorageErrorKind.EngineError)).toBe(true)
    expect(error).toHaveProperty("message", "[idb-futures]: QuotaExceededError: disk full")
    expect(future.state).toBe("aborted")
    expect(transaction.listenerCount).toBe(0)
  })

  it("ignores errors that were already handled", async () => {
    const transaction = new FakeTransaction()
    transaction.addEventListener("error", (event) => event.preventDefault())
    const future = TransactionFuture.observe(transaction)

    transaction.dispatch("error", { cancelable: true })
    transaction.dispatch("complete")

    await future
    expect(future.state).toBe("committed")
  })
})

describe("Transaction", () => {
  it("is active until it commits, then refuses new requests", async () => {
    const db = await openTestDatabase()
    const tx = db.transaction("items", "readwrite")
    const store = tx.objectStore<string>("items")
    expect(tx.state).toBe("active")
    expect(tx.mode).toBe("readwrite")
    expect(tx.storeNames).toEqual(["items"])

    expect(await store.put("a", 1)).toBe(1)
    await tx.future()
    expect(tx.state).toBe("committed")

    const error = await captureError(store.put("b", 2))
    expect(isStorageError(error, StorageErrorKind.InvalidState)).toBe(true)
    expect(error).toHaveProperty("message", "[idb-futures]: transaction has already committed")
    db.close()
  })

  it("rolls back on abort", async () => {
    const db = await openTestDatabase()
    const tx = db.transaction("items", "readwrite")
    const put = tx.objectStore("items").put("a", 1)

    tx.abort()

    expect(isStorageError(await captureError(tx.future()), StorageErrorKind.Aborted)).toBe(true)
    expect(isStorageError(await captureError(put), StorageErrorKind.Aborted)).toBe(true)
    expect(tx.state).toBe("aborted")
    expect(await db.get("items", 1)).toBe(null)
    db.close()
  })

  it("aborts when a request error goes unobserved", async () => {
    const db = await openTestDatabase()
    const tx = db.transaction("items", "readwrite")
    const store = tx.objectStore("items")
    const first = store.add("a", 1)
    const duplicate = store.add("b", 1)

    const error = await captureError(tx.future())

    expect(isStorageError(error, StorageErrorKind.ConstraintViolation)).toBe(true)
    expect(tx.error?.kind).toBe(StorageErrorKind.ConstraintViolation)
    expect(await first).toBe(1)
    expect(isStorageError(await captureError(duplicate), StorageErrorKind.ConstraintViolation)).toBe(
      true
    )
    expect(await db.count("items")).toBe(0)
    db.close()
  })

  it("refuses new requests once aborted", async () => {
    const db = await openTestDatabase()
    const tx = db.transaction("items", "readwrite")
    const store = tx.objectStore("items")
    expect(tx.error).toBe(null)

    tx.abort()
    await captureError(tx.future())

    const error = await captureError(store.get(1))
    expect(isStorageError(error, StorageErrorKind.InvalidState)).toBe(true)
    expect(error).toHaveProperty("message", "[idb-futures]: transaction has already been aborted")
    expect(tx.error).toBe(null)
    db.close()
  })

  it("keeps going when an awaited request error is handled", async () => {
    const db = await openTestDatabase()

    await db.transaction("items", "readwrite").run(async (tx) => {
      const store = tx.objectStore("items")
      await store.add("a", 1)
      const error = await captureError(store.add("b", 1))
      expect(isStorageError(error, StorageErrorKind.ConstraintViolation)).toBe(true)
      await store.put("c", 2)
    })

    expect(await db.getAll("items")).toEqual(["a", "c"])
    db.close()
  })

  it("aborts and rethrows when the run callback throws", async () => {
    const db = await openTestDatabase()
    const tx = db.transaction("items", "readwrite")

    const error = await captureError(
      tx.run(async (tx) => {
        await tx.objectStore("items").put("a", 1)
        throw new Error("changed my mind")
      })
    )

    expect(error).toHaveProperty("message", "changed my mind")
    expect(isStorageError(await captureError(tx.future()), StorageErrorKind.Aborted)).toBe(true)
    expect(await db.get("items", 1)).toBe(null)
    db.close()
  })

  it("resolves run with the callback's value after committing", async () => {
    const db = await openTestDatabase()
    const tx = db.transaction("items", "readwrite")

    const key = await tx.run((tx) => tx.objectStore("items").put("a", "k"))

    expect(key).toBe("k")
    expect(tx.state).toBe("committed")
    db.close()
  })

  it("comes back failed for an unknown store", async () => {
    const db = await openTestDatabase()
    const tx = db.transaction(["items", "missing"])

    expect(tx.native).toBe(null)
    expect(tx.state).toBe("aborted")
    expect(tx.error?.kind).toBe(StorageErrorKind.NotFound)
    const error = await captureError(tx.objectStore("items").get(1))
    expect(isStorageError(error, StorageErrorKind.NotFound)).toBe(true)
    db.close()
  })

  it("spans several stores", async () => {
    const db = await openTestDatabase("users", "posts")

    await db.transaction(["users", "posts"], "readwrite").run(async (tx) => {
      await tx.objectStore("users").put({ name: "ada" }, 1)
      await tx.objectStore("posts").put({ title: "hello", userId: 1 }, 10)
    })

    expect(await db.get("users", 1)).toEqual({ name: "ada" })
    expect(await db.get("posts", 10)).toEqual({ title: "hello", userId: 1 })
    db.close()
  })

  it("reports a failing abort to onError", async () => {
    const onError = vi.fn()
    const db = await openDatabase(uniqueName(), {
      version: 1,
      migrate: ({ createStore }) => {
        createStore("items")
      },
      onError,
    })
    const tx = db.transaction("items", "readwrite")

    tx.commit()
    tx.abort()

    expect(onError).toHaveBeenCalledWith("[idb-futures]: error aborting transaction", expect.anything())
    await tx.future()
    expect(tx.state).toBe("committed")
    db.close()
  })
})
