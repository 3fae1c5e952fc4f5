import { describe, expect, it, vi } from "vitest"
import { EventListenerGuard } from "../src/core/EventListenerGuard.js"
import { FakeTransaction } from "./utils.js"

describe("EventListenerGuard", () => {
  it("attaches every handler on construction", () => {
    const target = new FakeTransaction()
    const onComplete = vi.fn()
    const onAbort = vi.fn()

    new EventListenerGuard(target, { complete: onComplete, abort: onAbort })
    target.dispatch("complete")

    expect(target.listenerCount).toBe(2)
    expect(onComplete).toHaveBeenCalledTimes(1)
    expect(onAbort).not.toHaveBeenCalled()
  })

  it("detaches everything on release, once", () => {
    const target = new FakeTransaction()
    const onComplete = vi.fn()
    const guard = new EventListenerGuard(target, { complete: onComplete, error: vi.fn() })

    guard.release()
    guard.release()
    target.dispatch("complete")

    expect(guard.released).toBe(true)
    expect(target.listenerCount).toBe(0)
    expect(onComplete).not.toHaveBeenCalled()
  })

  it("can be released from inside one of its handlers", () => {
    const target = new FakeTransaction()
    const calls: string[] = []
    const guard: EventListenerGuard = new EventListenerGuard(target, {
      complete: () => {
        calls.push("complete")
        guard.release()
      },
    })

    target.dispatch("complete")
    target.dispatch("complete")

    expect(calls).toEqual(["complete"])
  })
})
