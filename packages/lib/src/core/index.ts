/**
 * Building blocks that turn IndexedDB's event-driven requests into awaitable values.
 * The classes in the package root are composed from these.
 */

export { Future, type FutureState, type SettledState } from "./Future.js"
export { EventListenerGuard, type EventHandlers } from "./EventListenerGuard.js"
export { RequestFuture, type RequestFutureOptions } from "./RequestFuture.js"
export { TransactionFuture } from "./TransactionFuture.js"
export { CursorStream } from "./CursorStream.js"
export {
  UpgradeController,
  type UpgradeControllerConfig,
  type UpgradePhase,
  type UpgradeState,
} from "./UpgradeController.js"
