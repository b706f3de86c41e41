/**
 * @handoff/future
 *
 * Write-once results passed from one producer to one or many consumers.
 *
 * A Completer sets a value or error exactly once; its Future reads it once,
 * a SharedFuture reads it from any number of handles, and continuations
 * chain further results off it.
 *
 * @packageDocumentation
 */

// Handles
export { Completer, Future, SharedFuture } from "./future"

// Shared state
export { ResultCell } from "./result-cell"
export { Monitor } from "./monitor"

// Types
export type { CompleterOptions } from "./future"
export type {
  AbandonPolicy,
  Continuation,
  Outcome,
  ResultCellOptions,
} from "./result-cell"

// Errors
export {
  FutureError,
  NoStateError,
  PromiseAlreadySatisfiedError,
  FutureAlreadyRetrievedError,
  BrokenPromiseError,
  isFutureError,
} from "./error"
export type { FutureErrorCode } from "./error"
