/**
 * Future Error Classes
 */

/**
 * Machine-readable kind of a FutureError.
 */
export type FutureErrorCode =
  | `broken_promise`
  | `future_already_retrieved`
  | `promise_already_satisfied`
  | `no_state`

const DEFAULT_MESSAGES: Record<FutureErrorCode, string> = {
  broken_promise: `Completer was disposed before producing a result`,
  future_already_retrieved: `Future has already been retrieved from this completer`,
  promise_already_satisfied: `Result has already been set`,
  no_state: `Handle has no associated state`,
}

/**
 * Base class for contract violations on completers and futures.
 */
export class FutureError extends Error {
  readonly code: FutureErrorCode

  constructor(code: FutureErrorCode, message?: string) {
    super(message ?? DEFAULT_MESSAGES[code])
    this.name = `FutureError`
    this.code = code
  }
}

/**
 * Error thrown when a handle is used after it was moved, consumed or disposed,
 * or was never given a state.
 */
export class NoStateError extends FutureError {
  constructor(message?: string) {
    super(`no_state`, message)
    this.name = `NoStateError`
  }
}

/**
 * Error thrown when a value or error is set on an already completed result.
 */
export class PromiseAlreadySatisfiedError extends FutureError {
  constructor(message?: string) {
    super(`promise_already_satisfied`, message)
    this.name = `PromiseAlreadySatisfiedError`
  }
}

/**
 * Error thrown when a completer is asked for its future a second time.
 */
export class FutureAlreadyRetrievedError extends FutureError {
  constructor(message?: string) {
    super(`future_already_retrieved`, message)
    this.name = `FutureAlreadyRetrievedError`
  }
}

/**
 * Error stored in a result whose completer was disposed while still pending.
 */
export class BrokenPromiseError extends FutureError {
  constructor(message?: string) {
    super(`broken_promise`, message)
    this.name = `BrokenPromiseError`
  }
}

/**
 * Check if a value is a FutureError, optionally of a given kind.
 */
export function isFutureError(
  value: unknown,
  code?: FutureErrorCode
): value is FutureError {
  if (!(value instanceof FutureError)) return false
  return code === undefined || value.code === code
}
