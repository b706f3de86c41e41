/**
 * Completer, Future and SharedFuture - handles over a ResultCell.
 *
 * A Completer writes a result exactly once. Its Future reads it exactly once;
 * a SharedFuture made from that Future can be cloned and read any number of
 * times. Continuations chain futures into a list of results, each one
 * completed from the one before it.
 */

import { UniqueFunction } from "@handoff/callable"
import { BrokenPromiseError, NoStateError } from "./error"
import { ResultCell } from "./result-cell"
import type { AbandonPolicy } from "./result-cell"

/**
 * Options for creating a Completer.
 */
export interface CompleterOptions {
  /**
   * What `dispose()` does to a result that was never set.
   *
   * - `break` (default): the result becomes a BrokenPromiseError, so waiters
   *   and continuations observe the failure.
   * - `detach`: the pending continuation is dropped without running and
   *   waiters stay pending.
   */
  onAbandon?: AbandonPolicy
}

function isPromiseLike<R>(value: R | PromiseLike<R>): value is PromiseLike<R> {
  return (
    typeof value === `object` &&
    value !== null &&
    `then` in value &&
    typeof value.then === `function`
  )
}

/**
 * Run `produce` and move its result, or the error it throws or rejects with,
 * into `target`. A plain result is set synchronously; a thenable is adopted
 * through a native promise, so it settles `target` at most once and a throw
 * from its `then` becomes the error.
 */
function settle<R>(
  target: Completer<R>,
  produce: () => R | PromiseLike<R>
): void {
  let value: R
  try {
    const result = produce()
    if (isPromiseLike(result)) {
      void new Promise<R>((resolve, reject) => {
        result.then(resolve, reject)
      }).then(
        (resolved) => target.setValue(resolved),
        (error: unknown) => target.setException(error)
      )
      return
    }
    value = result
  } catch (error) {
    target.setException(error)
    return
  }
  target.setValue(value)
}

// Bound handles are only created inside this module
let bindFuture: <T>(cell: ResultCell<T>) => Future<T>
let bindShared: <T>(cell: ResultCell<T> | undefined) => SharedFuture<T>

// Set while move() builds a handle that takes over an existing cell
let adopting = false

/**
 * Producer handle: sets the result of its Future exactly once.
 *
 * @example
 * ```typescript
 * const completer = new Completer<number>()
 * const future = completer.getFuture()
 *
 * setTimeout(() => completer.setValue(42), 10)
 * await future.get() // 42
 * ```
 */
export class Completer<T> {
  #cell: ResultCell<T> | undefined

  constructor(options: CompleterOptions = {}) {
    if (adopting) return
    this.#cell = new ResultCell<T>({ abandonPolicy: options.onAbandon })
  }

  static #adopt<T>(cell: ResultCell<T>): Completer<T> {
    adopting = true
    const completer = new Completer<T>()
    adopting = false
    completer.#cell = cell
    return completer
  }

  /**
   * Whether this completer still owns a result.
   */
  valid(): boolean {
    return this.#cell !== undefined
  }

  /**
   * Get the Future reading this completer's result.
   *
   * @throws {NoStateError} if the completer was moved or disposed
   * @throws {FutureAlreadyRetrievedError} if called more than once
   */
  getFuture(): Future<T> {
    const cell = this.#require()
    cell.markRetrievedOrFail()
    return bindFuture(cell)
  }

  /**
   * @throws {NoStateError} if the completer was moved or disposed
   * @throws {PromiseAlreadySatisfiedError} if a result was already set
   */
  setValue(value: T): void {
    this.#require().setValue(value)
  }

  /**
   * @throws {NoStateError} if the completer was moved or disposed
   * @throws {PromiseAlreadySatisfiedError} if a result was already set
   */
  setException(error: unknown): void {
    this.#require().setException(error)
  }

  /**
   * Transfer the result into a new completer; this one becomes invalid.
   *
   * @throws {NoStateError} if the completer was moved or disposed
   */
  move(): Completer<T> {
    const cell = this.#require()
    this.#cell = undefined
    return Completer.#adopt(cell)
  }

  /**
   * Release the result. A result that was never set is abandoned according
   * to the `onAbandon` option. Does nothing on an invalid completer.
   */
  dispose(): void {
    const cell = this.#cell
    if (!cell) return
    this.#cell = undefined

    if (cell.completed) return
    if (cell.abandonPolicy === `break`) {
      cell.setException(new BrokenPromiseError())
    } else {
      cell.resetContinuation()
    }
  }

  #require(): ResultCell<T> {
    if (!this.#cell) {
      throw new NoStateError()
    }
    return this.#cell
  }
}

/**
 * Single-consumer read handle.
 *
 * `get()` consumes the handle; `wait()` and `continueWith()` are the other
 * ways to observe the result. A default-constructed Future has no state;
 * only a Completer hands out futures bound to a result.
 */
export class Future<T> {
  #cell: ResultCell<T> | undefined = undefined

  static {
    bindFuture = <T>(cell: ResultCell<T>): Future<T> => {
      const future = new Future<T>()
      future.#cell = cell
      return future
    }
  }

  /**
   * Whether this future still refers to a result.
   */
  valid(): boolean {
    return this.#cell !== undefined
  }

  /**
   * Whether the result has been set.
   *
   * @throws {NoStateError} if the future is invalid
   */
  isReady(): boolean {
    return this.#require().completed
  }

  /**
   * Wait for the result and return it, or throw its error.
   * The future is invalid as soon as this is called.
   *
   * @throws {NoStateError} synchronously, if the future is invalid
   */
  get(): Promise<T> {
    return this.#take().get()
  }

  /**
   * Resolve once the result has been set. The future stays valid.
   *
   * @throws {NoStateError} synchronously, if the future is invalid
   */
  wait(): Promise<void> {
    return this.#require().wait()
  }

  /**
   * Convert into a SharedFuture over the same result; this future becomes
   * invalid. Sharing an invalid future gives an invalid SharedFuture.
   */
  share(): SharedFuture<T> {
    const cell = this.#cell
    this.#cell = undefined
    return bindShared(cell)
  }

  /**
   * Transfer the result into a new future; this one becomes invalid.
   *
   * @throws {NoStateError} if the future is invalid
   */
  move(): Future<T> {
    return bindFuture(this.#take())
  }

  /**
   * Chain `fn` to run once the result is set, and get a future of its result.
   *
   * `fn` receives a ready Future over this result and may read it, including
   * its error. Whatever `fn` returns (awaited when it is a promise) becomes
   * the new future's value; anything it throws or rejects with becomes the
   * new future's error. This future is consumed.
   *
   * `fn` runs synchronously on the caller that sets the result, or right here
   * if the result is already set. A slow `fn` holds up that caller.
   *
   * @throws {NoStateError} if the future is invalid
   */
  continueWith<R>(fn: (future: Future<T>) => PromiseLike<R>): Future<R>
  continueWith<R>(fn: (future: Future<T>) => R): Future<R>
  continueWith<R>(fn: (future: Future<T>) => R | PromiseLike<R>): Future<R> {
    const cell = this.#take()
    const completer = new Completer<R>({ onAbandon: cell.abandonPolicy })
    const future = completer.getFuture()

    const continuation = new UniqueFunction<[], void>({
      call: () => settle(completer.move(), () => fn(bindFuture(cell))),
      captures: [cell, completer, fn],
      dispose: () => completer.dispose(),
    })
    cell.setContinuation(continuation)

    return future
  }

  /**
   * Chain `fn` on the value only. An error skips `fn` and passes through to
   * the returned future.
   *
   * @throws {NoStateError} if the future is invalid
   */
  map<R>(fn: (value: T) => R): Future<Awaited<R>> {
    return this.continueWith(async (future): Promise<Awaited<R>> => await fn(await future.get()))
  }

  #require(): ResultCell<T> {
    if (!this.#cell) {
      throw new NoStateError()
    }
    return this.#cell
  }

  #take(): ResultCell<T> {
    const cell = this.#require()
    this.#cell = undefined
    return cell
  }
}

/**
 * Multi-consumer read handle. Clones share the same result, and reading it
 * leaves the handle valid.
 */
export class SharedFuture<T> {
  #cell: ResultCell<T> | undefined = undefined

  static {
    bindShared = <T>(cell: ResultCell<T> | undefined): SharedFuture<T> => {
      const shared = new SharedFuture<T>()
      shared.#cell = cell
      return shared
    }
  }

  /**
   * Convert `future` into a SharedFuture; `future` becomes invalid.
   */
  static from<T>(future: Future<T>): SharedFuture<T> {
    return future.share()
  }

  valid(): boolean {
    return this.#cell !== undefined
  }

  /**
   * @throws {NoStateError} if the shared future is invalid
   */
  isReady(): boolean {
    return this.#require().completed
  }

  /**
   * Another handle over the same result.
   */
  clone(): SharedFuture<T> {
    return bindShared(this.#cell)
  }

  /**
   * Wait for the result and return it, or throw its error.
   *
   * @throws {NoStateError} synchronously, if the shared future is invalid
   */
  get(): Promise<T> {
    return this.#require().get()
  }

  /**
   * @throws {NoStateError} synchronously, if the shared future is invalid
   */
  wait(): Promise<void> {
    return this.#require().wait()
  }

  #require(): ResultCell<T> {
    if (!this.#cell) {
      throw new NoStateError()
    }
    return this.#cell
  }
}
