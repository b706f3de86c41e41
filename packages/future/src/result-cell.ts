/**
 * ResultCell - the state shared by a completer and its futures.
 */

import { UniqueFunction } from "@handoff/callable"
import {
  FutureAlreadyRetrievedError,
  PromiseAlreadySatisfiedError,
} from "./error"
import { Monitor } from "./monitor"

/**
 * What happens to a pending result when its completer is disposed.
 *
 * - `break`: complete it with a BrokenPromiseError
 * - `detach`: drop its continuation without running it and leave it pending
 */
export type AbandonPolicy = `break` | `detach`

/**
 * The recorded outcome of a result.
 */
export type Outcome<T> =
  | { readonly status: `unset` }
  | { readonly status: `value`; readonly value: T }
  | { readonly status: `error`; readonly error: unknown }

/**
 * Continuation attached to a result.
 */
export type Continuation = UniqueFunction<[], void>

export interface ResultCellOptions {
  /**
   * Policy applied by the owning completer on disposal. Defaults to `break`.
   */
  abandonPolicy?: AbandonPolicy
}

const UNSET: Outcome<never> = { status: `unset` }

/**
 * Write-once storage for one eventual value or error, plus at most one
 * continuation to run when it completes.
 *
 * Every method runs to completion without yielding, so the completed flag,
 * the outcome and the continuation always change together. Waiters are
 * released through the monitor; the continuation runs after them, on the
 * caller that completed the result or, if it was attached late, on the
 * caller that attached it.
 */
export class ResultCell<T> {
  readonly abandonPolicy: AbandonPolicy
  #completed = false
  #retrieved = false
  #outcome: Outcome<T> = UNSET
  readonly #continuation: Continuation = new UniqueFunction<[], void>()
  readonly #monitor = new Monitor()

  constructor(options: ResultCellOptions = {}) {
    this.abandonPolicy = options.abandonPolicy ?? `break`
  }

  /**
   * Whether a value or error has been set.
   */
  get completed(): boolean {
    return this.#completed
  }

  /**
   * Number of callers currently blocked in wait() or get().
   */
  get waiting(): number {
    return this.#monitor.waiting
  }

  /**
   * @throws {PromiseAlreadySatisfiedError} if the result is already completed
   */
  setValue(value: T): void {
    this.#complete({ status: `value`, value })
  }

  /**
   * @throws {PromiseAlreadySatisfiedError} if the result is already completed
   */
  setException(error: unknown): void {
    this.#complete({ status: `error`, error })
  }

  /**
   * Take ownership of `continuation`, leaving the argument empty.
   *
   * Stored (replacing any previous one) while the result is pending; run
   * immediately on the calling stack once it has completed.
   */
  setContinuation(continuation: Continuation): void {
    if (!this.#completed) {
      this.#continuation.assign(continuation)
      return
    }
    this.#run(continuation.move())
  }

  /**
   * Destroy a stored continuation without running it.
   */
  resetContinuation(): void {
    this.#continuation.dispose()
  }

  /**
   * @throws {FutureAlreadyRetrievedError} on every call after the first
   */
  markRetrievedOrFail(): void {
    if (this.#retrieved) {
      throw new FutureAlreadyRetrievedError()
    }
    this.#retrieved = true
  }

  /**
   * The current outcome, without waiting.
   */
  peek(): Outcome<T> {
    return this.#outcome
  }

  /**
   * Wait for completion, then return the value or throw the stored error.
   * The outcome is left in place for later readers.
   */
  async get(): Promise<T> {
    await this.wait()

    const outcome = this.#outcome
    switch (outcome.status) {
      case `value`:
        return outcome.value
      case `error`:
        throw outcome.error
      case `unset`:
        throw new Error(`Result completed without an outcome`)
    }
  }

  /**
   * Resolve once the result has completed.
   */
  wait(): Promise<void> {
    if (this.#completed) {
      return Promise.resolve()
    }
    return this.#monitor.waitUntil(() => this.#completed)
  }

  #complete(outcome: Outcome<T>): void {
    if (this.#completed) {
      throw new PromiseAlreadySatisfiedError()
    }

    this.#outcome = outcome
    this.#completed = true
    const continuation = this.#continuation.move()
    this.#monitor.notifyAll()

    this.#run(continuation)
  }

  #run(continuation: Continuation): void {
    if (continuation.isEmpty()) return
    try {
      continuation.call()
    } finally {
      continuation.dispose()
    }
  }
}
