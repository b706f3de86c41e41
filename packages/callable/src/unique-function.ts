/**
 * UniqueFunction - a move-only, type-erased callable.
 *
 * Stores one closure with a fixed call signature. Closures that declare at
 * most TINY_CAPACITY captured values are kept in the instance's own slots;
 * larger ones take exactly one block from a HeapAllocator.
 */

import {
  createStorage,
  defaultAllocator,
  fitsInline,
  normalizeClosure,
  placeInline,
} from "./storage"
import { BIG_VTABLE, EMPTY_VTABLE, TINY_VTABLE } from "./vtable"
import type {
  Callable,
  HeapAllocator,
  Representation,
  Storage,
} from "./storage"
import type { Vtable } from "./vtable"

/**
 * Sentinel standing for "no closure". Compare with `equals` in either order.
 */
export const EMPTY: unique symbol = Symbol(`UniqueFunction.EMPTY`)

export type Empty = typeof EMPTY

/**
 * Options for creating a UniqueFunction.
 */
export interface UniqueFunctionOptions {
  /**
   * Where closures too large for inline storage are allocated.
   * Defaults to `defaultAllocator`.
   */
  allocator?: HeapAllocator
}

/**
 * A move-only callable holding a single closure.
 *
 * Ownership moves with `move()` or `assign()`, which leave the source empty.
 * Invoking an empty instance throws `BadCallError`.
 *
 * @example
 * ```typescript
 * const total = { value: 0 }
 * const add = new UniqueFunction<[number], number>({
 *   call: (n) => (total.value += n),
 *   captures: [total],
 * })
 *
 * const moved = add.move()
 * moved.call(2) // 2
 * add.isEmpty() // true
 * ```
 */
export class UniqueFunction<A extends Array<unknown> = [], R = void> {
  #vtable: Vtable = EMPTY_VTABLE
  readonly #storage: Storage<A, R> = createStorage<A, R>()

  constructor(
    callable: Callable<A, R> | Empty = EMPTY,
    options: UniqueFunctionOptions = {}
  ) {
    if (callable === EMPTY) return

    const closure = normalizeClosure(callable)
    if (fitsInline(closure)) {
      placeInline(this.#storage.tiny, closure)
      this.#vtable = TINY_VTABLE
    } else {
      const allocator = options.allocator ?? defaultAllocator
      this.#storage.big = allocator.allocate(closure)
      this.#vtable = BIG_VTABLE
    }
  }

  /**
   * Compare two operands where either may be the EMPTY sentinel.
   * Two instances are equal only when they are the same instance.
   */
  static equals<A extends Array<unknown>, R>(
    left: UniqueFunction<A, R> | Empty,
    right: UniqueFunction<A, R> | Empty
  ): boolean {
    if (left === EMPTY && right === EMPTY) return true
    if (left === EMPTY) return right !== EMPTY && right.isEmpty()
    if (right === EMPTY) return left.isEmpty()
    return left === right
  }

  /**
   * Which storage currently holds the closure.
   */
  get representation(): Representation {
    return this.#vtable.kind
  }

  /**
   * Invoke the held closure. The closure stays stored and may be called again.
   *
   * @throws {BadCallError} if the instance is empty
   */
  call(...args: A): R {
    return this.#vtable.invoke(this.#storage, args)
  }

  isEmpty(): boolean {
    return this.#vtable === EMPTY_VTABLE
  }

  equals(other: UniqueFunction<A, R> | Empty): boolean {
    return UniqueFunction.equals<A, R>(this, other)
  }

  /**
   * Transfer the closure into a new instance, leaving this one empty.
   */
  move(): UniqueFunction<A, R> {
    const target = new UniqueFunction<A, R>()
    target.#takeFrom(this)
    return target
  }

  /**
   * Destroy the held closure and take over `source`'s, leaving `source` empty.
   * Assigning EMPTY only destroys.
   */
  assign(source: UniqueFunction<A, R> | Empty): this {
    if (source === this) return this

    this.reset()
    if (source !== EMPTY) {
      this.#takeFrom(source)
    }
    return this
  }

  /**
   * Exchange closures with `other` through a temporary of the same layout.
   */
  swap(other: UniqueFunction<A, R>): void {
    if (other === this) return

    const tmp = createStorage<A, R>()
    this.#vtable.relocate(tmp, this.#storage)
    other.#vtable.relocate(this.#storage, other.#storage)
    this.#vtable.relocate(other.#storage, tmp)

    const vtable = this.#vtable
    this.#vtable = other.#vtable
    other.#vtable = vtable
  }

  /**
   * Destroy the held closure. Does nothing when empty.
   */
  reset(): void {
    this.#vtable.destroy(this.#storage)
    this.#vtable = EMPTY_VTABLE
  }

  dispose(): void {
    this.reset()
  }

  #takeFrom(source: UniqueFunction<A, R>): void {
    const vtable = source.#vtable
    source.#vtable = EMPTY_VTABLE
    this.#vtable = vtable
    vtable.relocate(this.#storage, source.#storage)
  }
}

/**
 * Exchange the closures held by two UniqueFunctions.
 */
export function swap<A extends Array<unknown>, R>(
  left: UniqueFunction<A, R>,
  right: UniqueFunction<A, R>
): void {
  left.swap(right)
}
