/**
 * Storage layout shared by every UniqueFunction.
 *
 * A closure lives either inline, in the fixed slots every instance carries,
 * or in a single heap block handed out by a HeapAllocator.
 */

import { DoubleFreeError } from "./error"

/**
 * Number of captured values a closure may declare and still be stored inline.
 */
export const TINY_CAPACITY = 4

/**
 * Which storage a UniqueFunction currently uses.
 */
export type Representation = `empty` | `tiny` | `big`

/**
 * A closure together with the values it holds.
 *
 * `call` is invoked without a receiver. `captures` lists the values the
 * closure owns and decides where it is stored; `dispose` runs once when the
 * closure is destroyed.
 */
export interface Closure<A extends Array<unknown>, R> {
  readonly call: (...args: A) => R
  readonly captures?: ReadonlyArray<unknown>
  readonly dispose?: () => void
}

/**
 * Anything a UniqueFunction can be built from.
 */
export type Callable<A extends Array<unknown>, R> =
  | ((...args: A) => R)
  | Closure<A, R>

/**
 * A closure with every optional field resolved.
 */
export interface NormalizedClosure<A extends Array<unknown>, R> {
  readonly call: (...args: A) => R
  readonly captures: ReadonlyArray<unknown>
  readonly dispose: (() => void) | undefined
}

/**
 * Inline storage. `values` always has TINY_CAPACITY entries.
 */
export interface TinyStorage<A extends Array<unknown>, R> {
  call: ((...args: A) => R) | undefined
  dispose: (() => void) | undefined
  readonly values: Array<unknown>
  count: number
}

/**
 * A closure moved out of line.
 */
export interface HeapBlock<A extends Array<unknown>, R> {
  readonly closure: NormalizedClosure<A, R>
  readonly allocator: HeapAllocator
  freed: boolean
}

export interface Storage<A extends Array<unknown>, R> {
  readonly tiny: TinyStorage<A, R>
  big: HeapBlock<A, R> | undefined
}

/**
 * Source of heap blocks for closures too large to store inline.
 */
export interface HeapAllocator {
  allocate<A extends Array<unknown>, R>(
    closure: NormalizedClosure<A, R>
  ): HeapBlock<A, R>
  free<A extends Array<unknown>, R>(block: HeapBlock<A, R>): void
}

export function normalizeClosure<A extends Array<unknown>, R>(
  callable: Callable<A, R>
): NormalizedClosure<A, R> {
  if (typeof callable === `function`) {
    return { call: callable, captures: [], dispose: undefined }
  }
  return {
    call: callable.call,
    captures: callable.captures ?? [],
    dispose: callable.dispose,
  }
}

export function createStorage<A extends Array<unknown>, R>(): Storage<
  A,
  R
> {
  return {
    tiny: {
      call: undefined,
      dispose: undefined,
      values: new Array<unknown>(TINY_CAPACITY).fill(undefined),
      count: 0,
    },
    big: undefined,
  }
}

export function fitsInline<A extends Array<unknown>, R>(
  closure: NormalizedClosure<A, R>
): boolean {
  return closure.captures.length <= TINY_CAPACITY
}

/**
 * Copy a closure into inline storage.
 */
export function placeInline<A extends Array<unknown>, R>(
  tiny: TinyStorage<A, R>,
  closure: NormalizedClosure<A, R>
): void {
  tiny.call = closure.call
  tiny.dispose = closure.dispose
  tiny.count = closure.captures.length
  closure.captures.forEach((value, index) => {
    tiny.values[index] = value
  })
}

/**
 * Empty inline storage.
 */
export function clearInline<A extends Array<unknown>, R>(
  tiny: TinyStorage<A, R>
): void {
  tiny.call = undefined
  tiny.dispose = undefined
  tiny.count = 0
  tiny.values.fill(undefined)
}

function createBlock<A extends Array<unknown>, R>(
  closure: NormalizedClosure<A, R>,
  allocator: HeapAllocator
): HeapBlock<A, R> {
  return {
    closure: { ...closure, captures: [...closure.captures] },
    allocator,
    freed: false,
  }
}

function releaseBlock<A extends Array<unknown>, R>(
  block: HeapBlock<A, R>
): void {
  if (block.freed) {
    throw new DoubleFreeError()
  }
  block.freed = true
}

/**
 * Allocator used when none is configured.
 */
export const defaultAllocator: HeapAllocator = {
  allocate(closure) {
    return createBlock(closure, defaultAllocator)
  },
  free(block) {
    releaseBlock(block)
  },
}

/**
 * Allocator that records how many blocks it has handed out and taken back.
 *
 * @example
 * ```typescript
 * const allocator = new CountingAllocator()
 * const fn = new UniqueFunction(
 *   { call: () => 1, captures: [1, 2, 3, 4, 5] },
 *   { allocator }
 * )
 * allocator.allocations // 1
 * fn.dispose()
 * allocator.frees // 1
 * ```
 */
export class CountingAllocator implements HeapAllocator {
  allocations = 0
  frees = 0

  get live(): number {
    return this.allocations - this.frees
  }

  allocate<A extends Array<unknown>, R>(
    closure: NormalizedClosure<A, R>
  ): HeapBlock<A, R> {
    const block = createBlock(closure, this)
    this.allocations++
    return block
  }

  free<A extends Array<unknown>, R>(block: HeapBlock<A, R>): void {
    releaseBlock(block)
    this.frees++
  }

  reset(): void {
    this.allocations = 0
    this.frees = 0
  }
}
