/**
 * @handoff/callable
 *
 * Move-only, type-erased callables with inline storage for small closures.
 *
 * @packageDocumentation
 */

// Main class
export { UniqueFunction, EMPTY, swap } from "./unique-function"

// Storage
export { TINY_CAPACITY, CountingAllocator, defaultAllocator } from "./storage"

// Types
export type { Empty, UniqueFunctionOptions } from "./unique-function"
export type {
  Callable,
  Closure,
  HeapAllocator,
  HeapBlock,
  NormalizedClosure,
  Representation,
} from "./storage"

// Errors
export { BadCallError, DoubleFreeError } from "./error"
