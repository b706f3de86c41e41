/**
 * UniqueFunction Error Classes
 */

/**
 * Error thrown when an empty UniqueFunction is invoked.
 */
export class BadCallError extends Error {
  constructor(message = `Called an empty UniqueFunction`) {
    super(message)
    this.name = `BadCallError`
  }
}

/**
 * Error thrown when a heap block is released twice.
 */
export class DoubleFreeError extends Error {
  constructor(message = `Heap block has already been freed`) {
    super(message)
    this.name = `DoubleFreeError`
  }
}
