/**
 * Test helper utilities for UniqueFunction tests.
 */

/**
 * A value whose owners are counted, standing in for a reference-counted
 * capture. Every closure that captures it calls `release()` on disposal.
 */
export class Tracked<T> {
  owners = 1

  constructor(readonly value: T) {}

  retain(): this {
    this.owners++
    return this
  }

  release(): void {
    this.owners--
  }
}

/**
 * Build a closure record that owns one reference to `tracked`.
 */
export function capturing<T>(
  tracked: Tracked<T>
): { call: () => T; captures: [Tracked<T>]; dispose: () => void } {
  const owned = tracked.retain()
  return {
    call: () => owned.value,
    captures: [owned],
    dispose: () => owned.release(),
  }
}

/**
 * A list of `count` distinct capture values.
 */
export function captureList(count: number): Array<number> {
  return Array.from({ length: count }, (_, i) => i)
}
