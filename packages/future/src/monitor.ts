/**
 * Condition-variable style waiting for asynchronous callers.
 */

interface Waiter {
  ready: () => boolean
  resolve: () => void
}

/**
 * A set of callers waiting for a condition on shared state.
 *
 * The owner changes its state and then calls `notifyAll()`; every waiter
 * whose condition now holds is released, the others keep waiting.
 */
export class Monitor {
  private waiters: Array<Waiter> = []

  /**
   * Number of callers currently waiting.
   */
  get waiting(): number {
    return this.waiters.length
  }

  /**
   * Wait until `ready()` returns true. Resolves immediately if it already does.
   */
  waitUntil(ready: () => boolean): Promise<void> {
    if (ready()) {
      return Promise.resolve()
    }

    return new Promise((resolve) => {
      this.waiters.push({ ready, resolve })
    })
  }

  /**
   * Re-check every waiter and release those whose condition holds.
   */
  notifyAll(): void {
    const toNotify: Array<Waiter> = []
    const remaining: Array<Waiter> = []
    for (const waiter of this.waiters) {
      if (waiter.ready()) {
        toNotify.push(waiter)
      } else {
        remaining.push(waiter)
      }
    }
    if (toNotify.length === 0) return

    this.waiters = remaining
    for (const waiter of toNotify) {
      waiter.resolve()
    }
  }
}
