/**
 * Dispatch tables for UniqueFunction.
 *
 * A table is picked once, when the closure is stored, and knows how to call,
 * move and destroy a closure in one representation. The instance itself only
 * keeps a reference to its table.
 */

import { BadCallError } from "./error"
import { clearInline } from "./storage"
import type { Representation, Storage } from "./storage"

export interface Vtable {
  readonly kind: Representation
  invoke<A extends Array<unknown>, R>(storage: Storage<A, R>, args: A): R
  relocate<A extends Array<unknown>, R>(
    dst: Storage<A, R>,
    src: Storage<A, R>
  ): void
  destroy<A extends Array<unknown>, R>(storage: Storage<A, R>): void
}

function runDispose(dispose: (() => void) | undefined): void {
  if (!dispose) return
  try {
    dispose()
  } catch (err) {
    console.error(`[UniqueFunction] Error disposing closure:`, err)
  }
}

export const EMPTY_VTABLE: Vtable = {
  kind: `empty`,
  invoke() {
    throw new BadCallError()
  },
  relocate() {},
  destroy() {},
}

export const TINY_VTABLE: Vtable = {
  kind: `tiny`,
  invoke(storage, args) {
    const call = storage.tiny.call
    if (!call) {
      throw new BadCallError(`Inline storage holds no closure`)
    }
    return call(...args)
  },
  relocate(dst, src) {
    dst.tiny.call = src.tiny.call
    dst.tiny.dispose = src.tiny.dispose
    dst.tiny.count = src.tiny.count
    for (let i = 0; i < src.tiny.count; i++) {
      dst.tiny.values[i] = src.tiny.values[i]
    }
    clearInline(src.tiny)
  },
  destroy(storage) {
    const dispose = storage.tiny.dispose
    clearInline(storage.tiny)
    runDispose(dispose)
  },
}

export const BIG_VTABLE: Vtable = {
  kind: `big`,
  invoke(storage, args) {
    const block = storage.big
    if (!block) {
      throw new BadCallError(`Heap storage holds no closure`)
    }
    return block.closure.call(...args)
  },
  relocate(dst, src) {
    dst.big = src.big
    src.big = undefined
  },
  destroy(storage) {
    const block = storage.big
    if (!block) return
    storage.big = undefined
    runDispose(block.closure.dispose)
    block.allocator.free(block)
  },
}
