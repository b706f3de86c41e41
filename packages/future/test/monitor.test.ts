/**
 * Tests for Monitor.
 */

import { describe, expect, it } from "vitest"
import { Monitor } from "../src/index"
import { isPending } from "./support/test-helpers"

describe(`Monitor`, () => {
  it(`should resolve immediately when the condition already holds`, async () => {
    const monitor = new Monitor()
    const waited = monitor.waitUntil(() => true)

    expect(monitor.waiting).toBe(0)
    expect(await isPending(waited)).toBe(false)
  })

  it(`should keep waiting until notified`, async () => {
    const monitor = new Monitor()
    let done = false
    const waited = monitor.waitUntil(() => done)

    done = true
    expect(await isPending(waited)).toBe(true)

    monitor.notifyAll()
    expect(await isPending(waited)).toBe(false)
  })

  it(`should release only the waiters whose condition holds`, async () => {
    const monitor = new Monitor()
    const flags = { first: false, second: false }
    const first = monitor.waitUntil(() => flags.first)
    const second = monitor.waitUntil(() => flags.second)
    expect(monitor.waiting).toBe(2)

    flags.first = true
    monitor.notifyAll()

    expect(monitor.waiting).toBe(1)
    expect(await isPending(first)).toBe(false)
    expect(await isPending(second)).toBe(true)

    flags.second = true
    monitor.notifyAll()
    expect(monitor.waiting).toBe(0)
    expect(await isPending(second)).toBe(false)
  })

  it(`should keep the remaining waiters in registration order`, async () => {
    const monitor = new Monitor()
    const flags = [false, false, false]
    const order: Array<number> = []
    const waits = flags.map((_, i) =>
      monitor.waitUntil(() => flags[i] === true).then(() => {
        order.push(i)
      })
    )

    flags[1] = true
    monitor.notifyAll()
    await waits[1]
    expect(monitor.waiting).toBe(2)

    flags[0] = true
    flags[2] = true
    monitor.notifyAll()
    await Promise.all(waits)

    expect(order).toEqual([1, 0, 2])
    expect(monitor.waiting).toBe(0)
  })

  it(`should do nothing when no condition holds`, () => {
    const monitor = new Monitor()
    void monitor.waitUntil(() => false)

    monitor.notifyAll()
    expect(monitor.waiting).toBe(1)
  })
})
