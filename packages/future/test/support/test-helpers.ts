/**
 * Test helper utilities for future tests.
 */

import fastq from "fastq"
import { Completer } from "../../src/index"
import type { queueAsPromised } from "fastq"
import type { SharedFuture } from "../../src/index"

type Job = () => Promise<void>

/**
 * Runs tasks concurrently, standing in for the threads a caller would
 * drive producers and consumers on.
 */
export class TaskPool {
  private queue: queueAsPromised<Job>

  constructor(concurrency: number) {
    this.queue = fastq.promise(this.worker.bind(this), concurrency)
  }

  /**
   * Schedule `task` and get a promise of its result.
   */
  run<R>(task: () => R | Promise<R>): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      this.queue
        .push(async () => {
          resolve(await task())
        })
        .catch(reject)
    })
  }

  /**
   * Drop queued tasks that have not started.
   */
  close(): void {
    this.queue.killAndDrain()
  }

  private async worker(job: Job): Promise<void> {
    await job()
  }
}

/**
 * A start signal many tasks can wait on, released all at once.
 */
export interface Gate {
  ready: SharedFuture<void>
  open: () => void
}

export function createGate(): Gate {
  const go = new Completer<void>()
  return {
    ready: go.getFuture().share(),
    open: () => go.setValue(),
  }
}

/**
 * Sleep for a specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Whether `promise` is still unsettled after `ms` milliseconds.
 */
export async function isPending(
  promise: Promise<unknown>,
  ms = 20
): Promise<boolean> {
  const pending = Symbol(`pending`)
  const winner = await Promise.race([
    promise.then(
      () => `settled`,
      () => `settled`
    ),
    sleep(ms).then(() => pending),
  ])
  return winner === pending
}
