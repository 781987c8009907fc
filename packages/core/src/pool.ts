import type { Invoker } from '@pipeline-invokers/common'
import { PoolError } from '@pipeline-invokers/common'

/**
 * Fixed set of ready invokers handed out one caller at a time.
 *
 * - `acquire()` takes the oldest idle instance, or waits for the next `release()`.
 *   Waiters are served in arrival order. There is no acquire timeout.
 * - `release()` rejects instances from another pool and instances already idle.
 *   Ownership is not tracked per caller: once an instance has been handed to a
 *   waiter, a second release by its previous holder is accepted and returns it
 *   to circulation while the waiter still uses it.
 */
export class InvokerPool<T extends Invoker = Invoker> {
  private readonly members: ReadonlySet<T>
  private readonly idle: T[]
  private readonly waiters: ((invoker: T) => void)[] = []

  constructor(invokers: readonly T[]) {
    if (invokers.length === 0) {
      throw new PoolError('INVALID_POOL_SIZE', 'An invoker pool needs at least one invoker')
    }
    this.members = new Set(invokers)
    if (this.members.size !== invokers.length) {
      throw new PoolError('INVALID_POOL_SIZE', 'The same invoker instance appears more than once')
    }
    this.idle = [...invokers]
  }

  get size(): number {
    return this.members.size
  }

  /** Idle instances. */
  get available(): number {
    return this.idle.length
  }

  /** Callers waiting in `acquire()`. */
  get waiting(): number {
    return this.waiters.length
  }

  acquire(): Promise<T> {
    const invoker = this.idle.shift()
    if (invoker !== undefined) return Promise.resolve(invoker)
    return new Promise<T>((resolve) => {
      this.waiters.push(resolve)
    })
  }

  release(invoker: T): void {
    if (!this.members.has(invoker)) {
      throw new PoolError('FOREIGN_INVOKER', 'Released invoker does not belong to this pool')
    }
    if (this.idle.includes(invoker)) {
      throw new PoolError('DOUBLE_RELEASE', 'Invoker was released twice')
    }

    const next = this.waiters.shift()
    if (next !== undefined) {
      next(invoker)
      return
    }
    this.idle.push(invoker)
  }

  /** Acquire, run `fn`, and release on every exit path. */
  async use<R>(fn: (invoker: T) => Promise<R>): Promise<R> {
    const invoker = await this.acquire()
    try {
      return await fn(invoker)
    } finally {
      this.release(invoker)
    }
  }
}
