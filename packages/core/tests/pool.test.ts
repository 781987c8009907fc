import type { Invoker } from '@pipeline-invokers/common'
import { PoolError } from '@pipeline-invokers/common'
import { describe, expect, it } from 'vitest'
import { InvokerPool } from '../src/pool.js'

function invokers(count: number): Invoker[] {
  return Array.from({ length: count }, (_, i) => ({ invoke: async () => `invoker-${i}` }))
}

/** Resolves once pending promise callbacks have run. */
function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

function thrown(fn: () => void): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error('Expected an error')
}

describe('InvokerPool', () => {
  it('rejects an empty pool', () => {
    expect(() => new InvokerPool([])).toThrow(PoolError)
  })

  it('rejects the same instance twice', () => {
    const [a] = invokers(1)
    if (a === undefined) throw new Error('fixture')
    expect(() => new InvokerPool([a, a])).toThrow('The same invoker instance appears more than once')
  })

  it('hands out every instance before anyone waits', async () => {
    const members = invokers(3)
    const pool = new InvokerPool(members)

    const acquired = [await pool.acquire(), await pool.acquire(), await pool.acquire()]
    expect(new Set(acquired)).toEqual(new Set(members))
    expect(pool.available).toBe(0)
  })

  it('the next acquire waits until a release', async () => {
    const pool = new InvokerPool(invokers(2))
    const first = await pool.acquire()
    await pool.acquire()

    let got: Invoker | undefined
    const waiting = pool.acquire().then((inv) => {
      got = inv
    })
    await flush()
    expect(got).toBeUndefined()
    expect(pool.waiting).toBe(1)

    pool.release(first)
    await waiting
    expect(got).toBe(first)
    expect(pool.waiting).toBe(0)
    expect(pool.available).toBe(0)
  })

  it('serves waiters in arrival order', async () => {
    const [only] = invokers(1)
    if (only === undefined) throw new Error('fixture')
    const pool = new InvokerPool([only])
    const held = await pool.acquire()

    const order: string[] = []
    const a = pool.acquire().then((inv) => {
      order.push('a')
      pool.release(inv)
    })
    const b = pool.acquire().then((inv) => {
      order.push('b')
      pool.release(inv)
    })

    pool.release(held)
    await Promise.all([a, b])
    expect(order).toEqual(['a', 'b'])
    expect(pool.available).toBe(1)
  })

  it('a released instance is reused', async () => {
    const pool = new InvokerPool(invokers(1))
    const first = await pool.acquire()
    pool.release(first)
    expect(await pool.acquire()).toBe(first)
  })

  it('refuses an instance from elsewhere', () => {
    const pool = new InvokerPool(invokers(1))
    const [stranger] = invokers(1)
    if (stranger === undefined) throw new Error('fixture')
    expect(thrown(() => pool.release(stranger))).toMatchObject({ code: 'FOREIGN_INVOKER' })
  })

  it('refuses a second release of the same instance', async () => {
    const pool = new InvokerPool(invokers(2))
    const inv = await pool.acquire()
    pool.release(inv)
    expect(() => pool.release(inv)).toThrow('Invoker was released twice')
    expect(pool.available).toBe(2)
  })

  it('refuses to release an instance that was never acquired', () => {
    const members = invokers(2)
    const pool = new InvokerPool(members)
    const [first] = members
    if (first === undefined) throw new Error('fixture')
    expect(thrown(() => pool.release(first))).toMatchObject({ code: 'DOUBLE_RELEASE' })
  })

  it('accepts a repeated release once the instance went to a waiter', async () => {
    const [only] = invokers(1)
    if (only === undefined) throw new Error('fixture')
    const pool = new InvokerPool([only])
    const held = await pool.acquire()
    const waiting = pool.acquire()

    pool.release(held)
    expect(await waiting).toBe(only)
    pool.release(held)
    expect(pool.available).toBe(1)
  })

  it('use() releases after the callback throws', async () => {
    const pool = new InvokerPool(invokers(1))
    await expect(
      pool.use(async () => {
        throw new Error('step failed')
      }),
    ).rejects.toThrow('step failed')
    expect(pool.available).toBe(1)
  })

  it('use() returns the callback result', async () => {
    const pool = new InvokerPool(invokers(1))
    expect(await pool.use((inv) => inv.invoke('x'))).toBe('invoker-0')
    expect(pool.available).toBe(1)
  })
})
