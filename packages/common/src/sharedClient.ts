/**
 * Process-wide holder for expensive client handles (drivers, connection pools),
 * one per backing resource key.
 *
 * - `acquire()` stores the pending initialization before awaiting it, so
 *   concurrent first callers share one initialization.
 * - Later callers reuse the handle; `init` does not run again.
 * - A failed initialization is evicted so a later caller may retry.
 * - Handles are only torn down by an explicit `closeAll()`.
 */
export class SharedClientProvider<T> {
  private readonly clients = new Map<string, Promise<T>>()
  private readonly dispose: (client: T) => Promise<void>

  constructor(dispose: (client: T) => Promise<void>) {
    this.dispose = dispose
  }

  acquire(key: string, init: () => Promise<T>): Promise<T> {
    const existing = this.clients.get(key)
    if (existing !== undefined) return existing

    const pending: Promise<T> = init().catch((err: unknown) => {
      if (this.clients.get(key) === pending) this.clients.delete(key)
      throw err
    })
    this.clients.set(key, pending)
    return pending
  }

  has(key: string): boolean {
    return this.clients.has(key)
  }

  get size(): number {
    return this.clients.size
  }

  async closeAll(): Promise<void> {
    const pending = [...this.clients.values()]
    this.clients.clear()
    const settled = await Promise.allSettled(pending)
    for (const entry of settled) {
      if (entry.status === 'fulfilled') {
        await this.dispose(entry.value)
      }
    }
  }
}
