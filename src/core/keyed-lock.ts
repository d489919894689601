/**
 * In-memory async mutex keyed by string (fingerprints).
 *
 * Serializes writers of the same key without blocking other keys. Keys are
 * acquired in sorted order so callers holding several never deadlock.
 */
export class KeyedLock {
  private readonly locks = new Map<string, Promise<void>>()
  private readonly resolvers = new Map<string, () => void>()

  /**
   * Acquire exclusive locks on the given keys.
   * Returns an idempotent release function.
   */
  async acquire(keys: string[]): Promise<() => void> {
    const sorted = [...new Set(keys)].sort()
    for (const key of sorted) {
      let pending = this.locks.get(key)
      while (pending) {
        await pending
        pending = this.locks.get(key)
      }

      this.locks.set(key, new Promise<void>(resolve => {
        this.resolvers.set(key, resolve)
      }))
    }

    let released = false
    return () => {
      if (released) {
        return
      }

      released = true
      for (const key of sorted) {
        const resolve = this.resolvers.get(key)
        this.locks.delete(key)
        this.resolvers.delete(key)
        resolve?.()
      }
    }
  }

  /** Run `task` while holding the lock on `key`. */
  async withLock<T>(key: string, task: () => Promise<T>): Promise<T> {
    const release = await this.acquire([key])
    try {
      return await task()
    } finally {
      release()
    }
  }

  isLocked(key: string): boolean {
    return this.locks.has(key)
  }
}
