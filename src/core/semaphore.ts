/**
 * Counting semaphore with FIFO hand-off.
 */
export class Semaphore {
  private available: number
  private readonly waiters: Array<() => void> = []

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Semaphore capacity must be a positive integer, got ${capacity}`)
    }

    this.available = capacity
  }

  /**
   * Waits for a free slot. Returns an idempotent release function.
   */
  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available--
    } else {
      await new Promise<void>(resolve => {
        this.waiters.push(resolve)
      })
    }

    let released = false
    return () => {
      if (released) {
        return
      }

      released = true
      const next = this.waiters.shift()
      if (next) {
        // Slot passes straight to the next waiter
        next()
      } else {
        this.available++
      }
    }
  }
}
