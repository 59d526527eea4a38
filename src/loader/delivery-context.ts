import type { DeliveryContext } from '../types/photo.js'

/**
 * Single-threaded delivery loop. Posted tasks run later, one at a time, in
 * posting order. A task that throws is handed to the error handler and the
 * loop carries on with the next one.
 */
export class TaskQueueDeliveryContext implements DeliveryContext {
  private queue: Array<() => void> = []
  private scheduled = false
  private waiters: Array<() => void> = []
  private onError?: (error: unknown) => void

  setErrorHandler(handler: (error: unknown) => void): void {
    this.onError = handler
  }

  postTask(fn: () => void): void {
    this.queue.push(fn)
    this.schedule()
  }

  /**
   * Resolves once every task posted so far, and any they post, has run
   */
  idle(): Promise<void> {
    if (this.queue.length === 0 && !this.scheduled) {
      return Promise.resolve()
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve)
    })
  }

  get size(): number {
    return this.queue.length
  }

  private schedule(): void {
    if (this.scheduled) return
    this.scheduled = true
    setImmediate(() => this.drain())
  }

  private drain(): void {
    try {
      let task = this.queue.shift()
      while (task) {
        this.run(task)
        task = this.queue.shift()
      }
    } finally {
      this.scheduled = false
      const waiters = this.waiters
      this.waiters = []
      for (const resolve of waiters) {
        resolve()
      }
    }
  }

  private run(task: () => void): void {
    try {
      task()
    } catch (error) {
      this.fail(error)
    }
  }

  private fail(error: unknown): void {
    if (!this.onError) {
      console.error('[photo-loader] Delivery task failed', error)
      return
    }
    try {
      this.onError(error)
    } catch (handlerError) {
      console.error('[photo-loader] Delivery error handler failed', handlerError)
    }
  }
}
