// src/main/utils/task-queue.ts
import { QueueFullError } from './errors'

export interface TaskQueueOptions {
  name?: string
  /** Tasks allowed to wait behind the running one; further submissions are rejected */
  maxPending?: number
}

/**
 * Runs submitted tasks one at a time in submission order.
 * A task never starts before the previous one has settled.
 */
export class TaskQueue {
  private queue: Array<() => Promise<void>> = []
  private processing = false
  private idleWaiters: Array<() => void> = []
  private readonly name: string
  private readonly maxPending: number

  constructor(options: TaskQueueOptions = {}) {
    this.name = options.name ?? 'TaskQueue'
    this.maxPending = Math.max(1, options.maxPending ?? Number.POSITIVE_INFINITY)
  }

  get pending(): number {
    return this.queue.length
  }

  get busy(): boolean {
    return this.processing
  }

  execute<T>(fn: () => Promise<T> | T): Promise<T> {
    if (this.queue.length >= this.maxPending) {
      return Promise.reject(new QueueFullError(`${this.name} is full (${this.maxPending} pending)`))
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push(async () => {
        try {
          resolve(await fn())
        } catch (error) {
          reject(error)
        }
      })

      void this.processQueue()
    })
  }

  /**
   * Resolves once every task submitted so far has settled
   */
  onIdle(): Promise<void> {
    if (!this.processing && this.queue.length === 0) {
      return Promise.resolve()
    }
    return new Promise(resolve => this.idleWaiters.push(resolve))
  }

  private async processQueue(): Promise<void> {
    if (this.processing) {
      return
    }

    this.processing = true

    while (this.queue.length > 0) {
      const task = this.queue.shift()
      if (task) {
        await task()
      }
    }

    this.processing = false

    const waiters = this.idleWaiters
    this.idleWaiters = []
    waiters.forEach(resolve => resolve())
  }
}
