import { describe, it, expect } from 'vitest'
import { TaskQueue } from '../../src/main/utils/task-queue'
import { QueueFullError } from '../../src/main/utils/errors'
import { sleep } from '../../src/main/utils/retry'

describe('TaskQueue', () => {
  it('runs tasks one at a time in submission order', async () => {
    const queue = new TaskQueue()
    const log: string[] = []

    await Promise.all([
      queue.execute(async () => {
        log.push('a:start')
        await sleep(10)
        log.push('a:end')
      }),
      queue.execute(() => {
        log.push('b')
      }),
    ])

    expect(log).toEqual(['a:start', 'a:end', 'b'])
  })

  it('resolves with the task result and rejects with its error', async () => {
    const queue = new TaskQueue()

    await expect(queue.execute(() => 42)).resolves.toBe(42)
    await expect(queue.execute(() => {
      throw new Error('boom')
    })).rejects.toThrow('boom')
    await expect(queue.execute(async () => 'after')).resolves.toBe('after')
  })

  it('rejects submissions beyond maxPending', async () => {
    const queue = new TaskQueue({ name: 'Test', maxPending: 1 })

    const running = queue.execute(() => sleep(10))
    const waiting = queue.execute(() => 'waited')
    const rejected = queue.execute(() => 'never')

    await expect(rejected).rejects.toBeInstanceOf(QueueFullError)
    await expect(rejected).rejects.toThrow('Test is full (1 pending)')
    await running
    await expect(waiting).resolves.toBe('waited')
  })

  it('reports idle once every task has settled', async () => {
    const queue = new TaskQueue()
    let done = false

    queue.execute(async () => {
      await sleep(10)
      done = true
    }).catch(() => {})
    expect(queue.busy).toBe(true)

    await queue.onIdle()

    expect(done).toBe(true)
    expect(queue.busy).toBe(false)
    expect(queue.pending).toBe(0)
  })
})
