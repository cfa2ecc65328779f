// src/main/utils/retry.ts
import { createLogger } from './logger'
import { describeError } from './errors'

const logger = createLogger('Retry')

export interface RetryOptions {
  attempts?: number
  /** Base delay; attempt n waits delayMs * n before the next try */
  delayMs?: number
  label?: string
  shouldRetry?: (error: unknown) => boolean
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * True when `promise` settles within `ms`, false when the time ran out first
 */
export async function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<boolean>(resolve => {
    timer = setTimeout(() => resolve(false), ms)
  })

  try {
    return await Promise.race([promise.then(() => true, () => true), timeout])
  } finally {
    clearTimeout(timer)
  }
}

/**
 * Run an async operation, retrying with linear backoff.
 * Rethrows the last error once attempts are exhausted.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    attempts = 3,
    delayMs = 50,
    label = 'Operation',
    shouldRetry = () => true
  } = options

  let lastError: unknown = new Error(`${label} was not attempted`)

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await fn()
    } catch (error) {
      lastError = error

      if (attempt === attempts || !shouldRetry(error)) {
        break
      }

      logger.debug(`${label} failed, retrying (${attempt}/${attempts}):`, describeError(error))
      await sleep(delayMs * attempt)
    }
  }

  throw lastError
}
