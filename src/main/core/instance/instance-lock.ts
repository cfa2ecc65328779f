// src/main/core/instance/instance-lock.ts
import { mkdirSync, readFileSync, unlinkSync, writeFileSync } from 'fs'
import { dirname } from 'path'
import { createLogger } from '../../utils/logger'
import { describeError } from '../../utils/errors'

const logger = createLogger('InstanceLock')

export type InstanceLockResult =
  | { status: 'proceed'; release: () => void }
  | { status: 'already-running'; pid: number }

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error
}

export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0)
    return true
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return isErrnoException(error) && error.code === 'EPERM'
  }
}

function readLockPid(lockPath: string): number | null {
  try {
    const pid = Number.parseInt(readFileSync(lockPath, 'utf8').trim(), 10)
    return Number.isSafeInteger(pid) && pid > 0 ? pid : null
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return null
    }
    throw error
  }
}

/**
 * Make sure only one instance runs. Must be called before any watcher starts.
 * A lock left behind by a dead process is taken over.
 */
export function acquireInstanceLock(
  lockPath: string,
  pid: number = process.pid,
  isAlive: (pid: number) => boolean = isProcessAlive
): InstanceLockResult {
  mkdirSync(dirname(lockPath), { recursive: true })

  for (let attempt = 0; attempt < 2; attempt++) {
    try {
      writeFileSync(lockPath, String(pid), { flag: 'wx' })
      logger.debug(`Acquired instance lock ${lockPath}`)
      return { status: 'proceed', release: () => releaseLock(lockPath, pid) }
    } catch (error) {
      if (!isErrnoException(error) || error.code !== 'EEXIST') {
        throw error
      }
    }

    const owner = readLockPid(lockPath)
    if (owner !== null && owner !== pid && isAlive(owner)) {
      return { status: 'already-running', pid: owner }
    }

    logger.warn(`Taking over stale instance lock${owner === null ? '' : ` from pid ${owner}`}`)
    removeLock(lockPath)
  }

  throw new Error(`Could not acquire instance lock at ${lockPath}`)
}

function releaseLock(lockPath: string, pid: number): void {
  try {
    if (readLockPid(lockPath) === pid) {
      removeLock(lockPath)
    }
  } catch (error) {
    logger.error('Failed to release instance lock:', describeError(error))
  }
}

function removeLock(lockPath: string): void {
  try {
    unlinkSync(lockPath)
  } catch (error) {
    if (!isErrnoException(error) || error.code !== 'ENOENT') {
      throw error
    }
  }
}
