// src/main/core/history/open-backend.ts
import { createLogger } from '../../utils/logger'
import { describeError } from '../../utils/errors'
import type { HistoryBackend } from './backend'
import { MemoryHistoryBackend } from './memory-backend'
import { SqliteHistoryBackend, type SqliteBackendOptions } from './sqlite-backend'

const logger = createLogger('HistoryBackend')

export interface OpenedBackend {
  backend: HistoryBackend
  persistent: boolean
}

/**
 * Open the on-disk history, falling back to a session-only in-memory history
 * when the database cannot be opened.
 */
export function openHistoryBackend(path: string, options: SqliteBackendOptions = {}): OpenedBackend {
  try {
    return { backend: new SqliteHistoryBackend(path, options), persistent: true }
  } catch (error) {
    logger.error(`Cannot open history database at ${path}, history will not survive this session:`, describeError(error))
    return { backend: new MemoryHistoryBackend(), persistent: false }
  }
}
