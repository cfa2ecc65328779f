// src/main/core/history/history-store.ts
import { createHash } from 'crypto'
import type { CaptureContent, Entry, EntryContent, EntryId, ListQuery } from '../../types'
import { createLogger } from '../../utils/logger'
import { StorageUnavailableError, describeError } from '../../utils/errors'
import { TaskQueue } from '../../utils/task-queue'
import { DEFAULT_PREVIEW_LENGTH, generatePreview } from '../../utils/preview'
import { sameContent, type HistoryBackend } from './backend'

const logger = createLogger('HistoryStore')

const DAY_MS = 24 * 60 * 60 * 1000
const EXPIRE_CHECK_INTERVAL_MS = 60 * 60 * 1000

export const DEFAULT_MAX_ENTRIES = 500
export const DEFAULT_MAX_CONTENT_LENGTH = 50_000
export const DEFAULT_EXPIRE_DAYS = 30

export interface HistoryStoreOptions {
  maxEntries?: number
  /** Text longer than this is truncated before storage */
  maxContentLength?: number
  previewLength?: number
  /** Unpinned entries unused for this many days are purged; 0 disables expiry */
  expireDays?: number
  now?: () => number
}

export function hashImage(data: Buffer): string {
  return createHash('sha256').update(data).digest('hex')
}

/**
 * Bounded clipboard history. Every public operation runs inside one serialized
 * critical section, so watcher writes and UI edits never interleave.
 *
 * When every entry is pinned an insert still succeeds and the history grows past
 * maxEntries; the next insert that finds an unpinned victim trims it back.
 */
export class HistoryStore {
  private readonly queue = new TaskQueue({ name: 'HistoryStore' })
  private readonly maxEntries: number
  private readonly maxContentLength: number
  private readonly previewLength: number
  private readonly expireDays: number
  private readonly now: () => number
  private lastExpireCheck: number
  private closed = false

  constructor(private readonly backend: HistoryBackend, options: HistoryStoreOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES)
    this.maxContentLength = options.maxContentLength ?? DEFAULT_MAX_CONTENT_LENGTH
    this.previewLength = options.previewLength ?? DEFAULT_PREVIEW_LENGTH
    this.expireDays = options.expireDays ?? DEFAULT_EXPIRE_DAYS
    this.now = options.now ?? Date.now
    this.lastExpireCheck = this.now()
  }

  get capacity(): number {
    return this.maxEntries
  }

  /**
   * Insert a capture, or refresh the top entry when it holds the same content.
   * Only the most recent entry is compared, so content can reappear further down.
   */
  add(capture: CaptureContent): Promise<EntryId> {
    const content = this.normalize(capture)

    return this.run('add', () => {
      const now = this.now()
      const top = this.backend.latest()

      if (top && sameContent(top.content, content)) {
        this.backend.touch(top.id, now)
        logger.debug(`Refreshed entry ${top.id} (consecutive duplicate)`)
        return top.id
      }

      const id = this.backend.insert({
        content,
        pinned: false,
        createdAt: now,
        lastUsedAt: now,
        preview: generatePreview(content, this.previewLength),
      })
      logger.debug(`Added ${content.kind} entry ${id}`)

      this.evictOverflow(id)
      this.expireIfDue(now)
      return id
    })
  }

  list(query: ListQuery = {}): Promise<Entry[]> {
    const needle = (query.filter ?? '').toLocaleLowerCase()
    const offset = Math.max(0, query.offset ?? 0)

    return this.run('list', () => {
      const matches = this.backend.scan().filter(entry => {
        if (needle === '') return true
        return entry.content.kind === 'text' && entry.content.text.toLocaleLowerCase().includes(needle)
      })

      return query.limit === undefined
        ? matches.slice(offset)
        : matches.slice(offset, offset + Math.max(0, query.limit))
    })
  }

  get(id: EntryId): Promise<Entry | undefined> {
    return this.run('get', () => this.backend.get(id))
  }

  /**
   * Returns false when the entry no longer exists (evicted or deleted meanwhile)
   */
  setPinned(id: EntryId, pinned: boolean): Promise<boolean> {
    return this.run('setPinned', () => this.backend.setPinned(id, pinned))
  }

  togglePin(id: EntryId): Promise<boolean> {
    return this.run('togglePin', () => {
      const entry = this.backend.get(id)
      return entry ? this.backend.setPinned(id, !entry.pinned) : false
    })
  }

  delete(id: EntryId): Promise<boolean> {
    return this.run('delete', () => this.backend.remove(id))
  }

  /**
   * Clear history, keeping pinned entries
   */
  clearUnpinned(): Promise<number> {
    return this.run('clearUnpinned', () => {
      const removed = this.backend.removeUnpinned()
      logger.info(`Cleared ${removed} unpinned entries`)
      return removed
    })
  }

  count(): Promise<number> {
    return this.run('count', () => this.backend.count())
  }

  purgeExpired(): Promise<number> {
    return this.run('purgeExpired', () => {
      this.lastExpireCheck = this.now()
      return this.expire(this.lastExpireCheck)
    })
  }

  /**
   * Flush and release the backend. Later operations fail with StorageUnavailableError.
   */
  close(): Promise<void> {
    return this.queue.execute(() => {
      if (this.closed) return
      this.closed = true
      try {
        this.backend.close()
      } catch (error) {
        throw new StorageUnavailableError('Failed to close history storage', { cause: error })
      }
    })
  }

  private normalize(capture: CaptureContent): EntryContent {
    if (capture.kind === 'image') {
      return { kind: 'image', data: capture.data, hash: hashImage(capture.data) }
    }
    return { kind: 'text', text: capture.text.slice(0, this.maxContentLength) }
  }

  private evictOverflow(newestId: EntryId): void {
    let count = this.backend.count()

    while (count > this.maxEntries) {
      const victim = this.backend.oldestUnpinned(newestId)
      if (victim === undefined) {
        logger.warn(`All older entries are pinned; history holds ${count} of ${this.maxEntries} entries`)
        return
      }
      this.backend.remove(victim)
      logger.debug(`Evicted entry ${victim} (limit ${this.maxEntries})`)
      count--
    }
  }

  private expireIfDue(now: number): void {
    if (now - this.lastExpireCheck < EXPIRE_CHECK_INTERVAL_MS) {
      return
    }
    this.lastExpireCheck = now
    this.expire(now)
  }

  private expire(now: number): number {
    if (this.expireDays <= 0) {
      return 0
    }
    const removed = this.backend.removeUnpinnedOlderThan(now - this.expireDays * DAY_MS)
    if (removed > 0) {
      logger.info(`Expired ${removed} entries older than ${this.expireDays} days`)
    }
    return removed
  }

  private run<T>(operation: string, fn: () => T): Promise<T> {
    return this.queue.execute(() => {
      if (this.closed) {
        throw new StorageUnavailableError(`History store is closed (${operation})`)
      }
      try {
        return fn()
      } catch (error) {
        logger.error(`${operation} failed:`, describeError(error))
        throw new StorageUnavailableError(`History storage unavailable during ${operation}`, { cause: error })
      }
    })
  }
}
