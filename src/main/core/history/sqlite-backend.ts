// src/main/core/history/sqlite-backend.ts
import Database from 'better-sqlite3'
import { rmSync } from 'fs'
import type { Entry, EntryContent, EntryId, NewEntry } from '../../types'
import { createLogger } from '../../utils/logger'
import type { HistoryBackend } from './backend'

const logger = createLogger('SqliteBackend')

interface EntryRow {
  id: number
  kind: string
  text: string
  image_data: Buffer | null
  image_hash: string | null
  pinned: number
  created_at: number
  last_used_at: number
  preview: string
}

interface InsertParams {
  kind: 'text' | 'image'
  text: string
  image_data: Buffer | null
  image_hash: string | null
  pinned: number
  created_at: number
  last_used_at: number
  preview: string
}

// Index n upgrades user_version n to n + 1
const MIGRATIONS: string[] = [
  `CREATE TABLE IF NOT EXISTS entries (
     id INTEGER PRIMARY KEY AUTOINCREMENT,
     kind TEXT NOT NULL CHECK (kind IN ('text', 'image')),
     text TEXT NOT NULL DEFAULT '',
     image_data BLOB,
     image_hash TEXT,
     pinned INTEGER NOT NULL DEFAULT 0,
     created_at INTEGER NOT NULL,
     last_used_at INTEGER NOT NULL,
     preview TEXT NOT NULL DEFAULT ''
   );
   CREATE INDEX IF NOT EXISTS idx_entries_recency ON entries(last_used_at DESC, id DESC);
   CREATE INDEX IF NOT EXISTS idx_entries_display ON entries(pinned DESC, last_used_at DESC, id DESC);
   CREATE INDEX IF NOT EXISTS idx_entries_eviction ON entries(pinned, created_at, id);`,
]

const SELECT_COLUMNS = 'id, kind, text, image_data, image_hash, pinned, created_at, last_used_at, preview'

export interface SqliteBackendOptions {
  busyTimeoutMs?: number
}

function rowToEntry(row: EntryRow): Entry {
  const content: EntryContent = row.kind === 'image'
    ? { kind: 'image', data: row.image_data ?? Buffer.alloc(0), hash: row.image_hash ?? '' }
    : { kind: 'text', text: row.text }

  return {
    id: row.id,
    content,
    pinned: row.pinned !== 0,
    createdAt: row.created_at,
    lastUsedAt: row.last_used_at,
    preview: row.preview,
  }
}

function removeDatabaseFiles(path: string): void {
  for (const suffix of ['', '-wal', '-shm']) {
    rmSync(path + suffix, { force: true })
  }
}

function isCorruption(error: unknown): error is InstanceType<typeof Database.SqliteError> {
  return error instanceof Database.SqliteError &&
    (error.code.startsWith('SQLITE_CORRUPT') || error.code === 'SQLITE_NOTADB')
}

/**
 * Open the database, recreating the file only when it is corrupt or not a
 * database at all. Busy, I/O and permission errors are rethrown with the file untouched.
 */
function openDatabase(path: string, busyTimeoutMs: number): Database.Database {
  let db: Database.Database | null = null
  try {
    db = new Database(path, { timeout: busyTimeoutMs })
    const status = db.pragma('integrity_check', { simple: true })
    if (status !== 'ok') {
      throw new Database.SqliteError(`integrity check reported: ${String(status)}`, 'SQLITE_CORRUPT')
    }
    return db
  } catch (error) {
    db?.close()
    if (path === ':memory:' || !isCorruption(error)) {
      throw error
    }
    logger.warn(`Database corrupted, recreating: ${path}`, error.message)
    removeDatabaseFiles(path)
    return new Database(path, { timeout: busyTimeoutMs })
  }
}

export class SqliteHistoryBackend implements HistoryBackend {
  private readonly db: Database.Database

  private readonly insertStmt: Database.Statement<[InsertParams]>
  private readonly getStmt: Database.Statement<[number], EntryRow>
  private readonly latestStmt: Database.Statement<[], EntryRow>
  private readonly touchStmt: Database.Statement<[number, number]>
  private readonly pinStmt: Database.Statement<[number, number]>
  private readonly removeStmt: Database.Statement<[number]>
  private readonly countStmt: Database.Statement<[], { count: number }>
  private readonly oldestUnpinnedStmt: Database.Statement<[number], { id: number }>
  private readonly scanStmt: Database.Statement<[], EntryRow>
  private readonly removeUnpinnedStmt: Database.Statement<[]>
  private readonly expireStmt: Database.Statement<[number]>

  constructor(path: string, options: SqliteBackendOptions = {}) {
    this.db = openDatabase(path, options.busyTimeoutMs ?? 3000)
    if (path !== ':memory:') {
      this.db.pragma('journal_mode = WAL')
    }
    this.migrate()

    this.insertStmt = this.db.prepare<[InsertParams]>(
      `INSERT INTO entries (kind, text, image_data, image_hash, pinned, created_at, last_used_at, preview)
       VALUES (@kind, @text, @image_data, @image_hash, @pinned, @created_at, @last_used_at, @preview)`
    )
    this.getStmt = this.db.prepare<[number], EntryRow>(`SELECT ${SELECT_COLUMNS} FROM entries WHERE id = ?`)
    this.latestStmt = this.db.prepare<[], EntryRow>(
      `SELECT ${SELECT_COLUMNS} FROM entries ORDER BY last_used_at DESC, id DESC LIMIT 1`
    )
    this.touchStmt = this.db.prepare<[number, number]>('UPDATE entries SET last_used_at = ? WHERE id = ?')
    this.pinStmt = this.db.prepare<[number, number]>('UPDATE entries SET pinned = ? WHERE id = ?')
    this.removeStmt = this.db.prepare<[number]>('DELETE FROM entries WHERE id = ?')
    this.countStmt = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM entries')
    this.oldestUnpinnedStmt = this.db.prepare<[number], { id: number }>(
      'SELECT id FROM entries WHERE pinned = 0 AND id != ? ORDER BY created_at ASC, id ASC LIMIT 1'
    )
    this.scanStmt = this.db.prepare<[], EntryRow>(
      `SELECT ${SELECT_COLUMNS} FROM entries ORDER BY pinned DESC, last_used_at DESC, id DESC`
    )
    this.removeUnpinnedStmt = this.db.prepare<[]>('DELETE FROM entries WHERE pinned = 0')
    this.expireStmt = this.db.prepare<[number]>('DELETE FROM entries WHERE pinned = 0 AND last_used_at < ?')

    logger.info(`Opened history database: ${path}`)
  }

  insert(entry: NewEntry): EntryId {
    const { content } = entry
    const info = this.insertStmt.run({
      kind: content.kind,
      text: content.kind === 'text' ? content.text : '',
      image_data: content.kind === 'image' ? content.data : null,
      image_hash: content.kind === 'image' ? content.hash : null,
      pinned: entry.pinned ? 1 : 0,
      created_at: entry.createdAt,
      last_used_at: entry.lastUsedAt,
      preview: entry.preview,
    })
    return Number(info.lastInsertRowid)
  }

  get(id: EntryId): Entry | undefined {
    const row = this.getStmt.get(id)
    return row ? rowToEntry(row) : undefined
  }

  latest(): Entry | undefined {
    const row = this.latestStmt.get()
    return row ? rowToEntry(row) : undefined
  }

  touch(id: EntryId, at: number): boolean {
    return this.touchStmt.run(at, id).changes > 0
  }

  setPinned(id: EntryId, pinned: boolean): boolean {
    return this.pinStmt.run(pinned ? 1 : 0, id).changes > 0
  }

  remove(id: EntryId): boolean {
    return this.removeStmt.run(id).changes > 0
  }

  count(): number {
    return this.countStmt.get()?.count ?? 0
  }

  oldestUnpinned(excludeId?: EntryId): EntryId | undefined {
    // ids start at 1, so 0 excludes nothing
    return this.oldestUnpinnedStmt.get(excludeId ?? 0)?.id
  }

  scan(): Entry[] {
    return this.scanStmt.all().map(rowToEntry)
  }

  removeUnpinned(): number {
    return this.removeUnpinnedStmt.run().changes
  }

  removeUnpinnedOlderThan(cutoff: number): number {
    return this.expireStmt.run(cutoff).changes
  }

  close(): void {
    if (!this.db.open) {
      return
    }
    if (this.db.memory) {
      this.db.close()
      return
    }
    this.db.pragma('wal_checkpoint(TRUNCATE)')
    this.db.close()
    logger.info('History database closed')
  }

  private migrate(): void {
    const current = Number(this.db.pragma('user_version', { simple: true }))
    if (current >= MIGRATIONS.length) {
      return
    }

    const upgrade = this.db.transaction(() => {
      for (let version = current; version < MIGRATIONS.length; version++) {
        this.db.exec(MIGRATIONS[version])
      }
      this.db.pragma(`user_version = ${MIGRATIONS.length}`)
    })
    upgrade()
    logger.info(`Migrated history schema from v${current} to v${MIGRATIONS.length}`)
  }
}
