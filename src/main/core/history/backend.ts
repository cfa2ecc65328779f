// src/main/core/history/backend.ts
import type { Entry, EntryContent, EntryId, NewEntry } from '../../types'

/**
 * Durable record store underneath the history store. Implementations are
 * synchronous; the history store serializes every call through its own queue.
 * The backend knows nothing about capacity or dedup rules.
 */
export interface HistoryBackend {
  insert(entry: NewEntry): EntryId
  get(id: EntryId): Entry | undefined
  /** Entry with the most recent lastUsedAt (ties: highest id) */
  latest(): Entry | undefined
  touch(id: EntryId, at: number): boolean
  setPinned(id: EntryId, pinned: boolean): boolean
  remove(id: EntryId): boolean
  count(): number
  /** Oldest unpinned entry by createdAt (ties: lowest id), optionally skipping one id */
  oldestUnpinned(excludeId?: EntryId): EntryId | undefined
  /** Every entry in display order: pinned first, then lastUsedAt and id descending */
  scan(): Entry[]
  removeUnpinned(): number
  removeUnpinnedOlderThan(cutoff: number): number
  close(): void
}

export function sameContent(a: EntryContent, b: EntryContent): boolean {
  if (a.kind === 'text' && b.kind === 'text') {
    return a.text === b.text
  }
  if (a.kind === 'image' && b.kind === 'image') {
    return a.hash === b.hash
  }
  return false
}

export function compareDisplayOrder(a: Entry, b: Entry): number {
  if (a.pinned !== b.pinned) return a.pinned ? -1 : 1
  if (a.lastUsedAt !== b.lastUsedAt) return b.lastUsedAt - a.lastUsedAt
  return b.id - a.id
}
