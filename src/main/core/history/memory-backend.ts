// src/main/core/history/memory-backend.ts
import type { Entry, EntryId, NewEntry } from '../../types'
import { compareDisplayOrder, type HistoryBackend } from './backend'

/**
 * Process-local backend. Used when the database cannot be opened (history is
 * then lost at exit) and as the in-process store in tests.
 */
export class MemoryHistoryBackend implements HistoryBackend {
  private entries = new Map<EntryId, Entry>()
  private nextId = 1
  private closed = false

  insert(entry: NewEntry): EntryId {
    this.assertOpen()
    const id = this.nextId++
    this.entries.set(id, { ...entry, id })
    return id
  }

  get(id: EntryId): Entry | undefined {
    this.assertOpen()
    const entry = this.entries.get(id)
    return entry ? { ...entry } : undefined
  }

  latest(): Entry | undefined {
    this.assertOpen()
    let top: Entry | undefined
    for (const entry of this.entries.values()) {
      if (!top || entry.lastUsedAt > top.lastUsedAt || (entry.lastUsedAt === top.lastUsedAt && entry.id > top.id)) {
        top = entry
      }
    }
    return top ? { ...top } : undefined
  }

  touch(id: EntryId, at: number): boolean {
    return this.update(id, entry => ({ ...entry, lastUsedAt: at }))
  }

  setPinned(id: EntryId, pinned: boolean): boolean {
    return this.update(id, entry => ({ ...entry, pinned }))
  }

  remove(id: EntryId): boolean {
    this.assertOpen()
    return this.entries.delete(id)
  }

  count(): number {
    this.assertOpen()
    return this.entries.size
  }

  oldestUnpinned(excludeId?: EntryId): EntryId | undefined {
    this.assertOpen()
    let oldest: Entry | undefined
    for (const entry of this.entries.values()) {
      if (entry.pinned || entry.id === excludeId) continue
      if (!oldest || entry.createdAt < oldest.createdAt || (entry.createdAt === oldest.createdAt && entry.id < oldest.id)) {
        oldest = entry
      }
    }
    return oldest?.id
  }

  scan(): Entry[] {
    this.assertOpen()
    return Array.from(this.entries.values(), entry => ({ ...entry })).sort(compareDisplayOrder)
  }

  removeUnpinned(): number {
    return this.removeWhere(entry => !entry.pinned)
  }

  removeUnpinnedOlderThan(cutoff: number): number {
    return this.removeWhere(entry => !entry.pinned && entry.lastUsedAt < cutoff)
  }

  close(): void {
    this.closed = true
    this.entries.clear()
  }

  private update(id: EntryId, change: (entry: Entry) => Entry): boolean {
    this.assertOpen()
    const entry = this.entries.get(id)
    if (!entry) return false
    this.entries.set(id, change(entry))
    return true
  }

  private removeWhere(predicate: (entry: Entry) => boolean): number {
    this.assertOpen()
    let removed = 0
    for (const [id, entry] of this.entries) {
      if (predicate(entry)) {
        this.entries.delete(id)
        removed++
      }
    }
    return removed
  }

  private assertOpen(): void {
    if (this.closed) {
      throw new Error('Memory history backend is closed')
    }
  }
}
