// src/main/types/index.ts
export type EntryId = number

export type EntryKind = 'text' | 'image'

export interface TextContent {
  kind: 'text'
  text: string
}

export interface ImageContent {
  kind: 'image'
  /** PNG bytes */
  data: Buffer
  /** SHA-256 hex digest of `data`, used for dedup */
  hash: string
}

export type EntryContent = TextContent | ImageContent

// What the clipboard watcher hands to the store; the store hashes images itself
export type CaptureContent = TextContent | { kind: 'image'; data: Buffer }

export interface Entry {
  id: EntryId
  content: EntryContent
  pinned: boolean
  createdAt: number
  lastUsedAt: number
  preview: string
}

export type NewEntry = Omit<Entry, 'id'>

export interface ListQuery {
  /** Case-insensitive substring over text content; image entries only match an empty filter */
  filter?: string
  limit?: number
  offset?: number
}

// Opaque identifier of a top-level window as the platform reports it
export type WindowHandle = string

export type Modifier = 'ctrl' | 'alt' | 'shift' | 'meta'

/**
 * A key combination addressed by physical key (KeyboardEvent.code names such as
 * "KeyV"), so it means the same key whatever keyboard layout is active.
 */
export interface KeyCombo {
  modifiers: Modifier[]
  code: string
}

export type ClipboardFormat = 'text' | 'image' | 'files' | 'other'

export interface ClipboardSnapshot {
  format: ClipboardFormat
  data: Buffer
  /** Platform type identifier, reported for formats we do not handle */
  type?: string
}

export type WatcherState = 'stopped' | 'listening'

export interface HotkeyActivation {
  /** Foreground window captured at the moment the hotkey fired */
  target: WindowHandle | null
  activatedAt: number
}
