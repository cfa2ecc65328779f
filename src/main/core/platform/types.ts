// src/main/core/platform/types.ts
import type { ClipboardSnapshot, KeyCombo, WindowHandle } from '../../types'

export interface ClipboardPort {
  /** Current clipboard content, or null when the clipboard is empty */
  read(): Promise<ClipboardSnapshot | null>
  /** Replace the clipboard content; rejects while another process holds the clipboard */
  write(format: 'text' | 'image', data: Buffer): Promise<void>
  /** Call onChange for every clipboard change; returns the unsubscribe function */
  subscribe(onChange: () => void): () => void
  /** Longest time between a write and the change notification it causes */
  readonly maxNotifyDelayMs?: number
}

export interface WindowPort {
  getForegroundWindow(): Promise<WindowHandle | null>
  exists(handle: WindowHandle): Promise<boolean>
  /** Best effort; resolves false when the platform refused */
  bringToForeground(handle: WindowHandle): Promise<boolean>
}

export interface InputPort {
  sendKeystroke(combo: KeyCombo, target: WindowHandle): Promise<void>
}

export interface HotkeyHandle {
  id: number
  combo: KeyCombo
}

export interface HotkeyPort {
  register(combo: KeyCombo, onActivate: () => void): Promise<HotkeyHandle>
  unregister(handle: HotkeyHandle): Promise<void>
}

export interface PlatformPorts {
  clipboard: ClipboardPort
  windows: WindowPort
  input: InputPort
  hotkeys: HotkeyPort
}
