// src/main/index.ts
export * from './types'
export * from './utils/errors'
export { createLogger, setLogLevel, getLogLevel, isLogLevel } from './utils/logger'
export type { LogLevel, Logger } from './utils/logger'
export { HistoryStore, hashImage } from './core/history/history-store'
export type { HistoryStoreOptions } from './core/history/history-store'
export type { HistoryBackend } from './core/history/backend'
export { MemoryHistoryBackend } from './core/history/memory-backend'
export { SqliteHistoryBackend } from './core/history/sqlite-backend'
export { openHistoryBackend } from './core/history/open-backend'
export { ClipboardWatcher } from './core/clipboard/clipboard-watcher'
export { PasteEngine } from './core/clipboard/paste-engine'
export { SelfWriteGuard, digestContent, selfWriteWindowFor } from './core/clipboard/self-write-guard'
export { HotkeyWatcher } from './core/hotkey/hotkey-watcher'
export { parseCombo, formatCombo, combosEqual, defaultPasteCombo } from './core/hotkey/combo'
export { Orchestrator } from './core/orchestrator'
export type { PasteOutcome, PopupPort, PopupSession, Notifier } from './core/orchestrator'
export type { ClipboardPort, HotkeyPort, InputPort, WindowPort, PlatformPorts } from './core/platform/types'
export { createDarwinPorts } from './core/platform/darwin'
export { SignalHotkeyPort } from './core/platform/signal-hotkeys'
export { TerminalPopup, TerminalNotifier } from './core/popup/terminal-popup'
export { acquireInstanceLock } from './core/instance/instance-lock'
export { createSettingsManager, DEFAULT_PREFERENCES } from './core/settings/settings-manager'
export type { Preferences, SettingsManager } from './core/settings/settings-manager'
