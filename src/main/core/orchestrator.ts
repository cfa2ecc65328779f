// src/main/core/orchestrator.ts
import type { CaptureContent, Entry, EntryId, HotkeyActivation, KeyCombo, WindowHandle } from '../types'
import type { PlatformPorts } from './platform/types'
import type { HistoryStore } from './history/history-store'
import { ClipboardWatcher, type ClipboardWatcherOptions } from './clipboard/clipboard-watcher'
import { PasteEngine, type PasteEngineOptions } from './clipboard/paste-engine'
import { SelfWriteGuard, selfWriteWindowFor } from './clipboard/self-write-guard'
import { HotkeyWatcher } from './hotkey/hotkey-watcher'
import { createLogger } from '../utils/logger'
import { settlesWithin } from '../utils/retry'
import {
  PasteInProgressError,
  StorageUnavailableError,
  describeError,
  isUserFacingError,
} from '../utils/errors'
import { validateEntryId, validateSearchQuery } from '../../utils/validation'

const logger = createLogger('Orchestrator')

export type PasteFailureCode = 'CLIPBOARD_BUSY' | 'WINDOW_GONE' | 'PASTE_IN_PROGRESS' | 'ERROR'

export type PasteOutcome =
  | { status: 'pasted'; id: EntryId }
  | { status: 'missing'; id: EntryId }
  | { status: 'failed'; id: EntryId; code: PasteFailureCode; message: string }

/**
 * What the popup gets to work with while it is open. It receives no push
 * updates; every call re-queries the store.
 */
export interface PopupSession {
  readonly target: WindowHandle | null
  readonly activatedAt: number
  list(filter?: string, limit?: number): Promise<Entry[]>
  setPinned(id: EntryId, pinned: boolean): Promise<boolean>
  togglePin(id: EntryId): Promise<boolean>
  remove(id: EntryId): Promise<boolean>
  clear(): Promise<number>
  paste(id: EntryId): Promise<PasteOutcome>
  /** Aborted when the orchestrator stops; the popup should close */
  readonly signal: AbortSignal
}

export interface PopupPort {
  /** Resolves once the popup has been dismissed */
  open(session: PopupSession): Promise<void> | void
}

export interface Notifier {
  notify(message: string): void
}

export interface MonitoringPreference {
  set(key: 'clipboardActive', value: boolean): void
}

export interface OrchestratorDeps {
  store: HistoryStore
  ports: PlatformPorts
  popup: PopupPort
  notifier: Notifier
  preferences?: MonitoringPreference
}

export interface OrchestratorOptions {
  hotkey: KeyCombo
  clipboardActive?: boolean
  selfWriteWindowMs?: number
  /** How long stop() waits for an open popup before closing the history anyway */
  stopTimeoutMs?: number
  watcher?: ClipboardWatcherOptions
  paste?: PasteEngineOptions
}

const USER_MESSAGES: Record<'CLIPBOARD_BUSY' | 'WINDOW_GONE', string> = {
  CLIPBOARD_BUSY: 'The clipboard is in use by another application. Try again in a moment.',
  WINDOW_GONE: 'The window you were pasting into has closed. The entry is on the clipboard.',
}

export class Orchestrator {
  readonly store: HistoryStore
  readonly pasteEngine: PasteEngine
  private readonly clipboardWatcher: ClipboardWatcher
  private readonly hotkeyWatcher: HotkeyWatcher
  private readonly popup: PopupPort
  private readonly notifier: Notifier
  private readonly preferences: MonitoringPreference | undefined
  private readonly stopTimeoutMs: number
  private monitoring: boolean
  private hotkeyActive = false
  private popupController = new AbortController()

  constructor(deps: OrchestratorDeps, options: OrchestratorOptions) {
    this.store = deps.store
    this.popup = deps.popup
    this.notifier = deps.notifier
    this.preferences = deps.preferences
    this.monitoring = options.clipboardActive ?? true
    this.stopTimeoutMs = options.stopTimeoutMs ?? 2000

    const guard = new SelfWriteGuard({
      windowMs: options.selfWriteWindowMs ?? selfWriteWindowFor(deps.ports.clipboard.maxNotifyDelayMs),
    })
    this.pasteEngine = new PasteEngine(deps.ports, guard, options.paste)
    this.clipboardWatcher = new ClipboardWatcher(
      deps.ports.clipboard,
      guard,
      capture => this.handleCapture(capture),
      options.watcher
    )
    this.hotkeyWatcher = new HotkeyWatcher(
      deps.ports.hotkeys,
      deps.ports.windows,
      options.hotkey,
      activation => this.openPopup(activation)
    )
  }

  get isMonitoring(): boolean {
    return this.monitoring
  }

  get isHotkeyActive(): boolean {
    return this.hotkeyActive
  }

  /**
   * Start both watchers. A hotkey that cannot be registered is logged and
   * clipboard capture keeps running without it.
   */
  async start(): Promise<void> {
    if (this.popupController.signal.aborted) {
      this.popupController = new AbortController()
    }

    if (this.monitoring) {
      this.clipboardWatcher.start()
    }

    try {
      await this.hotkeyWatcher.start()
      this.hotkeyActive = true
    } catch (error) {
      this.hotkeyActive = false
      logger.error('Hotkey unavailable, the popup can only be opened another way:', describeError(error))
    }
  }

  /**
   * Stop both watchers, ask an open popup to close and release the history.
   * A popup that ignores the request gets stopTimeoutMs before the history is closed under it.
   */
  async stop(): Promise<void> {
    this.clipboardWatcher.stop()
    this.popupController.abort()
    await this.hotkeyWatcher.stop()
    this.hotkeyActive = false

    const idle = await settlesWithin(this.whenIdle(), this.stopTimeoutMs)
    if (!idle) {
      logger.warn(`Popup still open after ${this.stopTimeoutMs}ms, closing history anyway`)
    }

    try {
      await this.store.close()
    } catch (error) {
      logger.error('Failed to close history:', describeError(error))
    }
    logger.info('Stopped')
  }

  /**
   * Pause or resume clipboard capture and remember the choice
   */
  setMonitoring(enabled: boolean): void {
    this.monitoring = enabled
    if (enabled) {
      this.clipboardWatcher.start()
    } else {
      this.clipboardWatcher.stop()
    }

    try {
      this.preferences?.set('clipboardActive', enabled)
    } catch (error) {
      logger.error('Failed to save monitoring preference:', describeError(error))
    }
    logger.info(`Clipboard monitoring ${enabled ? 'resumed' : 'paused'}`)
  }

  /**
   * Resolves once pending captures and any open popup have been handled
   */
  async whenIdle(): Promise<void> {
    await Promise.all([this.clipboardWatcher.whenIdle(), this.hotkeyWatcher.whenIdle()])
  }

  async handleCapture(capture: CaptureContent): Promise<void> {
    try {
      await this.store.add(capture)
    } catch (error) {
      if (error instanceof StorageUnavailableError) {
        logger.warn('Capture not stored:', error.message)
        return
      }
      throw error
    }
  }

  async openPopup(activation: HotkeyActivation): Promise<void> {
    await this.popup.open(this.createSession(activation))
  }

  async pasteEntry(id: EntryId, target: WindowHandle | null): Promise<PasteOutcome> {
    let entry: Entry | undefined
    try {
      entry = await this.store.get(id)
    } catch (error) {
      logger.error(`Could not load entry ${id}:`, describeError(error))
      return { status: 'failed', id, code: 'ERROR', message: describeError(error) }
    }

    if (!entry) {
      logger.info(`Entry ${id} no longer exists, nothing to paste`)
      return { status: 'missing', id }
    }

    try {
      await this.pasteEngine.paste(entry, target)
      return { status: 'pasted', id }
    } catch (error) {
      if (isUserFacingError(error)) {
        const code = error.code === 'CLIPBOARD_BUSY' ? 'CLIPBOARD_BUSY' : 'WINDOW_GONE'
        logger.warn(`Paste of entry ${id} failed:`, error.message)
        this.notifier.notify(USER_MESSAGES[code])
        return { status: 'failed', id, code, message: error.message }
      }
      if (error instanceof PasteInProgressError) {
        logger.warn(error.message)
        return { status: 'failed', id, code: 'PASTE_IN_PROGRESS', message: error.message }
      }
      logger.error(`Paste of entry ${id} failed:`, describeError(error))
      return { status: 'failed', id, code: 'ERROR', message: describeError(error) }
    }
  }

  createSession(activation: HotkeyActivation): PopupSession {
    return {
      target: activation.target,
      activatedAt: activation.activatedAt,
      signal: this.popupController.signal,
      list: (filter, limit) => {
        const query = validateSearchQuery(filter)
        if (!query.valid) {
          logger.warn('Rejected search query:', query.error)
          return Promise.resolve([])
        }
        return this.guarded('list', () => this.store.list({ filter: query.sanitized, limit }), [])
      },
      setPinned: (id, pinned) =>
        this.withEntryId(id, valid => this.store.setPinned(valid, pinned)),
      togglePin: id =>
        this.withEntryId(id, valid => this.store.togglePin(valid)),
      remove: id =>
        this.withEntryId(id, valid => this.store.delete(valid)),
      clear: () => this.guarded('clear', () => this.store.clearUnpinned(), 0),
      paste: id => {
        const result = validateEntryId(id)
        if (!result.valid || result.sanitized === undefined) {
          return Promise.resolve<PasteOutcome>({ status: 'missing', id })
        }
        return this.pasteEntry(result.sanitized, activation.target)
      },
    }
  }

  private withEntryId(id: EntryId, fn: (id: EntryId) => Promise<boolean>): Promise<boolean> {
    const result = validateEntryId(id)
    if (!result.valid || result.sanitized === undefined) {
      logger.warn('Rejected entry id:', result.error)
      return Promise.resolve(false)
    }
    const valid = result.sanitized
    return this.guarded('update', () => fn(valid), false)
  }

  // Storage failures reach the popup as an empty result, never as a crash
  private async guarded<T>(operation: string, fn: () => Promise<T>, fallback: T): Promise<T> {
    try {
      return await fn()
    } catch (error) {
      if (error instanceof StorageUnavailableError) {
        logger.error(`${operation} failed:`, error.message)
        return fallback
      }
      throw error
    }
  }
}
