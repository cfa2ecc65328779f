// src/main/core/clipboard/paste-engine.ts
import type { Entry, EntryContent, KeyCombo, WindowHandle } from '../../types'
import type { ClipboardPort, InputPort, WindowPort } from '../platform/types'
import { createLogger } from '../../utils/logger'
import { ClipboardBusyError, PasteInProgressError, WindowGoneError } from '../../utils/errors'
import { sleep, withRetry } from '../../utils/retry'
import { defaultPasteCombo, formatCombo } from '../hotkey/combo'
import { digestContent, type SelfWriteGuard } from './self-write-guard'

const logger = createLogger('PasteEngine')

export interface PasteEngineOptions {
  pasteCombo?: KeyCombo
  writeAttempts?: number
  writeRetryDelayMs?: number
  /** Pause between focusing the target and sending the keystroke */
  settleDelayMs?: number
}

export interface PasteEnginePorts {
  clipboard: ClipboardPort
  windows: WindowPort
  input: InputPort
}

/**
 * Puts an entry back on the clipboard and replays the paste shortcut into the
 * window that was focused when the popup opened. The keystroke is only sent
 * after the clipboard write succeeded and the target still exists.
 */
export class PasteEngine {
  private isPasting = false
  private readonly pasteCombo: KeyCombo
  private readonly writeAttempts: number
  private readonly writeRetryDelayMs: number
  private readonly settleDelayMs: number

  constructor(
    private readonly ports: PasteEnginePorts,
    private readonly guard: SelfWriteGuard,
    options: PasteEngineOptions = {}
  ) {
    this.pasteCombo = options.pasteCombo ?? defaultPasteCombo()
    this.writeAttempts = options.writeAttempts ?? 3
    this.writeRetryDelayMs = options.writeRetryDelayMs ?? 50
    this.settleDelayMs = options.settleDelayMs ?? 150
  }

  get busy(): boolean {
    return this.isPasting
  }

  /**
   * @throws ClipboardBusyError when the clipboard stayed locked through every retry
   * @throws WindowGoneError when the target closed; the clipboard keeps the entry
   * @throws PasteInProgressError when another paste has not finished
   */
  async paste(entry: Entry, target: WindowHandle | null): Promise<void> {
    if (this.isPasting) {
      throw new PasteInProgressError(`Paste already in progress, ignoring entry ${entry.id}`)
    }

    this.isPasting = true

    try {
      await this.writeClipboard(entry.content)

      if (target === null) {
        throw new WindowGoneError('No target window was captured for this paste')
      }
      if (!(await this.ports.windows.exists(target))) {
        throw new WindowGoneError(`Target window ${target} no longer exists`)
      }

      const focused = await this.ports.windows.bringToForeground(target)
      if (!focused) {
        logger.warn(`Could not bring window ${target} to the foreground, pasting anyway`)
      }

      if (this.settleDelayMs > 0) {
        await sleep(this.settleDelayMs)
      }

      await this.ports.input.sendKeystroke(this.pasteCombo, target)
      logger.info(`Pasted entry ${entry.id} into window ${target} (${formatCombo(this.pasteCombo)})`)
    } finally {
      this.isPasting = false
    }
  }

  private async writeClipboard(content: EntryContent): Promise<void> {
    // Armed before the write so the watcher cannot see the change first
    this.guard.arm(digestContent(content))

    const format = content.kind === 'text' ? 'text' : 'image'
    const data = content.kind === 'text' ? Buffer.from(content.text, 'utf8') : content.data

    try {
      await withRetry(() => this.ports.clipboard.write(format, data), {
        attempts: this.writeAttempts,
        delayMs: this.writeRetryDelayMs,
        label: 'Clipboard write',
      })
    } catch (error) {
      this.guard.disarm()
      logger.warn('Failed to set clipboard data, aborting paste')
      throw new ClipboardBusyError('The clipboard is in use by another application', { cause: error })
    }
    this.guard.refresh()

    logger.debug(`Wrote ${content.kind} to clipboard`)
  }
}
