// src/main/core/platform/signal-hotkeys.ts
import type { KeyCombo } from '../../types'
import type { HotkeyHandle, HotkeyPort } from './types'
import { createLogger } from '../../utils/logger'
import { formatCombo } from '../hotkey/combo'

const logger = createLogger('SignalHotkeys')

export interface SignalSource {
  on(signal: NodeJS.Signals, listener: () => void): unknown
  off(signal: NodeJS.Signals, listener: () => void): unknown
}

/**
 * Hotkey port driven by a POSIX signal. The key combination itself is bound in
 * an external hotkey daemon (skhd, Hammerspoon, a desktop shortcut) to
 * `kill -USR2 <pid>`; the combo only serves as the label the user configured.
 */
export class SignalHotkeyPort implements HotkeyPort {
  private nextId = 1
  private readonly listeners = new Map<number, () => void>()

  constructor(
    private readonly signal: NodeJS.Signals = 'SIGUSR2',
    private readonly source: SignalSource = process,
    private readonly platform: NodeJS.Platform = process.platform
  ) { }

  async register(combo: KeyCombo, onActivate: () => void): Promise<HotkeyHandle> {
    if (this.platform === 'win32') {
      throw new Error(`${this.signal} is not available on Windows`)
    }

    const id = this.nextId++
    const listener = () => onActivate()
    this.listeners.set(id, listener)
    this.source.on(this.signal, listener)

    logger.info(`Bind ${formatCombo(combo)} to "kill -${this.signal.replace(/^SIG/, '')} ${process.pid}"`)
    return { id, combo }
  }

  async unregister(handle: HotkeyHandle): Promise<void> {
    const listener = this.listeners.get(handle.id)
    if (!listener) {
      return
    }
    this.listeners.delete(handle.id)
    this.source.off(this.signal, listener)
  }
}
