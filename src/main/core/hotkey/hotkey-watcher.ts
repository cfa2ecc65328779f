// src/main/core/hotkey/hotkey-watcher.ts
import type { HotkeyActivation, KeyCombo, WatcherState, WindowHandle } from '../../types'
import type { HotkeyHandle, HotkeyPort, WindowPort } from '../platform/types'
import { createLogger } from '../../utils/logger'
import { HotkeyUnavailableError, describeError } from '../../utils/errors'
import { formatCombo } from './combo'

const logger = createLogger('HotkeyWatcher')

export type ActivationHandler = (activation: HotkeyActivation) => Promise<void> | void

/**
 * Owns the global hotkey registration. The foreground window is captured as
 * soon as the hotkey fires, before anything else gets a chance to move focus,
 * and travels with the activation by value.
 */
export class HotkeyWatcher {
  private state: WatcherState = 'stopped'
  private handle: HotkeyHandle | null = null
  private session = 0
  private isProcessing = false
  private inFlight: Promise<void> | null = null

  constructor(
    private readonly hotkeys: HotkeyPort,
    private readonly windows: WindowPort,
    readonly combo: KeyCombo,
    private readonly onActivate: ActivationHandler
  ) { }

  get status(): WatcherState {
    return this.state
  }

  /**
   * @throws HotkeyUnavailableError when the platform refused the registration
   */
  async start(): Promise<void> {
    if (this.state === 'listening') {
      return
    }

    this.state = 'listening'
    const session = ++this.session

    let handle: HotkeyHandle
    try {
      handle = await this.hotkeys.register(this.combo, () => this.activate(session))
    } catch (error) {
      if (session === this.session) {
        this.state = 'stopped'
      }
      throw new HotkeyUnavailableError(`Could not register hotkey ${formatCombo(this.combo)}`, { cause: error })
    }

    // stop() ran while registration was pending
    if (session !== this.session) {
      await this.release(handle)
      return
    }

    this.handle = handle
    logger.info(`Hotkey watcher listening for ${formatCombo(this.combo)}`)
  }

  async stop(): Promise<void> {
    if (this.state === 'stopped') {
      return
    }

    this.state = 'stopped'
    this.session++
    const handle = this.handle
    this.handle = null

    if (handle) {
      await this.release(handle)
    }
    logger.info('Hotkey watcher stopped')
  }

  /**
   * Resolves once the activation being handled (if any) has finished
   */
  whenIdle(): Promise<void> {
    return this.inFlight ?? Promise.resolve()
  }

  private activate(session: number): void {
    if (!this.isCurrent(session)) {
      return
    }

    // Prevent re-entry while the popup from the previous activation is open
    if (this.isProcessing) {
      logger.debug('Hotkey already being handled, ignoring')
      return
    }

    this.isProcessing = true
    const activatedAt = Date.now()
    this.inFlight = this.dispatch(session, activatedAt).finally(() => {
      this.isProcessing = false
      this.inFlight = null
    })
  }

  private async dispatch(session: number, activatedAt: number): Promise<void> {
    let target: WindowHandle | null = null
    try {
      target = await this.windows.getForegroundWindow()
    } catch (error) {
      logger.warn('Could not capture the foreground window:', describeError(error))
    }

    if (!this.isCurrent(session)) {
      return
    }

    logger.info(`Hotkey pressed, target window: ${target ?? 'unknown'}`)

    try {
      await this.onActivate({ target, activatedAt })
    } catch (error) {
      logger.error('Hotkey activation handler failed:', describeError(error))
    }
  }

  private isCurrent(session: number): boolean {
    return this.state === 'listening' && session === this.session
  }

  private async release(handle: HotkeyHandle): Promise<void> {
    try {
      await this.hotkeys.unregister(handle)
    } catch (error) {
      logger.error('Failed to unregister hotkey:', describeError(error))
    }
  }
}
