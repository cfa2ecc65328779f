// src/main/core/clipboard/clipboard-watcher.ts
import type { CaptureContent, ClipboardSnapshot, WatcherState } from '../../types'
import type { ClipboardPort } from '../platform/types'
import { createLogger } from '../../utils/logger'
import { QueueFullError, UnsupportedFormatError, describeError } from '../../utils/errors'
import { TaskQueue } from '../../utils/task-queue'
import { withRetry } from '../../utils/retry'
import { DEFAULT_MAX_IMAGE_BYTES, classifySnapshot } from './classify'
import { digestContent, type SelfWriteGuard } from './self-write-guard'

const logger = createLogger('ClipboardWatcher')

export type CaptureHandler = (capture: CaptureContent) => Promise<void> | void

export interface ClipboardWatcherOptions {
  maxImageBytes?: number
  /** Notifications allowed to wait while one is handled; extra ones are dropped */
  maxPending?: number
  readAttempts?: number
  readRetryDelayMs?: number
}

/**
 * Listens for clipboard changes made by other applications and hands each
 * capture to the handler. Notifications are handled one at a time through a
 * bounded queue; handler failures are logged and never stop the watcher.
 */
export class ClipboardWatcher {
  private state: WatcherState = 'stopped'
  private unsubscribe: (() => void) | null = null
  // Bumped on every start/stop so work queued by an older session never emits
  private session = 0
  private readonly queue: TaskQueue
  private readonly maxImageBytes: number
  private readonly readAttempts: number
  private readonly readRetryDelayMs: number

  constructor(
    private readonly clipboard: ClipboardPort,
    private readonly guard: SelfWriteGuard,
    private readonly onCapture: CaptureHandler,
    options: ClipboardWatcherOptions = {}
  ) {
    this.maxImageBytes = options.maxImageBytes ?? DEFAULT_MAX_IMAGE_BYTES
    this.readAttempts = options.readAttempts ?? 3
    this.readRetryDelayMs = options.readRetryDelayMs ?? 50
    this.queue = new TaskQueue({ name: 'ClipboardWatcher', maxPending: options.maxPending ?? 8 })
  }

  get status(): WatcherState {
    return this.state
  }

  start(): void {
    if (this.state === 'listening') {
      return
    }

    this.state = 'listening'
    const session = ++this.session
    this.unsubscribe = this.clipboard.subscribe(() => this.notify(session))
    logger.info('Clipboard watcher started')
  }

  /**
   * Unsubscribe from clipboard notifications. Safe to call twice or while a
   * notification is being handled; that notification finishes without emitting.
   */
  stop(): void {
    if (this.state === 'stopped') {
      return
    }

    this.state = 'stopped'
    this.session++
    const unsubscribe = this.unsubscribe
    this.unsubscribe = null

    try {
      unsubscribe?.()
    } catch (error) {
      logger.error('Failed to unsubscribe from clipboard notifications:', describeError(error))
    }
    logger.info('Clipboard watcher stopped')
  }

  /**
   * Resolves once every notification received so far has been handled
   */
  whenIdle(): Promise<void> {
    return this.queue.onIdle()
  }

  private notify(session: number): void {
    this.queue.execute(() => this.handleChange(session)).catch((error: unknown) => {
      if (error instanceof QueueFullError) {
        logger.warn('Dropping clipboard notification:', error.message)
      } else {
        logger.error('Error handling clipboard change:', describeError(error))
      }
    })
  }

  private isCurrent(session: number): boolean {
    return this.state === 'listening' && session === this.session
  }

  private async handleChange(session: number): Promise<void> {
    if (!this.isCurrent(session)) {
      return
    }

    if (this.guard.consumeFlag()) {
      logger.debug('Ignoring clipboard change written by paste')
      return
    }

    const snapshot = await this.readClipboard()
    if (!snapshot) {
      return
    }

    let capture: CaptureContent | null
    try {
      capture = classifySnapshot(snapshot, this.maxImageBytes)
    } catch (error) {
      if (error instanceof UnsupportedFormatError) {
        logger.debug(error.message)
        return
      }
      throw error
    }

    if (!capture) {
      return
    }

    if (this.guard.matchesSelfWrite(digestContent(capture))) {
      logger.debug('Ignoring clipboard change matching the last paste')
      return
    }

    if (!this.isCurrent(session)) {
      return
    }

    try {
      await this.onCapture(capture)
    } catch (error) {
      logger.error('Capture handler failed:', describeError(error))
    }
  }

  private readClipboard(): Promise<ClipboardSnapshot | null> {
    return withRetry(() => this.clipboard.read(), {
      attempts: this.readAttempts,
      delayMs: this.readRetryDelayMs,
      label: 'Clipboard read',
    })
  }
}
