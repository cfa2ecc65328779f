// src/main/core/clipboard/self-write-guard.ts
import { createHash } from 'crypto'
import type { CaptureContent, EntryContent } from '../../types'

export const DEFAULT_SELF_WRITE_WINDOW_MS = 1500
// Script latency and queueing on top of the port's own notification delay
export const SELF_WRITE_MARGIN_MS = 1500

export interface SelfWriteGuardOptions {
  windowMs?: number
  now?: () => number
}

export function digestContent(content: CaptureContent | EntryContent): string {
  const hash = createHash('sha256')
  if (content.kind === 'text') {
    hash.update('text:').update(content.text, 'utf8')
  } else {
    hash.update('image:').update(content.data)
  }
  return hash.digest('hex')
}

/**
 * Suppression window long enough for a clipboard port that reports changes
 * up to maxNotifyDelayMs after they happen
 */
export function selfWriteWindowFor(maxNotifyDelayMs = 0): number {
  return Math.max(DEFAULT_SELF_WRITE_WINDOW_MS, maxNotifyDelayMs + SELF_WRITE_MARGIN_MS)
}

/**
 * "Expect one self-write" marker shared by the paste engine and the clipboard watcher.
 *
 * The paste engine arms it right before writing the clipboard; the watcher consumes
 * the flag on the next change notification. Both the flag and the digest of the
 * written content expire after windowMs, so a notification that never arrives
 * cannot swallow a later genuine copy. The digest catches extra notifications for
 * the same write.
 */
export class SelfWriteGuard {
  private readonly windowMs: number
  private readonly now: () => number
  private flagUntil = 0
  private digest: string | null = null
  private digestUntil = 0

  constructor(options: SelfWriteGuardOptions = {}) {
    this.windowMs = options.windowMs ?? DEFAULT_SELF_WRITE_WINDOW_MS
    this.now = options.now ?? Date.now
  }

  get armed(): boolean {
    return this.flagUntil !== 0 && this.now() <= this.flagUntil
  }

  arm(digest: string): void {
    const until = this.now() + this.windowMs
    this.flagUntil = until
    this.digest = digest
    this.digestUntil = until
  }

  /**
   * Restart the window once the write has landed, so retries before it do not
   * eat into the time the notification has to arrive. A flag the watcher
   * already consumed stays consumed.
   */
  refresh(): void {
    const until = this.now() + this.windowMs
    if (this.flagUntil !== 0) {
      this.flagUntil = until
    }
    if (this.digest !== null) {
      this.digestUntil = until
    }
  }

  disarm(): void {
    this.flagUntil = 0
    this.digest = null
    this.digestUntil = 0
  }

  /**
   * True exactly once per arm() while the window is open
   */
  consumeFlag(): boolean {
    if (this.flagUntil === 0) {
      return false
    }
    const live = this.now() <= this.flagUntil
    this.flagUntil = 0
    return live
  }

  matchesSelfWrite(digest: string): boolean {
    return this.digest !== null && this.now() <= this.digestUntil && this.digest === digest
  }
}
