// src/main/utils/errors.ts
export type ClipkeepErrorCode =
  | 'STORAGE_UNAVAILABLE'
  | 'CLIPBOARD_BUSY'
  | 'WINDOW_GONE'
  | 'UNSUPPORTED_FORMAT'
  | 'HOTKEY_UNAVAILABLE'
  | 'PASTE_IN_PROGRESS'
  | 'QUEUE_FULL'

export class ClipkeepError extends Error {
  readonly code: ClipkeepErrorCode

  constructor(code: ClipkeepErrorCode, message: string, options?: ErrorOptions) {
    super(message, options)
    this.code = code
    this.name = new.target.name
  }
}

/** History backend failed (disk error, corruption) or the store is closed */
export class StorageUnavailableError extends ClipkeepError {
  constructor(message: string, options?: ErrorOptions) {
    super('STORAGE_UNAVAILABLE', message, options)
  }
}

/** Another process kept the clipboard locked through every retry */
export class ClipboardBusyError extends ClipkeepError {
  constructor(message: string, options?: ErrorOptions) {
    super('CLIPBOARD_BUSY', message, options)
  }
}

/** Paste target closed before the keystroke could be sent */
export class WindowGoneError extends ClipkeepError {
  constructor(message: string, options?: ErrorOptions) {
    super('WINDOW_GONE', message, options)
  }
}

export class UnsupportedFormatError extends ClipkeepError {
  constructor(message: string, options?: ErrorOptions) {
    super('UNSUPPORTED_FORMAT', message, options)
  }
}

export class HotkeyUnavailableError extends ClipkeepError {
  constructor(message: string, options?: ErrorOptions) {
    super('HOTKEY_UNAVAILABLE', message, options)
  }
}

export class PasteInProgressError extends ClipkeepError {
  constructor(message: string, options?: ErrorOptions) {
    super('PASTE_IN_PROGRESS', message, options)
  }
}

export class QueueFullError extends ClipkeepError {
  constructor(message: string, options?: ErrorOptions) {
    super('QUEUE_FULL', message, options)
  }
}

/**
 * Errors the end user is told about; everything else is only logged
 */
export function isUserFacingError(error: unknown): error is ClipboardBusyError | WindowGoneError {
  return error instanceof ClipboardBusyError || error instanceof WindowGoneError
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
