// src/utils/validation.ts
import { parseCombo } from '../main/core/hotkey/combo'

/**
 * Validation for values arriving from the popup and the settings file
 */

export interface ValidationResult<T = string> {
  valid: boolean
  error?: string
  sanitized?: T
}

export const MAX_SEARCH_QUERY_LENGTH = 500
const MAX_HOTKEY_LENGTH = 64

/**
 * Entry ids are positive integers; the popup may hand them over as strings
 */
export function validateEntryId(id: string | number | undefined | null): ValidationResult<number> {
  if (id === undefined || id === null || id === '') {
    return { valid: false, error: 'Entry ID is required' }
  }

  const num = typeof id === 'string' ? Number(id.trim()) : id

  if (!Number.isSafeInteger(num) || num <= 0) {
    return { valid: false, error: 'Entry ID must be a positive integer' }
  }

  return { valid: true, sanitized: num }
}

/**
 * Search queries keep inner whitespace but not the surrounding one
 */
export function validateSearchQuery(query: string | undefined | null): ValidationResult {
  const sanitized = (query ?? '').trim()

  if (sanitized.length > MAX_SEARCH_QUERY_LENGTH) {
    return { valid: false, error: `Search query exceeds ${MAX_SEARCH_QUERY_LENGTH} characters` }
  }

  return { valid: true, sanitized }
}

/**
 * Validate a hotkey sequence such as "Ctrl+Shift+V"; sanitized to its trimmed form
 */
export function validateHotkey(sequence: string | undefined | null): ValidationResult {
  const sanitized = (sequence ?? '').trim()

  if (!sanitized) {
    return { valid: false, error: 'Hotkey is required' }
  }
  if (sanitized.length > MAX_HOTKEY_LENGTH) {
    return { valid: false, error: `Hotkey exceeds ${MAX_HOTKEY_LENGTH} characters` }
  }

  try {
    parseCombo(sanitized)
  } catch (error) {
    return { valid: false, error: error instanceof Error ? error.message : 'Invalid hotkey' }
  }

  return { valid: true, sanitized }
}
