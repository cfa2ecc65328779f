// src/main/utils/preview.ts
import type { EntryContent } from '../types'

export const DEFAULT_PREVIEW_LENGTH = 200

/**
 * Generate a single-line preview string for an entry
 */
export function generatePreview(content: EntryContent, maxLength = DEFAULT_PREVIEW_LENGTH): string {
  if (content.kind === 'image') {
    return `Image (${Math.floor(content.data.length / 1024)} KB)`
  }

  const truncated = content.text.length > maxLength
    ? content.text.substring(0, maxLength) + '...'
    : content.text

  return truncated.replace(/\r?\n/g, ' ').trim()
}
