// src/main/core/clipboard/classify.ts
import type { CaptureContent, ClipboardSnapshot } from '../../types'
import { UnsupportedFormatError } from '../../utils/errors'
import { createLogger } from '../../utils/logger'

const logger = createLogger('ClipboardClassifier')

export const DEFAULT_MAX_IMAGE_BYTES = 5 * 1024 * 1024

const PNG_SIGNATURE = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])

export function isPng(data: Buffer): boolean {
  return data.length >= PNG_SIGNATURE.length && data.subarray(0, PNG_SIGNATURE.length).equals(PNG_SIGNATURE)
}

/**
 * Turn raw clipboard content into a capture.
 * Returns null for content that is valid but not worth recording (blank text,
 * oversized images); throws UnsupportedFormatError for anything else.
 */
export function classifySnapshot(snapshot: ClipboardSnapshot, maxImageBytes = DEFAULT_MAX_IMAGE_BYTES): CaptureContent | null {
  switch (snapshot.format) {
    case 'text': {
      const text = snapshot.data.toString('utf8')
      return text.trim() ? { kind: 'text', text } : null
    }

    case 'files': {
      // File copies are recorded as their newline-separated paths
      const paths = snapshot.data
        .toString('utf8')
        .split('\n')
        .map(path => path.trim())
        .filter(Boolean)
      return paths.length > 0 ? { kind: 'text', text: paths.join('\n') } : null
    }

    case 'image': {
      if (snapshot.data.length === 0) {
        return null
      }
      if (!isPng(snapshot.data)) {
        throw new UnsupportedFormatError('Clipboard image is not PNG data')
      }
      if (snapshot.data.length > maxImageBytes) {
        logger.debug(`Skipping image of ${snapshot.data.length} bytes (limit ${maxImageBytes})`)
        return null
      }
      return { kind: 'image', data: snapshot.data }
    }

    default:
      throw new UnsupportedFormatError(`Unsupported clipboard format: ${snapshot.type ?? snapshot.format}`)
  }
}
