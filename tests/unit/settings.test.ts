import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import {
  DEFAULT_PREFERENCES,
  SettingsValidationError,
  createSettingsManager,
} from '../../src/main/core/settings/settings-manager'

describe('settingsManager', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'clipkeep-settings-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('starts from the defaults', () => {
    const settings = createSettingsManager({ cwd: dir })

    expect(settings.init()).toEqual(DEFAULT_PREFERENCES)
    expect(settings.path).toBe(join(dir, 'settings.json'))
  })

  it('persists changes across instances', () => {
    createSettingsManager({ cwd: dir }).set('maxEntries', 100)

    const reopened = createSettingsManager({ cwd: dir })

    expect(reopened.get('maxEntries')).toBe(100)
    expect(reopened.get('hotkey')).toBe('Ctrl+Shift+V')
  })

  it('rejects invalid values and keeps the previous ones', () => {
    const settings = createSettingsManager({ cwd: dir })

    expect(() => settings.set('maxEntries', 0)).toThrow(SettingsValidationError)
    expect(() => settings.set('hotkey', 'V')).toThrow('Invalid preferences: hotkey: Invalid hotkey')
    expect(settings.get('maxEntries')).toBe(500)
    expect(settings.get('hotkey')).toBe('Ctrl+Shift+V')
  })

  it('replaces invalid stored fields with their defaults', () => {
    writeFileSync(join(dir, 'settings.json'), JSON.stringify({
      preferences: { maxEntries: -5, hotkey: 'Ctrl+Alt+H', logLevel: 'loud', clipboardActive: false },
    }))
    const settings = createSettingsManager({ cwd: dir })

    expect(settings.init()).toEqual({
      ...DEFAULT_PREFERENCES,
      hotkey: 'Ctrl+Alt+H',
      clipboardActive: false,
    })
    const stored: unknown = JSON.parse(readFileSync(join(dir, 'settings.json'), 'utf8'))
    expect(stored).toMatchObject({ preferences: { maxEntries: 500, logLevel: 'info' } })
  })

  it('falls back to the defaults when the stored preferences are not an object', () => {
    writeFileSync(join(dir, 'settings.json'), JSON.stringify({ preferences: 5 }))

    expect(createSettingsManager({ cwd: dir }).getAll()).toEqual(DEFAULT_PREFERENCES)
  })

  it('applies a patch and resets', () => {
    const settings = createSettingsManager({ cwd: dir })

    expect(settings.update({ expireDays: 7, pollIntervalMs: 250 })).toEqual({
      ...DEFAULT_PREFERENCES,
      expireDays: 7,
      pollIntervalMs: 250,
    })
    expect(settings.reset()).toEqual(DEFAULT_PREFERENCES)
  })
})
