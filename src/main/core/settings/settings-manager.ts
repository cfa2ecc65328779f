// src/main/core/settings/settings-manager.ts
import Conf from 'conf'
import { z } from 'zod'
import { createLogger } from '../../utils/logger'
import { validateHotkey } from '../../../utils/validation'

const logger = createLogger('Settings')

export const preferencesSchema = z.object({
  maxEntries: z.number().int().min(1).max(10_000),
  maxContentLength: z.number().int().min(1).max(1_000_000),
  previewLength: z.number().int().min(10).max(1000),
  maxImageBytes: z.number().int().min(1024).max(50 * 1024 * 1024),
  expireDays: z.number().int().min(0).max(3650),
  hotkey: z.string().refine(value => validateHotkey(value).valid, { message: 'Invalid hotkey' }),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
  clipboardActive: z.boolean(),
  pollIntervalMs: z.number().int().min(100).max(10_000),
})

export type Preferences = z.infer<typeof preferencesSchema>

export const DEFAULT_PREFERENCES: Preferences = {
  maxEntries: 500,
  maxContentLength: 50_000,
  previewLength: 200,
  maxImageBytes: 5 * 1024 * 1024,
  expireDays: 30,
  hotkey: 'Ctrl+Shift+V',
  logLevel: 'info',
  clipboardActive: true,
  pollIntervalMs: 500,
}

// Whatever is on disk, each field falls back to its default on its own
const storedPreferencesSchema = z.object({
  maxEntries: preferencesSchema.shape.maxEntries.catch(DEFAULT_PREFERENCES.maxEntries),
  maxContentLength: preferencesSchema.shape.maxContentLength.catch(DEFAULT_PREFERENCES.maxContentLength),
  previewLength: preferencesSchema.shape.previewLength.catch(DEFAULT_PREFERENCES.previewLength),
  maxImageBytes: preferencesSchema.shape.maxImageBytes.catch(DEFAULT_PREFERENCES.maxImageBytes),
  expireDays: preferencesSchema.shape.expireDays.catch(DEFAULT_PREFERENCES.expireDays),
  hotkey: preferencesSchema.shape.hotkey.catch(DEFAULT_PREFERENCES.hotkey),
  logLevel: preferencesSchema.shape.logLevel.catch(DEFAULT_PREFERENCES.logLevel),
  clipboardActive: preferencesSchema.shape.clipboardActive.catch(DEFAULT_PREFERENCES.clipboardActive),
  pollIntervalMs: preferencesSchema.shape.pollIntervalMs.catch(DEFAULT_PREFERENCES.pollIntervalMs),
}).catch(DEFAULT_PREFERENCES)

type Schema = {
  preferences: Preferences
}

export interface SettingsManagerOptions {
  /** Directory holding the settings file; defaults to the per-user config directory */
  cwd?: string
  configName?: string
}

export class SettingsValidationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'SettingsValidationError'
  }
}

export function createSettingsManager(options: SettingsManagerOptions = {}) {
  const store = new Conf<Schema>({
    projectName: 'clipkeep',
    cwd: options.cwd,
    configName: options.configName ?? 'settings',
    defaults: { preferences: DEFAULT_PREFERENCES },
  })

  function read(): Preferences {
    return storedPreferencesSchema.parse(store.get('preferences'))
  }

  function write(next: unknown): Preferences {
    const result = preferencesSchema.safeParse(next)
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
      throw new SettingsValidationError(`Invalid preferences: ${issues.join('; ')}`)
    }
    store.set('preferences', result.data)
    return result.data
  }

  return {
    get path(): string {
      return store.path
    },

    /**
     * Fill in missing fields and replace invalid ones with defaults
     */
    init(): Preferences {
      const prefs = read()
      store.set('preferences', prefs)
      logger.debug(`Loaded preferences from ${store.path}`)
      return prefs
    },

    get<K extends keyof Preferences>(key: K): Preferences[K] {
      return read()[key]
    },

    /**
     * @throws SettingsValidationError when the value is out of range
     */
    set<K extends keyof Preferences>(key: K, value: Preferences[K]): void {
      write({ ...read(), [key]: value })
      logger.debug(`preference ${key} -> ${String(value)}`)
    },

    update(patch: Partial<Preferences>): Preferences {
      return write({ ...read(), ...patch })
    },

    getAll(): Preferences {
      return read()
    },

    reset(): Preferences {
      return write(DEFAULT_PREFERENCES)
    },
  }
}

export type SettingsManager = ReturnType<typeof createSettingsManager>
