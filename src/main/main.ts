#!/usr/bin/env node
// src/main/main.ts
import 'dotenv/config'
import path from 'path'
import { createLogger, isLogLevel, setLogLevel } from './utils/logger'
import { describeError } from './utils/errors'
import { createSettingsManager } from './core/settings/settings-manager'
import { acquireInstanceLock } from './core/instance/instance-lock'
import { openHistoryBackend } from './core/history/open-backend'
import { HistoryStore } from './core/history/history-store'
import { parseCombo, defaultPasteCombo } from './core/hotkey/combo'
import { createDarwinPorts, DarwinNotifier } from './core/platform/darwin'
import { SignalHotkeyPort } from './core/platform/signal-hotkeys'
import { TerminalPopup } from './core/popup/terminal-popup'
import { Orchestrator } from './core/orchestrator'

const logger = createLogger('Main')

process.on('uncaughtException', (error) => {
  logger.error('Uncaught exception:', error)
})

process.on('unhandledRejection', (reason) => {
  logger.error('Unhandled rejection:', reason)
})

async function main(): Promise<number> {
  if (process.platform !== 'darwin') {
    logger.error(`Unsupported platform ${process.platform}; only macOS is supported`)
    return 1
  }

  const settings = createSettingsManager()
  const prefs = settings.init()

  const envLevel = process.env.CLIPKEEP_LOG_LEVEL
  setLogLevel(isLogLevel(envLevel) ? envLevel : prefs.logLevel)

  const dataDir = process.env.CLIPKEEP_DATA_DIR ?? path.dirname(settings.path)
  const lock = acquireInstanceLock(path.join(dataDir, 'clipkeep.lock'))
  if (lock.status === 'already-running') {
    logger.error(`clipkeep is already running (pid ${lock.pid})`)
    return 1
  }

  const { backend, persistent } = openHistoryBackend(path.join(dataDir, 'history.db'))
  const store = new HistoryStore(backend, {
    maxEntries: prefs.maxEntries,
    maxContentLength: prefs.maxContentLength,
    previewLength: prefs.previewLength,
    expireDays: prefs.expireDays,
  })

  try {
    await store.purgeExpired()
  } catch (error) {
    logger.warn('Could not purge expired entries:', describeError(error))
  }

  const orchestrator = new Orchestrator(
    {
      store,
      ports: createDarwinPorts({ hotkeys: new SignalHotkeyPort(), pollIntervalMs: prefs.pollIntervalMs }),
      popup: new TerminalPopup(),
      notifier: new DarwinNotifier(),
      preferences: settings,
    },
    {
      hotkey: parseCombo(prefs.hotkey),
      clipboardActive: prefs.clipboardActive,
      watcher: { maxImageBytes: prefs.maxImageBytes },
      paste: { pasteCombo: defaultPasteCombo() },
    }
  )

  let shuttingDown = false
  const shutdown = (signal: string) => {
    if (shuttingDown) return
    shuttingDown = true
    logger.info(`Received ${signal}, shutting down`)
    orchestrator.stop()
      .catch((error: unknown) => logger.error('Shutdown failed:', describeError(error)))
      .finally(() => {
        lock.release()
        process.exit(0)
      })
  }

  process.on('SIGINT', () => shutdown('SIGINT'))
  process.on('SIGTERM', () => shutdown('SIGTERM'))
  process.on('exit', () => lock.release())

  await orchestrator.start()
  logger.info(`clipkeep ready (${persistent ? 'persistent' : 'session-only'} history, hotkey ${prefs.hotkey})`)
  return 0
}

main()
  .then(code => {
    if (code !== 0) {
      process.exit(code)
    }
  })
  .catch((error: unknown) => {
    logger.error('Fatal error during startup:', describeError(error))
    process.exit(1)
  })
