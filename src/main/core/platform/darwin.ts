// src/main/core/platform/darwin.ts
import { mkdtemp, rm, writeFile } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { z } from 'zod'
import type { ClipboardSnapshot, KeyCombo, Modifier, WindowHandle } from '../../types'
import type { ClipboardPort, HotkeyPort, InputPort, PlatformPorts, WindowPort } from './types'
import type { Notifier } from '../orchestrator'
import { createLogger } from '../../utils/logger'
import { describeError } from '../../utils/errors'
import { osascriptRunner, sanitizeAppleScriptString, type ScriptRunner } from './script-runner'
import keycodeTable from './darwin-keycodes.json'

const logger = createLogger('Darwin')

const KEY_CODES = z.record(z.number().int().nonnegative()).parse(keycodeTable)

const MODIFIER_CLAUSES: Record<Modifier, string> = {
  ctrl: 'control down',
  alt: 'option down',
  shift: 'shift down',
  meta: 'command down',
}

// Polling slows down to this multiple of the base interval while nothing is copied
const MAX_INTERVAL_FACTOR = 3
const IDLE_AFTER_MS = 5000

const READ_PASTEBOARD = `ObjC.import('AppKit')
function run() {
  const pb = $.NSPasteboard.generalPasteboard
  const types = ObjC.deepUnwrap(pb.types) || []
  if (types.length === 0) return 'null'
  if (types.indexOf('public.file-url') !== -1) {
    const paths = []
    const items = pb.pasteboardItems
    for (let i = 0; i < items.count; i++) {
      const url = items.objectAtIndex(i).stringForType('public.file-url')
      if (!url.isNil()) paths.push(ObjC.unwrap($.NSURL.URLWithString(url).path))
    }
    return JSON.stringify({ format: 'files', paths: paths })
  }
  const png = pb.dataForType('public.png')
  if (!png.isNil()) {
    return JSON.stringify({ format: 'image', base64: ObjC.unwrap(png.base64EncodedStringWithOptions(0)) })
  }
  const tiff = pb.dataForType('public.tiff')
  if (!tiff.isNil()) {
    const rep = $.NSBitmapImageRep.imageRepWithData(tiff)
    const converted = rep.representationUsingTypeProperties($.NSBitmapImageFileTypePNG, $())
    return JSON.stringify({ format: 'image', base64: ObjC.unwrap(converted.base64EncodedStringWithOptions(0)) })
  }
  const text = pb.stringForType('public.utf8-plain-text')
  if (!text.isNil()) return JSON.stringify({ format: 'text', text: ObjC.unwrap(text) })
  return JSON.stringify({ format: 'other', type: types[0] })
}`

const WRITE_PNG = `ObjC.import('AppKit')
function run(argv) {
  const data = $.NSData.dataWithContentsOfFile(argv[0])
  if (data.isNil()) throw new Error('Cannot read image file')
  const pb = $.NSPasteboard.generalPasteboard
  pb.clearContents
  if (!pb.setDataForType(data, 'public.png')) throw new Error('Pasteboard refused the image')
  return 'ok'
}`

const CHANGE_COUNT = `ObjC.import('AppKit')
String($.NSPasteboard.generalPasteboard.changeCount)`

const FRONTMOST_PID = `ObjC.import('AppKit')
const app = $.NSWorkspace.sharedWorkspace.frontmostApplication
app.isNil() ? '' : String(app.processIdentifier)`

const APP_RUNNING = `ObjC.import('AppKit')
function run(argv) {
  const app = $.NSRunningApplication.runningApplicationWithProcessIdentifier(Number(argv[0]))
  return app.isNil() || app.terminated ? 'false' : 'true'
}`

const ACTIVATE_APP = `ObjC.import('AppKit')
function run(argv) {
  const app = $.NSRunningApplication.runningApplicationWithProcessIdentifier(Number(argv[0]))
  if (app.isNil()) return 'false'
  return app.activateWithOptions($.NSApplicationActivateIgnoringOtherApps) ? 'true' : 'false'
}`

const pasteboardSchema = z.discriminatedUnion('format', [
  z.object({ format: z.literal('text'), text: z.string() }),
  z.object({ format: z.literal('image'), base64: z.string() }),
  z.object({ format: z.literal('files'), paths: z.array(z.string()) }),
  z.object({ format: z.literal('other'), type: z.string() }),
]).nullable()

export type PasteboardContent = z.infer<typeof pasteboardSchema>

export function parsePasteboardOutput(output: string): ClipboardSnapshot | null {
  const raw: unknown = JSON.parse(output)
  const content = pasteboardSchema.parse(raw)

  if (content === null) {
    return null
  }

  switch (content.format) {
    case 'text':
      return { format: 'text', data: Buffer.from(content.text, 'utf8') }
    case 'image':
      return { format: 'image', data: Buffer.from(content.base64, 'base64') }
    case 'files':
      return { format: 'files', data: Buffer.from(content.paths.join('\n'), 'utf8') }
    case 'other':
      return { format: 'other', data: Buffer.alloc(0), type: content.type }
  }
}

/**
 * AppleScript statement that presses `combo` in the frontmost application
 */
export function keystrokeScript(combo: KeyCombo): string {
  const keyCode = Object.hasOwn(KEY_CODES, combo.code) ? KEY_CODES[combo.code] : undefined
  if (keyCode === undefined) {
    throw new Error(`No macOS key code for ${combo.code}`)
  }

  const using = combo.modifiers.length > 0
    ? ` using {${combo.modifiers.map(modifier => MODIFIER_CLAUSES[modifier]).join(', ')}}`
    : ''
  return `tell application "System Events" to key code ${keyCode}${using}`
}

function isPid(handle: WindowHandle): boolean {
  return /^[1-9][0-9]*$/.test(handle)
}

export interface DarwinClipboardOptions {
  pollIntervalMs?: number
}

/**
 * The pasteboard sends no change notifications, so its change count is polled.
 * The interval stretches while nothing is being copied and snaps back on change.
 */
export class DarwinClipboard implements ClipboardPort {
  private readonly pollIntervalMs: number

  constructor(private readonly runner: ScriptRunner = osascriptRunner, options: DarwinClipboardOptions = {}) {
    this.pollIntervalMs = options.pollIntervalMs ?? 500
  }

  /** A write is seen at the latest one fully stretched poll interval later */
  get maxNotifyDelayMs(): number {
    return this.pollIntervalMs * MAX_INTERVAL_FACTOR
  }

  async read(): Promise<ClipboardSnapshot | null> {
    return parsePasteboardOutput(await this.runner.jxa(READ_PASTEBOARD))
  }

  async write(format: 'text' | 'image', data: Buffer): Promise<void> {
    if (format === 'text') {
      await this.runner.pipe('pbcopy', [], data)
      return
    }

    const dir = await mkdtemp(join(tmpdir(), 'clipkeep-'))
    try {
      const path = join(dir, 'paste.png')
      await writeFile(path, data)
      await this.runner.jxa(WRITE_PNG, [path])
    } finally {
      await rm(dir, { recursive: true, force: true })
    }
  }

  async changeCount(): Promise<number> {
    const count = Number.parseInt(await this.runner.jxa(CHANGE_COUNT), 10)
    if (!Number.isSafeInteger(count)) {
      throw new Error('Unexpected pasteboard change count')
    }
    return count
  }

  subscribe(onChange: () => void): () => void {
    const base = this.pollIntervalMs
    let interval = base
    let lastCount: number | null = null
    let lastChangeAt = Date.now()
    let timer: NodeJS.Timeout | null = null
    let stopped = false

    const poll = async (): Promise<void> => {
      try {
        const count = await this.changeCount()
        if (lastCount !== null && count !== lastCount && !stopped) {
          lastChangeAt = Date.now()
          interval = base
          onChange()
        }
        lastCount = count
      } catch (error) {
        logger.debug('Pasteboard poll failed:', describeError(error))
      }

      if (Date.now() - lastChangeAt > IDLE_AFTER_MS) {
        interval = Math.min(Math.floor(interval * 1.5), base * MAX_INTERVAL_FACTOR)
      }

      if (!stopped) {
        timer = setTimeout(schedule, interval)
      }
    }

    const schedule = (): void => {
      poll().catch((error: unknown) => logger.error('Pasteboard polling stopped:', describeError(error)))
    }

    schedule()
    logger.debug(`Polling pasteboard every ${base}ms`)

    return () => {
      stopped = true
      if (timer) {
        clearTimeout(timer)
        timer = null
      }
    }
  }
}

/**
 * Window handles are application pids; macOS focuses applications, not windows
 */
export class DarwinWindows implements WindowPort {
  constructor(private readonly runner: ScriptRunner = osascriptRunner) { }

  async getForegroundWindow(): Promise<WindowHandle | null> {
    const pid = await this.runner.jxa(FRONTMOST_PID)
    return isPid(pid) ? pid : null
  }

  async exists(handle: WindowHandle): Promise<boolean> {
    if (!isPid(handle)) return false
    return (await this.runner.jxa(APP_RUNNING, [handle])) === 'true'
  }

  async bringToForeground(handle: WindowHandle): Promise<boolean> {
    if (!isPid(handle)) return false
    return (await this.runner.jxa(ACTIVATE_APP, [handle])) === 'true'
  }
}

export class DarwinInput implements InputPort {
  constructor(private readonly runner: ScriptRunner = osascriptRunner) { }

  async sendKeystroke(combo: KeyCombo, target: WindowHandle): Promise<void> {
    await this.runner.appleScript(keystrokeScript(combo))
    logger.debug(`Sent keystroke to ${target}`)
  }
}

export class DarwinNotifier implements Notifier {
  constructor(private readonly runner: ScriptRunner = osascriptRunner) { }

  notify(message: string): void {
    const script = `display notification "${sanitizeAppleScriptString(message)}" with title "clipkeep"`
    this.runner.appleScript(script).catch((error: unknown) => {
      logger.warn('Failed to show notification:', describeError(error))
    })
  }
}

export interface DarwinPortsOptions extends DarwinClipboardOptions {
  hotkeys: HotkeyPort
  runner?: ScriptRunner
}

export function createDarwinPorts(options: DarwinPortsOptions): PlatformPorts {
  const runner = options.runner ?? osascriptRunner
  return {
    clipboard: new DarwinClipboard(runner, { pollIntervalMs: options.pollIntervalMs }),
    windows: new DarwinWindows(runner),
    input: new DarwinInput(runner),
    hotkeys: options.hotkeys,
  }
}
