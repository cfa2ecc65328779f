// src/main/core/popup/terminal-popup.ts
import { createInterface } from 'readline/promises'
import type { Entry } from '../../types'
import type { Notifier, PasteOutcome, PopupPort, PopupSession } from '../orchestrator'
import { createLogger } from '../../utils/logger'

const logger = createLogger('TerminalPopup')

export interface TerminalPopupOptions {
  ask?: (prompt: string, signal: AbortSignal) => Promise<string>
  write?: (line: string) => void
  pageSize?: number
}

export const POPUP_HELP = 'Enter a number to paste, p<n> pin/unpin, d<n> delete, /text filter, c clear unpinned, q close'

async function askStdin(prompt: string, signal: AbortSignal): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout })
  try {
    return await rl.question(prompt, { signal })
  } finally {
    rl.close()
  }
}

function writeStdout(line: string): void {
  process.stdout.write(`${line}\n`)
}

export function formatEntryLine(entry: Entry, index: number): string {
  return `${String(index + 1).padStart(3)}. ${entry.pinned ? '*' : ' '} ${entry.preview}`
}

export function describeOutcome(outcome: PasteOutcome): string {
  switch (outcome.status) {
    case 'pasted':
      return `Pasted entry ${outcome.id}`
    case 'missing':
      return `Entry ${outcome.id} is no longer in the history`
    case 'failed':
      return `Paste failed: ${outcome.message}`
  }
}

type Command =
  | { kind: 'close' }
  | { kind: 'paste'; index: number }
  | { kind: 'pin'; index: number }
  | { kind: 'delete'; index: number }
  | { kind: 'filter'; text: string }
  | { kind: 'clear' }
  | { kind: 'unknown'; input: string }

export function parseCommand(input: string): Command {
  const line = input.trim()

  if (line === '' || line === 'q') return { kind: 'close' }
  if (line === 'c') return { kind: 'clear' }
  if (line.startsWith('/')) return { kind: 'filter', text: line.slice(1) }

  const match = /^([pd]?)\s*(\d+)$/.exec(line)
  if (match) {
    const index = Number.parseInt(match[2], 10) - 1
    if (match[1] === 'p') return { kind: 'pin', index }
    if (match[1] === 'd') return { kind: 'delete', index }
    return { kind: 'paste', index }
  }

  return { kind: 'unknown', input: line }
}

/**
 * Line-based stand-in for the history popup: lists entries and reads commands
 * until the user pastes something, closes it or the session is aborted.
 */
export class TerminalPopup implements PopupPort {
  private readonly ask: (prompt: string, signal: AbortSignal) => Promise<string>
  private readonly write: (line: string) => void
  private readonly pageSize: number

  constructor(options: TerminalPopupOptions = {}) {
    this.ask = options.ask ?? askStdin
    this.write = options.write ?? writeStdout
    this.pageSize = options.pageSize ?? 20
  }

  async open(session: PopupSession): Promise<void> {
    let filter = ''

    for (;;) {
      const entries = await session.list(filter, this.pageSize)
      this.render(entries, filter)

      if (session.signal.aborted) {
        logger.debug('Popup closed on shutdown')
        return
      }

      let answer: string
      try {
        answer = await this.ask('> ', session.signal)
      } catch (error) {
        if (session.signal.aborted) {
          logger.debug('Popup closed on shutdown')
          return
        }
        throw error
      }

      const command = parseCommand(answer)

      if (command.kind === 'close') {
        return
      }

      if (command.kind === 'filter') {
        filter = command.text
        continue
      }

      if (command.kind === 'clear') {
        const removed = await session.clear()
        this.write(`Removed ${removed} entries`)
        continue
      }

      if (command.kind === 'unknown') {
        this.write(`Unknown command "${command.input}". ${POPUP_HELP}`)
        continue
      }

      const entry = entries[command.index]
      if (!entry) {
        this.write(`No entry ${command.index + 1}`)
        continue
      }

      if (command.kind === 'pin') {
        await session.togglePin(entry.id)
      } else if (command.kind === 'delete') {
        await session.remove(entry.id)
      } else {
        const outcome = await session.paste(entry.id)
        this.write(describeOutcome(outcome))
        logger.debug(`Popup closed after paste (${outcome.status})`)
        return
      }
    }
  }

  private render(entries: Entry[], filter: string): void {
    this.write(filter ? `Clipboard history (filter: "${filter}")` : 'Clipboard history')
    if (entries.length === 0) {
      this.write('  (no entries)')
    }
    entries.forEach((entry, index) => this.write(formatEntryLine(entry, index)))
    this.write(POPUP_HELP)
  }
}

/**
 * Notifier that prints to the terminal the popup runs in
 */
export class TerminalNotifier implements Notifier {
  constructor(private readonly write: (line: string) => void = writeStdout) { }

  notify(message: string): void {
    this.write(`! ${message}`)
  }
}
