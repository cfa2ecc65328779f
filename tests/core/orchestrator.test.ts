import { describe, it, expect, beforeEach, vi } from 'vitest'
import { Orchestrator, type OrchestratorOptions, type PasteOutcome } from '../../src/main/core/orchestrator'
import { HistoryStore } from '../../src/main/core/history/history-store'
import { MemoryHistoryBackend } from '../../src/main/core/history/memory-backend'
import { createDarwinPorts } from '../../src/main/core/platform/darwin'
import type { ScriptRunner } from '../../src/main/core/platform/script-runner'
import { StorageUnavailableError } from '../../src/main/utils/errors'
import type { Entry, KeyCombo, NewEntry } from '../../src/main/types'
import { FakeHotkeys, FakeNotifier, FakePopup, createFakePorts, type FakePorts } from '../setup/fakes'

const CTRL_SHIFT_V: KeyCombo = { modifiers: ['ctrl', 'shift'], code: 'KeyV' }
const CMD_V: KeyCombo = { modifiers: ['meta'], code: 'KeyV' }

function texts(entries: Entry[]): string[] {
  return entries.map(entry => (entry.content.kind === 'text' ? entry.content.text : '<image>'))
}

/**
 * Scripted macOS pasteboard: pbcopy bumps the change count the way a real copy does
 */
class PasteboardRunner implements ScriptRunner {
  changeCount = 0
  text = ''

  async jxa(script: string): Promise<string> {
    if (script.includes('changeCount')) return String(this.changeCount)
    if (script.includes('pasteboardItems')) return JSON.stringify({ format: 'text', text: this.text })
    if (script.includes('frontmostApplication')) return '42'
    return 'true'
  }

  async appleScript(): Promise<string> {
    return ''
  }

  async pipe(_command: string, _args: string[], input: Buffer): Promise<void> {
    this.copy(input.toString('utf8'))
  }

  copy(text: string): void {
    this.text = text
    this.changeCount++
  }
}

describe('Orchestrator', () => {
  let ports: FakePorts
  let store: HistoryStore
  let popup: FakePopup
  let notifier: FakeNotifier
  let preferences: { set: ReturnType<typeof vi.fn> }

  function createOrchestrator(options: Partial<OrchestratorOptions> = {}) {
    return new Orchestrator(
      { store, ports, popup, notifier, preferences },
      {
        hotkey: CTRL_SHIFT_V,
        watcher: { readRetryDelayMs: 0 },
        paste: { pasteCombo: CMD_V, writeRetryDelayMs: 0, settleDelayMs: 0 },
        ...options,
      }
    )
  }

  async function copy(orchestrator: Orchestrator, text: string): Promise<void> {
    ports.clipboard.copyText(text)
    await orchestrator.whenIdle()
  }

  beforeEach(() => {
    ports = createFakePorts()
    ports.windows.open.add('42')
    ports.windows.foreground = '42'
    store = new HistoryStore(new MemoryHistoryBackend())
    popup = new FakePopup()
    notifier = new FakeNotifier()
    preferences = { set: vi.fn() }
  })

  it('records clipboard changes in the history', async () => {
    const orchestrator = createOrchestrator()
    await orchestrator.start()

    await copy(orchestrator, 'one')
    await copy(orchestrator, 'two')

    expect(texts(await store.list())).toEqual(['two', 'one'])
  })

  it('opens the popup with the window captured at hotkey time', async () => {
    const orchestrator = createOrchestrator()
    await orchestrator.start()
    await copy(orchestrator, 'one')
    let listed: Entry[] = []
    popup.handle(async session => {
      listed = await session.list()
    })

    ports.hotkeys.press()
    await orchestrator.whenIdle()

    expect(popup.sessions).toHaveLength(1)
    expect(popup.sessions[0].target).toBe('42')
    expect(texts(listed)).toEqual(['one'])
  })

  it('pastes a selected entry without recording it again', async () => {
    const orchestrator = createOrchestrator()
    await orchestrator.start()
    await copy(orchestrator, 'one')
    await copy(orchestrator, 'two')
    let outcome: PasteOutcome | undefined
    popup.handle(async session => {
      const entries = await session.list()
      outcome = await session.paste(entries[1].id)
    })

    ports.hotkeys.press()
    await orchestrator.whenIdle()
    await orchestrator.whenIdle()

    expect(outcome).toEqual({ status: 'pasted', id: 1 })
    expect(ports.input.keystrokes).toEqual([{ combo: CMD_V, target: '42' }])
    expect(ports.clipboard.content).toEqual({ format: 'text', data: Buffer.from('one') })
    expect(texts(await store.list())).toEqual(['two', 'one'])
    expect(notifier.messages).toEqual([])
  })

  it('does not record a paste whose clipboard notification arrives late', async () => {
    vi.useFakeTimers()
    ports.clipboard.notifyDelayMs = 4000
    const orchestrator = createOrchestrator()
    await orchestrator.start()
    const id = await store.add({ kind: 'text', text: 'one' })
    await store.add({ kind: 'text', text: 'two' })

    await expect(orchestrator.pasteEntry(id, '42')).resolves.toEqual({ status: 'pasted', id })
    await vi.advanceTimersByTimeAsync(4000)
    await orchestrator.whenIdle()

    expect(texts(await store.list())).toEqual(['two', 'one'])
  })

  it('tells the user when the target window is gone', async () => {
    const orchestrator = createOrchestrator()
    const id = await store.add({ kind: 'text', text: 'one' })
    ports.windows.open.delete('42')

    const outcome = await orchestrator.pasteEntry(id, '42')

    expect(outcome).toMatchObject({ status: 'failed', id, code: 'WINDOW_GONE' })
    expect(ports.input.keystrokes).toEqual([])
    expect(notifier.messages).toEqual(['The window you were pasting into has closed. The entry is on the clipboard.'])
  })

  it('tells the user when the clipboard stays busy', async () => {
    const orchestrator = createOrchestrator()
    const id = await store.add({ kind: 'text', text: 'one' })
    ports.clipboard.failWrites = 3

    const outcome = await orchestrator.pasteEntry(id, '42')

    expect(outcome).toMatchObject({ status: 'failed', id, code: 'CLIPBOARD_BUSY' })
    expect(notifier.messages).toEqual(['The clipboard is in use by another application. Try again in a moment.'])
  })

  it('reports an entry deleted before the paste as missing', async () => {
    const orchestrator = createOrchestrator()

    await expect(orchestrator.pasteEntry(999, '42')).resolves.toEqual({ status: 'missing', id: 999 })
    expect(notifier.messages).toEqual([])
  })

  it('edits the history through the popup session', async () => {
    const orchestrator = createOrchestrator()
    const a = await store.add({ kind: 'text', text: 'a' })
    const b = await store.add({ kind: 'text', text: 'b' })
    await store.add({ kind: 'text', text: 'c' })
    const session = orchestrator.createSession({ target: '42', activatedAt: 0 })

    await expect(session.setPinned(a, true)).resolves.toBe(true)
    await expect(session.togglePin(b)).resolves.toBe(true)
    await expect(session.togglePin(b)).resolves.toBe(true)
    await expect(session.remove(b)).resolves.toBe(true)
    await expect(session.clear()).resolves.toBe(1)

    expect(texts(await session.list())).toEqual(['a'])
  })

  it('rejects invalid input from the popup', async () => {
    const orchestrator = createOrchestrator()
    await store.add({ kind: 'text', text: 'a' })
    const session = orchestrator.createSession({ target: '42', activatedAt: 0 })

    await expect(session.setPinned(-1, true)).resolves.toBe(false)
    await expect(session.remove(1.5)).resolves.toBe(false)
    await expect(session.list('x'.repeat(501))).resolves.toEqual([])
    await expect(session.paste(0)).resolves.toEqual({ status: 'missing', id: 0 })
  })

  it('keeps capturing when the hotkey cannot be registered', async () => {
    ports.hotkeys.failRegister = true
    const orchestrator = createOrchestrator()

    await orchestrator.start()
    await copy(orchestrator, 'still recorded')

    expect(orchestrator.isHotkeyActive).toBe(false)
    expect(texts(await store.list())).toEqual(['still recorded'])
  })

  it('pauses and resumes monitoring and saves the choice', async () => {
    const orchestrator = createOrchestrator()
    await orchestrator.start()

    orchestrator.setMonitoring(false)
    await copy(orchestrator, 'ignored')
    orchestrator.setMonitoring(true)
    await copy(orchestrator, 'recorded')

    expect(texts(await store.list())).toEqual(['recorded'])
    expect(preferences.set.mock.calls).toEqual([
      ['clipboardActive', false],
      ['clipboardActive', true],
    ])
  })

  it('does not watch the clipboard when monitoring starts disabled', async () => {
    const orchestrator = createOrchestrator({ clipboardActive: false })
    await orchestrator.start()

    await copy(orchestrator, 'ignored')

    expect(orchestrator.isMonitoring).toBe(false)
    expect(await store.count()).toBe(0)
  })

  it('keeps watching after a capture fails to store', async () => {
    class FlakyBackend extends MemoryHistoryBackend {
      failNext = true

      override insert(entry: NewEntry): number {
        if (this.failNext) {
          this.failNext = false
          throw new Error('disk full')
        }
        return super.insert(entry)
      }
    }
    store = new HistoryStore(new FlakyBackend())
    const orchestrator = createOrchestrator()
    await orchestrator.start()

    await copy(orchestrator, 'lost')
    await copy(orchestrator, 'kept')

    expect(texts(await store.list())).toEqual(['kept'])
  })

  it('gives the popup an empty list when storage is unavailable', async () => {
    const orchestrator = createOrchestrator()
    await store.add({ kind: 'text', text: 'a' })
    await store.close()
    const session = orchestrator.createSession({ target: '42', activatedAt: 0 })

    await expect(session.list()).resolves.toEqual([])
    await expect(session.togglePin(1)).resolves.toBe(false)
  })

  it('releases the watchers and the store on stop', async () => {
    const orchestrator = createOrchestrator()
    await orchestrator.start()

    await orchestrator.stop()

    expect(ports.clipboard.subscribers).toBe(0)
    expect(ports.hotkeys.registered).toBe(0)
    await expect(store.count()).rejects.toBeInstanceOf(StorageUnavailableError)
  })

  it('finishes stopping while a popup never closes', async () => {
    const orchestrator = createOrchestrator({ stopTimeoutMs: 20 })
    await orchestrator.start()
    popup.handle(() => new Promise<void>(() => {}))
    ports.hotkeys.press()
    await vi.waitFor(() => expect(popup.sessions).toHaveLength(1))

    await orchestrator.stop()

    expect(popup.sessions[0].signal.aborted).toBe(true)
    await expect(store.count()).rejects.toBeInstanceOf(StorageUnavailableError)
  })

  it('closes an open popup through its session signal on stop', async () => {
    const orchestrator = createOrchestrator({ stopTimeoutMs: 60_000 })
    await orchestrator.start()
    popup.handle(session => new Promise<void>(resolve => {
      session.signal.addEventListener('abort', () => resolve())
    }))
    ports.hotkeys.press()
    await vi.waitFor(() => expect(popup.sessions).toHaveLength(1))

    await orchestrator.stop()

    await expect(store.count()).rejects.toBeInstanceOf(StorageUnavailableError)
  })

  it('gives popups opened after a restart a live signal', async () => {
    const orchestrator = createOrchestrator({ stopTimeoutMs: 20 })
    await orchestrator.start()
    await orchestrator.stop()
    await orchestrator.start()

    expect(orchestrator.createSession({ target: '42', activatedAt: 0 }).signal.aborted).toBe(false)
  })

  it('stays consistent while captures and popup edits interleave', async () => {
    store = new HistoryStore(new MemoryHistoryBackend(), { maxEntries: 20 })
    const orchestrator = createOrchestrator()
    await orchestrator.start()
    const session = orchestrator.createSession({ target: '42', activatedAt: 0 })
    const removed = new Set<number>()

    for (let i = 0; i < 40; i++) {
      ports.clipboard.copyText(`copy ${i}`)
      const snapshot = await session.list()
      const victim = snapshot[snapshot.length - 1]
      if (victim && i % 3 === 0) {
        removed.add(victim.id)
        await session.remove(victim.id)
      }
      if (snapshot[0] && i % 5 === 0) {
        await session.togglePin(snapshot[0].id)
      }
    }
    await orchestrator.whenIdle()

    const ids = (await session.list()).map(entry => entry.id)
    expect(new Set(ids).size).toBe(ids.length)
    for (const id of removed) {
      expect(ids).not.toContain(id)
    }
  })
})

describe('Orchestrator on the polled macOS pasteboard', () => {
  it('does not record a paste the poller notices seconds later', async () => {
    vi.useFakeTimers()
    const runner = new PasteboardRunner()
    const store = new HistoryStore(new MemoryHistoryBackend())
    const orchestrator = new Orchestrator(
      {
        store,
        ports: createDarwinPorts({ hotkeys: new FakeHotkeys(), runner, pollIntervalMs: 2000 }),
        popup: new FakePopup(),
        notifier: new FakeNotifier(),
      },
      {
        hotkey: CTRL_SHIFT_V,
        watcher: { readRetryDelayMs: 0 },
        paste: { pasteCombo: CMD_V, writeRetryDelayMs: 0, settleDelayMs: 0 },
      }
    )
    await orchestrator.start()
    await vi.advanceTimersByTimeAsync(0)

    runner.copy('A')
    await vi.advanceTimersByTimeAsync(2000)
    runner.copy('B')
    await vi.advanceTimersByTimeAsync(2000)
    await orchestrator.whenIdle()
    expect(texts(await store.list())).toEqual(['B', 'A'])

    // Nothing copied for a while: polling has stretched to 6s, the last poll was 500ms ago
    await vi.advanceTimersByTimeAsync(26_000)
    const [, a] = await store.list()
    await expect(orchestrator.pasteEntry(a.id, '42')).resolves.toEqual({ status: 'pasted', id: a.id })
    await vi.advanceTimersByTimeAsync(7000)
    await orchestrator.whenIdle()
    expect(texts(await store.list())).toEqual(['B', 'A'])

    runner.copy('C')
    await vi.advanceTimersByTimeAsync(7000)
    await orchestrator.whenIdle()
    expect(texts(await store.list())).toEqual(['C', 'B', 'A'])

    await orchestrator.stop()
  })
})
