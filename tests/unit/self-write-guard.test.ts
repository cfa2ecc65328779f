import { describe, it, expect } from 'vitest'
import { SelfWriteGuard, digestContent, selfWriteWindowFor } from '../../src/main/core/clipboard/self-write-guard'

describe('SelfWriteGuard', () => {
  function createGuard(windowMs = 1000) {
    let clock = 0
    const guard = new SelfWriteGuard({ windowMs, now: () => clock })
    return { guard, setClock: (value: number) => { clock = value } }
  }

  it('consumes the flag exactly once per arm', () => {
    const { guard } = createGuard()

    guard.arm('digest')

    expect(guard.armed).toBe(true)
    expect(guard.consumeFlag()).toBe(true)
    expect(guard.consumeFlag()).toBe(false)
    expect(guard.armed).toBe(false)
  })

  it('lets the flag lapse after the window', () => {
    const { guard, setClock } = createGuard(1000)

    guard.arm('digest')
    setClock(1001)

    expect(guard.consumeFlag()).toBe(false)
    expect(guard.matchesSelfWrite('digest')).toBe(false)
  })

  it('matches the written digest while the window is open', () => {
    const { guard, setClock } = createGuard(1000)

    guard.arm('digest')
    guard.consumeFlag()
    setClock(1000)

    expect(guard.matchesSelfWrite('digest')).toBe(true)
    expect(guard.matchesSelfWrite('other')).toBe(false)
  })

  it('restarts the window when the write lands', () => {
    const { guard, setClock } = createGuard(1000)

    guard.arm('digest')
    setClock(800)
    guard.refresh()
    setClock(1700)

    expect(guard.matchesSelfWrite('digest')).toBe(true)
    expect(guard.consumeFlag()).toBe(true)
  })

  it('does not revive a flag that was already consumed', () => {
    const { guard } = createGuard()

    guard.arm('digest')
    guard.consumeFlag()
    guard.refresh()

    expect(guard.armed).toBe(false)
    expect(guard.consumeFlag()).toBe(false)
  })

  it('forgets everything on disarm', () => {
    const { guard } = createGuard()

    guard.arm('digest')
    guard.disarm()

    expect(guard.consumeFlag()).toBe(false)
    expect(guard.matchesSelfWrite('digest')).toBe(false)
  })
})

describe('selfWriteWindowFor', () => {
  it('covers the slowest notification of the clipboard port', () => {
    expect(selfWriteWindowFor()).toBe(1500)
    expect(selfWriteWindowFor(1500)).toBe(3000)
    expect(selfWriteWindowFor(6000)).toBe(7500)
  })
})

describe('digestContent', () => {
  it('distinguishes text from image with the same bytes', () => {
    expect(digestContent({ kind: 'text', text: 'abc' })).not.toBe(digestContent({ kind: 'image', data: Buffer.from('abc') }))
  })

  it('ignores the stored hash of an image entry', () => {
    const data = Buffer.from([1, 2, 3])

    expect(digestContent({ kind: 'image', data, hash: 'anything' })).toBe(digestContent({ kind: 'image', data }))
  })
})
