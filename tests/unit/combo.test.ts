import { describe, it, expect } from 'vitest'
import { combosEqual, defaultPasteCombo, formatCombo, parseCombo, resolveKeyCode } from '../../src/main/core/hotkey/combo'

describe('parseCombo', () => {
  it('maps a sequence to modifiers and a physical key code', () => {
    expect(parseCombo('Ctrl+Shift+V')).toEqual({ modifiers: ['ctrl', 'shift'], code: 'KeyV' })
  })

  it('accepts aliases, any case and any order', () => {
    expect(parseCombo('cmd + option + 1')).toEqual({ modifiers: ['alt', 'meta'], code: 'Digit1' })
    expect(parseCombo('SHIFT+CONTROL+f12')).toEqual({ modifiers: ['ctrl', 'shift'], code: 'F12' })
  })

  it('accepts key codes and named keys', () => {
    expect(parseCombo('Alt+KeyQ')).toEqual({ modifiers: ['alt'], code: 'KeyQ' })
    expect(parseCombo('Ctrl+space')).toEqual({ modifiers: ['ctrl'], code: 'Space' })
    expect(parseCombo('Ctrl+/')).toEqual({ modifiers: ['ctrl'], code: 'Slash' })
  })

  it('rejects sequences that cannot be registered globally', () => {
    expect(() => parseCombo('')).toThrow('Invalid key combination: ""')
    expect(() => parseCombo('V')).toThrow('needs at least one modifier')
    expect(() => parseCombo('Ctrl+Shift')).toThrow('has no main key')
    expect(() => parseCombo('Hyper+V')).toThrow('Unknown modifier "Hyper"')
    expect(() => parseCombo('Ctrl+Control+V')).toThrow('Duplicate modifier "Control"')
    expect(() => parseCombo('Ctrl+constructor')).toThrow('Unknown key: "constructor"')
  })
})

describe('resolveKeyCode', () => {
  it('resolves letters, digits and function keys', () => {
    expect(resolveKeyCode('a')).toBe('KeyA')
    expect(resolveKeyCode('7')).toBe('Digit7')
    expect(resolveKeyCode('f5')).toBe('F5')
    expect(resolveKeyCode('ArrowUp')).toBe('ArrowUp')
  })
})

describe('formatCombo', () => {
  it('renders a readable label', () => {
    expect(formatCombo({ modifiers: ['ctrl', 'shift'], code: 'KeyV' })).toBe('Ctrl+Shift+V')
    expect(formatCombo({ modifiers: ['meta'], code: 'Digit1' })).toBe('Meta+1')
    expect(formatCombo({ modifiers: ['alt'], code: 'Space' })).toBe('Alt+Space')
  })
})

describe('combosEqual', () => {
  it('ignores modifier order', () => {
    expect(combosEqual(
      { modifiers: ['shift', 'ctrl'], code: 'KeyV' },
      { modifiers: ['ctrl', 'shift'], code: 'KeyV' }
    )).toBe(true)
    expect(combosEqual(
      { modifiers: ['ctrl'], code: 'KeyV' },
      { modifiers: ['ctrl', 'shift'], code: 'KeyV' }
    )).toBe(false)
  })
})

describe('defaultPasteCombo', () => {
  it('uses Cmd on macOS and Ctrl elsewhere', () => {
    expect(defaultPasteCombo('darwin')).toEqual({ modifiers: ['meta'], code: 'KeyV' })
    expect(defaultPasteCombo('linux')).toEqual({ modifiers: ['ctrl'], code: 'KeyV' })
    expect(defaultPasteCombo('win32')).toEqual({ modifiers: ['ctrl'], code: 'KeyV' })
  })
})
