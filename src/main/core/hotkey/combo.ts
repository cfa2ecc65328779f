// src/main/core/hotkey/combo.ts
import type { KeyCombo, Modifier } from '../../types'

const MODIFIER_ALIASES: Record<string, Modifier> = {
  ctrl: 'ctrl',
  control: 'ctrl',
  alt: 'alt',
  option: 'alt',
  opt: 'alt',
  shift: 'shift',
  meta: 'meta',
  cmd: 'meta',
  command: 'meta',
  super: 'meta',
  win: 'meta',
}

const MODIFIER_ORDER: Modifier[] = ['ctrl', 'alt', 'shift', 'meta']

const MODIFIER_LABELS: Record<Modifier, string> = {
  ctrl: 'Ctrl',
  alt: 'Alt',
  shift: 'Shift',
  meta: 'Meta',
}

const NAMED_KEYS: Record<string, string> = {
  space: 'Space',
  enter: 'Enter',
  return: 'Enter',
  tab: 'Tab',
  esc: 'Escape',
  escape: 'Escape',
  backspace: 'Backspace',
  delete: 'Delete',
  insert: 'Insert',
  home: 'Home',
  end: 'End',
  pageup: 'PageUp',
  pagedown: 'PageDown',
  up: 'ArrowUp',
  down: 'ArrowDown',
  left: 'ArrowLeft',
  right: 'ArrowRight',
  '`': 'Backquote',
  '-': 'Minus',
  '=': 'Equal',
  '[': 'BracketLeft',
  ']': 'BracketRight',
  ';': 'Semicolon',
  "'": 'Quote',
  ',': 'Comma',
  '.': 'Period',
  '/': 'Slash',
  '\\': 'Backslash',
}

// Codes accepted verbatim ("KeyV", "Digit1", "F5", "ArrowUp", ...)
const KEY_CODE_PATTERN = /^(Key[A-Z]|Digit[0-9]|F([1-9]|1[0-9]|2[0-4]))$/

function lookup<T>(table: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined
}

function isModifierName(value: string): boolean {
  return lookup(MODIFIER_ALIASES, value.toLowerCase()) !== undefined
}

/**
 * Map a key name to its physical key code
 */
export function resolveKeyCode(key: string): string {
  if (/^[a-z]$/i.test(key)) {
    return `Key${key.toUpperCase()}`
  }
  if (/^[0-9]$/.test(key)) {
    return `Digit${key}`
  }
  if (/^f([1-9]|1[0-9]|2[0-4])$/i.test(key)) {
    return key.toUpperCase()
  }
  if (KEY_CODE_PATTERN.test(key) || Object.values(NAMED_KEYS).includes(key)) {
    return key
  }

  const named = lookup(NAMED_KEYS, key.toLowerCase())
  if (named) {
    return named
  }

  throw new Error(`Unknown key: "${key}"`)
}

/**
 * Parse "Ctrl+Shift+V" style sequences into a layout-independent combo
 */
export function parseCombo(sequence: string): KeyCombo {
  const parts = sequence
    .split(/[+\s]+/)
    .map(part => part.trim())
    .filter(Boolean)

  if (parts.length === 0) {
    throw new Error(`Invalid key combination: "${sequence}"`)
  }

  const key = parts[parts.length - 1]
  if (isModifierName(key)) {
    throw new Error(`Key combination "${sequence}" has no main key`)
  }

  const modifiers = new Set<Modifier>()
  for (const part of parts.slice(0, -1)) {
    const modifier = lookup(MODIFIER_ALIASES, part.toLowerCase())
    if (!modifier) {
      throw new Error(`Unknown modifier "${part}" in "${sequence}"`)
    }
    if (modifiers.has(modifier)) {
      throw new Error(`Duplicate modifier "${part}" in "${sequence}"`)
    }
    modifiers.add(modifier)
  }

  if (modifiers.size === 0) {
    throw new Error(`Global key combination "${sequence}" needs at least one modifier`)
  }

  return {
    modifiers: MODIFIER_ORDER.filter(modifier => modifiers.has(modifier)),
    code: resolveKeyCode(key),
  }
}

export function formatCombo(combo: KeyCombo): string {
  const key = combo.code.replace(/^(Key|Digit)/, '')
  return [...combo.modifiers.map(modifier => MODIFIER_LABELS[modifier]), key].join('+')
}

export function combosEqual(a: KeyCombo, b: KeyCombo): boolean {
  return a.code === b.code
    && a.modifiers.length === b.modifiers.length
    && a.modifiers.every(modifier => b.modifiers.includes(modifier))
}

/**
 * The platform's paste shortcut: Cmd+V on macOS, Ctrl+V elsewhere
 */
export function defaultPasteCombo(platform: NodeJS.Platform = process.platform): KeyCombo {
  return { modifiers: [platform === 'darwin' ? 'meta' : 'ctrl'], code: 'KeyV' }
}
