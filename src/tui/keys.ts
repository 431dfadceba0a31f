/**
 * Key normalisation
 *
 * Two sources feed the state machine: terminal-kit key names ("CTRL_C",
 * "SHIFT_TAB", "a") in the interactive presenter, and the compact notation of
 * headless scripts ("C-c", "S-Tab", "Enter", "a").
 */

import type { KeyEvent, Modifiers, NamedKey } from './types.js';

const NAMED_KEYS: readonly NamedKey[] = [
  'Enter',
  'Escape',
  'Tab',
  'Backspace',
  'Delete',
  'Up',
  'Down',
  'Left',
  'Right',
  'Home',
  'End',
];

const NO_MODIFIERS: Modifiers = { ctrl: false, shift: false, meta: false };

export function charKey(char: string, modifiers: Partial<Modifiers> = {}): KeyEvent {
  return { kind: 'char', char, ...NO_MODIFIERS, ...modifiers };
}

export function namedKey(name: NamedKey, modifiers: Partial<Modifiers> = {}): KeyEvent {
  return { kind: 'named', name, ...NO_MODIFIERS, ...modifiers };
}

function isNamedKey(value: string): value is NamedKey {
  return NAMED_KEYS.some((name) => name === value);
}

// ============================================================================
// terminal-kit
// ============================================================================

const TERMKIT_NAMED: Record<string, KeyEvent> = {
  ENTER: namedKey('Enter'),
  KP_ENTER: namedKey('Enter'),
  ESCAPE: namedKey('Escape'),
  TAB: namedKey('Tab'),
  SHIFT_TAB: namedKey('Tab', { shift: true }),
  BACKSPACE: namedKey('Backspace'),
  DELETE: namedKey('Delete'),
  UP: namedKey('Up'),
  DOWN: namedKey('Down'),
  LEFT: namedKey('Left'),
  RIGHT: namedKey('Right'),
  HOME: namedKey('Home'),
  END: namedKey('End'),
  CTRL_UNDERSCORE: charKey('_', { ctrl: true }),
  CTRL_SLASH: charKey('_', { ctrl: true }),
};

/**
 * Translate a terminal-kit key name. Unknown names give null.
 */
export function fromTermKitKey(name: string): KeyEvent | null {
  const named = TERMKIT_NAMED[name];
  if (named) return named;

  const ctrl = /^CTRL_([A-Z])$/.exec(name);
  if (ctrl) return charKey(ctrl[1].toLowerCase(), { ctrl: true });

  const meta = /^(?:ALT|META)_([A-Z])$/.exec(name);
  if (meta) return charKey(meta[1].toLowerCase(), { meta: true });

  // Printable characters arrive as themselves
  if (Array.from(name).length === 1) return charKey(name);

  return null;
}

// ============================================================================
// Script notation
// ============================================================================

/**
 * Parse "C-c", "M-p", "S-Tab", "Enter", "Space" or a single character.
 * Throws on anything else.
 */
export function parseKeySpec(spec: string): KeyEvent {
  const modifiers: Modifiers = { ...NO_MODIFIERS };
  let rest = spec;

  for (;;) {
    const prefix = /^([CSM])-(.+)$/.exec(rest);
    if (!prefix) break;
    if (prefix[1] === 'C') modifiers.ctrl = true;
    if (prefix[1] === 'S') modifiers.shift = true;
    if (prefix[1] === 'M') modifiers.meta = true;
    rest = prefix[2];
  }

  if (rest === 'Space') return charKey(' ', modifiers);
  if (rest === 'Esc') return namedKey('Escape', modifiers);
  if (isNamedKey(rest)) return namedKey(rest, modifiers);
  if (Array.from(rest).length === 1) {
    return charKey(modifiers.ctrl || modifiers.meta ? rest.toLowerCase() : rest, modifiers);
  }
  throw new Error(`Unknown key "${spec}"`);
}

/** One char key per code point of the text */
export function typeText(text: string): KeyEvent[] {
  return Array.from(text).map((char) => charKey(char));
}
