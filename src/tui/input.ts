/**
 * Input and mode state machine
 *
 * `handleKey` is a pure function from (state, key) to the next state plus the
 * commands the session must carry out. Rows are checked in priority order and
 * the first that applies wins: suspend, permission cycling, then whatever the
 * current mode does with the key.
 */

import { MODEL_CHOICES } from '../models.js';
import { decisionAt, PERMISSION_OPTION_COUNT, type PermissionDecision } from '../permission.js';
import type { Command, EphemeralHint, HintKind, InputState, KeyEvent, Mode } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface MachineState {
  input: InputState;
  mode: Mode;
  hint: EphemeralHint | null;
}

export interface KeyContext {
  now: number;
  exitHintMs: number;
  /** Index of the active model in MODEL_CHOICES */
  modelIndex: number;
}

export interface Transition {
  state: MachineState;
  commands: Command[];
}

/** Marker stored in history in front of shell commands */
export const SHELL_HISTORY_PREFIX = '\\!';

// ============================================================================
// State construction
// ============================================================================

/**
 * Creates an empty input state
 */
export function createInputState(history: string[] = []): InputState {
  return {
    buffer: '',
    cursor: 0,
    history: [...history],
    historyIndex: null,
    stash: null,
    undoStack: [],
  };
}

export function createMachineState(): MachineState {
  return { input: createInputState(), mode: { kind: 'normal' }, hint: null };
}

function cloneInput(input: InputState): InputState {
  return {
    ...input,
    history: [...input.history],
    undoStack: [...input.undoStack],
  };
}

/** Hint still inside its display window, or null */
export function activeHint(hint: EphemeralHint | null, now: number, exitHintMs: number): EphemeralHint | null {
  if (!hint) return null;
  return now - hint.shownAt < exitHintMs ? hint : null;
}

// ============================================================================
// Buffer editing
// ============================================================================

function chars(text: string): string[] {
  return Array.from(text);
}

function setBuffer(input: InputState, buffer: string, cursor: number): void {
  input.buffer = buffer;
  input.cursor = cursor;
  input.historyIndex = null;
}

function snapshot(input: InputState): void {
  input.undoStack.push({ buffer: input.buffer, cursor: input.cursor });
}

function insertText(input: InputState, text: string): void {
  if (text === ' ' || input.buffer === '') {
    snapshot(input);
  }
  const cs = chars(input.buffer);
  const inserted = chars(text);
  cs.splice(input.cursor, 0, ...inserted);
  setBuffer(input, cs.join(''), input.cursor + inserted.length);
}

function deleteBefore(input: InputState): void {
  if (input.cursor === 0) return;
  const cs = chars(input.buffer);
  cs.splice(input.cursor - 1, 1);
  setBuffer(input, cs.join(''), input.cursor - 1);
}

function deleteAt(input: InputState): void {
  const cs = chars(input.buffer);
  if (input.cursor >= cs.length) return;
  cs.splice(input.cursor, 1);
  setBuffer(input, cs.join(''), input.cursor);
}

function clearBuffer(input: InputState): void {
  if (input.buffer !== '') {
    snapshot(input);
  }
  setBuffer(input, '', 0);
}

function killBefore(input: InputState): void {
  if (input.cursor === 0) return;
  snapshot(input);
  setBuffer(input, chars(input.buffer).slice(input.cursor).join(''), 0);
}

function killAfter(input: InputState): void {
  const cs = chars(input.buffer);
  if (input.cursor >= cs.length) return;
  snapshot(input);
  setBuffer(input, cs.slice(0, input.cursor).join(''), input.cursor);
}

function deleteWord(input: InputState): void {
  if (input.cursor === 0) return;
  const cs = chars(input.buffer);
  let start = input.cursor;
  while (start > 0 && /\s/.test(cs[start - 1])) start--;
  while (start > 0 && !/\s/.test(cs[start - 1])) start--;
  snapshot(input);
  cs.splice(start, input.cursor - start);
  setBuffer(input, cs.join(''), start);
}

function undo(input: InputState): void {
  const previous = input.undoStack.pop();
  if (!previous) return;
  setBuffer(input, previous.buffer, previous.cursor);
}

function moveCursor(input: InputState, to: number): void {
  input.cursor = Math.max(0, Math.min(to, chars(input.buffer).length));
}

// ============================================================================
// History and stash
// ============================================================================

function historyText(buffer: string, mode: Mode): string {
  return mode.kind === 'shell' ? SHELL_HISTORY_PREFIX + buffer : buffer;
}

function loadHistoryEntry(input: InputState, index: number): Mode {
  const entry = input.history[index];
  if (entry === undefined) {
    throw new Error(`History index ${index} out of range (${input.history.length} entries)`);
  }
  const isShell = entry.startsWith(SHELL_HISTORY_PREFIX);
  const buffer = isShell ? entry.slice(SHELL_HISTORY_PREFIX.length) : entry;
  input.buffer = buffer;
  input.cursor = chars(buffer).length;
  input.historyIndex = index;
  return isShell ? { kind: 'shell' } : { kind: 'normal' };
}

function mirrorsHistory(input: InputState, mode: Mode): boolean {
  if (input.historyIndex === null) return input.buffer === '';
  return input.history[input.historyIndex] === historyText(input.buffer, mode);
}

function historyUp(input: InputState, mode: Mode): Mode {
  if (input.history.length === 0 || !mirrorsHistory(input, mode)) return mode;
  const index = input.historyIndex === null ? input.history.length - 1 : Math.max(0, input.historyIndex - 1);
  return loadHistoryEntry(input, index);
}

function historyDown(input: InputState, mode: Mode): Mode {
  if (input.historyIndex === null || !mirrorsHistory(input, mode)) return mode;
  if (input.historyIndex < input.history.length - 1) {
    return loadHistoryEntry(input, input.historyIndex + 1);
  }
  setBuffer(input, '', 0);
  return { kind: 'normal' };
}

function toggleStash(input: InputState): void {
  if (input.stash !== null) {
    const restored = input.stash;
    input.stash = input.buffer === '' ? null : input.buffer;
    setBuffer(input, restored, chars(restored).length);
    return;
  }
  if (input.buffer === '') return;
  input.stash = input.buffer;
  setBuffer(input, '', 0);
}

function commitToHistory(input: InputState, entry: string): void {
  input.history.push(entry);
  input.historyIndex = null;
  input.undoStack = [];
  input.buffer = '';
  input.cursor = 0;
}

// ============================================================================
// Key dispatch
// ============================================================================

function isPlain(event: KeyEvent): boolean {
  return !event.ctrl && !event.meta;
}

function isChar(event: KeyEvent, char: string): boolean {
  return event.kind === 'char' && event.char === char;
}

function isCtrl(event: KeyEvent, char: string): boolean {
  return event.kind === 'char' && event.ctrl && event.char.toLowerCase() === char;
}

/** Result builder: the key was recognised, hint cleared unless re-armed */
function done(input: InputState, mode: Mode, commands: Command[] = [], hint: EphemeralHint | null = null): Transition {
  return { state: { input, mode, hint }, commands };
}

function arm(kind: HintKind, now: number): EphemeralHint {
  return { kind, shownAt: now };
}

/**
 * Apply one key press. Unrecognised keys return the state untouched.
 */
export function handleKey(state: MachineState, event: KeyEvent, ctx: KeyContext): Transition {
  const { mode } = state;

  if (mode.kind === 'suspended') {
    return { state, commands: [] };
  }

  if (isCtrl(event, 'z')) {
    return done(state.input, { kind: 'suspended', previous: mode }, [{ type: 'suspend' }]);
  }

  if (event.kind === 'named' && event.name === 'Tab' && event.shift) {
    return done(state.input, mode, [{ type: 'cycle-permission' }]);
  }

  switch (mode.kind) {
    case 'shortcuts':
      return handleShortcuts(state, event, ctx);
    case 'permission':
      return handlePermission(state, mode, event);
    case 'model-picker':
      return handleModelPicker(state, mode, event);
    case 'normal':
    case 'shell':
    case 'thinking':
      return handleEditing(state, mode, event, ctx);
  }
}

function handleShortcuts(state: MachineState, event: KeyEvent, ctx: KeyContext): Transition {
  const close: Command = { type: 'toggle-panel', open: false };
  if ((event.kind === 'named' && event.name === 'Escape') || (isChar(event, '?') && isPlain(event))) {
    return done(state.input, { kind: 'normal' }, [close]);
  }

  const next = handleEditing({ ...state, mode: { kind: 'normal' } }, { kind: 'normal' }, event, ctx);
  return { state: next.state, commands: [close, ...next.commands] };
}

function resolvePermission(state: MachineState, decision: PermissionDecision): Transition {
  return done(state.input, { kind: 'thinking' }, [{ type: 'resolve-permission', decision }]);
}

function handlePermission(
  state: MachineState,
  mode: Extract<Mode, { kind: 'permission' }>,
  event: KeyEvent,
): Transition {
  const { request } = mode;

  if (isCtrl(event, 'c')) {
    return done(state.input, { kind: 'normal' }, [{ type: 'interrupt' }]);
  }

  if (event.kind === 'named') {
    switch (event.name) {
      case 'Up':
      case 'Down': {
        const step = event.name === 'Up' ? PERMISSION_OPTION_COUNT - 1 : 1;
        const selected = (request.selected + step) % PERMISSION_OPTION_COUNT;
        return done(state.input, { kind: 'permission', request: { ...request, selected } });
      }
      case 'Enter':
        return resolvePermission(state, decisionAt(request.selected));
      case 'Escape':
        return resolvePermission(state, 'no');
      default:
        return { state, commands: [] };
    }
  }

  if (!isPlain(event)) return { state, commands: [] };

  switch (event.char.toLowerCase()) {
    case '1':
    case 'y':
      return resolvePermission(state, 'yes');
    case '2':
      return resolvePermission(state, 'yes-session');
    case '3':
    case 'n':
      return resolvePermission(state, 'no');
    default:
      return { state, commands: [] };
  }
}

function handleModelPicker(
  state: MachineState,
  mode: Extract<Mode, { kind: 'model-picker' }>,
  event: KeyEvent,
): Transition {
  const count = MODEL_CHOICES.length;
  const select = (index: number): Transition =>
    done(state.input, { kind: 'normal' }, [{ type: 'select-model', model: MODEL_CHOICES[index].id }]);

  if (isCtrl(event, 'c')) {
    return done(state.input, { kind: 'normal' });
  }

  if (event.kind === 'named') {
    switch (event.name) {
      case 'Up':
        return done(state.input, { kind: 'model-picker', selected: (mode.selected + count - 1) % count });
      case 'Down':
        return done(state.input, { kind: 'model-picker', selected: (mode.selected + 1) % count });
      case 'Enter':
        return select(mode.selected);
      case 'Escape':
        return done(state.input, { kind: 'normal' });
      default:
        return { state, commands: [] };
    }
  }

  if (isPlain(event) && /^[1-9]$/.test(event.char)) {
    const index = Number(event.char) - 1;
    if (index < count) return select(index);
  }
  return { state, commands: [] };
}

function handleEditing(
  state: MachineState,
  mode: Extract<Mode, { kind: 'normal' | 'shell' | 'thinking' }>,
  event: KeyEvent,
  ctx: KeyContext,
): Transition {
  const input = cloneInput(state.input);
  const hint = activeHint(state.hint, ctx.now, ctx.exitHintMs);

  if (event.kind === 'named') {
    switch (event.name) {
      case 'Escape':
        if (mode.kind === 'thinking') {
          return done(input, { kind: 'normal' }, [{ type: 'interrupt' }]);
        }
        if (mode.kind === 'shell') {
          clearBuffer(input);
          return done(input, { kind: 'normal' });
        }
        if (mode.kind === 'normal' && input.buffer !== '') {
          if (hint?.kind === 'escape') {
            clearBuffer(input);
            return done(input, mode);
          }
          return done(input, mode, [], arm('escape', ctx.now));
        }
        return done(input, mode);

      case 'Enter': {
        if (mode.kind === 'thinking' || input.buffer === '') {
          return done(input, mode);
        }
        const text = input.buffer;
        if (mode.kind === 'shell') {
          commitToHistory(input, SHELL_HISTORY_PREFIX + text);
          return done(input, { kind: 'normal' }, [{ type: 'execute-shell', command: text }]);
        }
        commitToHistory(input, text);
        return done(input, { kind: 'thinking' }, [{ type: 'submit', text }]);
      }

      case 'Backspace':
        if (mode.kind === 'shell' && input.buffer === '') {
          return done(input, { kind: 'normal' });
        }
        deleteBefore(input);
        return done(input, mode);

      case 'Delete':
        deleteAt(input);
        return done(input, mode);

      case 'Left':
        moveCursor(input, input.cursor - 1);
        return done(input, mode);

      case 'Right':
        moveCursor(input, input.cursor + 1);
        return done(input, mode);

      case 'Home':
        moveCursor(input, 0);
        return done(input, mode);

      case 'End':
        moveCursor(input, chars(input.buffer).length);
        return done(input, mode);

      case 'Up':
        if (mode.kind === 'thinking') return done(input, mode);
        return done(input, historyUp(input, mode));

      case 'Down':
        if (mode.kind === 'thinking') return done(input, mode);
        return done(input, historyDown(input, mode));

      default:
        return { state, commands: [] };
    }
  }

  if (event.ctrl) {
    switch (event.char.toLowerCase()) {
      case 'c':
        if (mode.kind === 'thinking') {
          return done(input, { kind: 'normal' }, [{ type: 'interrupt' }]);
        }
        if (hint?.kind === 'ctrl-c') {
          return done(input, mode, [{ type: 'exit', reason: 'interrupted' }]);
        }
        clearBuffer(input);
        return done(input, mode, [], arm('ctrl-c', ctx.now));

      case 'd':
        if (mode.kind === 'thinking' || input.buffer !== '') {
          return done(input, mode);
        }
        if (hint?.kind === 'ctrl-d') {
          return done(input, mode, [{ type: 'exit', reason: 'user-quit' }]);
        }
        return done(input, mode, [], arm('ctrl-d', ctx.now));

      case 'a':
        moveCursor(input, 0);
        return done(input, mode);

      case 'e':
        moveCursor(input, chars(input.buffer).length);
        return done(input, mode);

      case 'u':
        killBefore(input);
        return done(input, mode);

      case 'k':
        killAfter(input);
        return done(input, mode);

      case 'w':
        deleteWord(input);
        return done(input, mode);

      case '_':
        undo(input);
        return done(input, mode);

      case 's':
        toggleStash(input);
        return done(input, mode);

      default:
        return { state, commands: [] };
    }
  }

  if (event.meta) {
    if (event.char.toLowerCase() === 'p' && mode.kind === 'normal') {
      return done(input, { kind: 'model-picker', selected: ctx.modelIndex });
    }
    return { state, commands: [] };
  }

  if (mode.kind === 'normal' && input.buffer === '') {
    if (event.char === '!') {
      return done(input, { kind: 'shell' });
    }
    if (event.char === '?') {
      return done(input, { kind: 'shortcuts' }, [{ type: 'toggle-panel', open: true }]);
    }
  }

  insertText(input, event.char);
  return done(input, mode);
}
