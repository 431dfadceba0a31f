/**
 * Shared types for the input state machine, renderer and presenters
 */

import type { PermissionDecision, PermissionRequest } from '../permission.js';

// ============================================================================
// Keys
// ============================================================================

export type NamedKey =
  | 'Enter'
  | 'Escape'
  | 'Tab'
  | 'Backspace'
  | 'Delete'
  | 'Up'
  | 'Down'
  | 'Left'
  | 'Right'
  | 'Home'
  | 'End';

export interface Modifiers {
  ctrl: boolean;
  shift: boolean;
  meta: boolean;
}

/**
 * A normalised key press, independent of the terminal it came from
 */
export type KeyEvent = ({ kind: 'char'; char: string } | { kind: 'named'; name: NamedKey }) & Modifiers;

// ============================================================================
// Input state
// ============================================================================

export interface UndoSnapshot {
  buffer: string;
  cursor: number;
}

export interface InputState {
  buffer: string;
  /** Cursor position in code points, 0..length */
  cursor: number;
  /** Submitted entries, oldest first. Shell entries carry the \! marker. */
  history: string[];
  /** Entry being browsed, null when not browsing */
  historyIndex: number | null;
  /** Draft parked with ctrl+s */
  stash: string | null;
  undoStack: UndoSnapshot[];
}

// ============================================================================
// Modes
// ============================================================================

export type Mode =
  | { kind: 'normal' }
  | { kind: 'shell' }
  | { kind: 'thinking' }
  | { kind: 'permission'; request: PermissionRequest }
  | { kind: 'shortcuts' }
  | { kind: 'model-picker'; selected: number }
  | { kind: 'suspended'; previous: Mode };

export type ModeKind = Mode['kind'];

export type HintKind = 'ctrl-c' | 'ctrl-d' | 'escape';

/**
 * Transient status bar message armed by the first of a double press
 */
export interface EphemeralHint {
  kind: HintKind;
  shownAt: number;
}

// ============================================================================
// Commands
// ============================================================================

export type ExitReason = 'interrupted' | 'user-quit';

export type Command =
  | { type: 'submit'; text: string }
  | { type: 'execute-shell'; command: string }
  | { type: 'cycle-permission' }
  | { type: 'toggle-panel'; open: boolean }
  | { type: 'suspend' }
  | { type: 'exit'; reason: ExitReason }
  | { type: 'interrupt' }
  | { type: 'select-model'; model: string }
  | { type: 'resolve-permission'; decision: PermissionDecision };
