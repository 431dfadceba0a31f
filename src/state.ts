// Global state for one simulated CLI session
// Tracks input, mode, permission state, the transcript and the in-flight response

import type { SessionSettings } from './config.js';
import { ConversationModel } from './conversation.js';
import type { MatchCounts } from './matcher.js';
import { modelChoiceIndex } from './models.js';
import { nextPermissionMode, type PermissionKind, type PermissionMode, type PermissionRequest } from './permission.js';
import { createMachineState, type MachineState } from './tui/input.js';
import type { ThinkingState } from './tui/render.js';
import type { ExitReason } from './tui/types.js';

/**
 * Main session state interface
 */
export interface SessionState {
  machine: MachineState;
  permissionMode: PermissionMode;
  allowBypass: boolean;
  model: string;
  conversation: ConversationModel;
  /** Response text received so far for the in-flight submission */
  streaming: string;
  thinking: ThinkingState | null;
  /** Tool call waiting on the permission dialog */
  pendingPermission: PermissionRequest | null;
  /** Tool kinds the user allowed for the rest of the session */
  sessionGrants: Set<PermissionKind>;
  matchCounts: MatchCounts;
  submissionCount: number;
  exitReason: ExitReason | null;
}

/**
 * Creates the initial session state
 */
export function createInitialState(settings: SessionSettings): SessionState {
  return {
    machine: createMachineState(),
    permissionMode: settings.permissionMode,
    allowBypass: settings.allowBypass,
    model: settings.model,
    conversation: new ConversationModel(),
    streaming: '',
    thinking: null,
    pendingPermission: null,
    sessionGrants: new Set(),
    matchCounts: new Map(),
    submissionCount: 0,
    exitReason: null,
  };
}

/**
 * Advances the permission mode one step around the cycle
 */
export function cyclePermissionMode(state: SessionState): PermissionMode {
  state.permissionMode = nextPermissionMode(state.permissionMode, state.allowBypass);
  return state.permissionMode;
}

/**
 * Remembers a "don't ask again" answer. Allowing one kind of file change
 * allows both edits and new files.
 */
export function grantForSession(state: SessionState, kind: PermissionKind): void {
  if (kind === 'bash') {
    state.sessionGrants.add('bash');
  } else {
    state.sessionGrants.add('edit');
    state.sessionGrants.add('write');
  }
}

/**
 * Puts a stashed draft back into an empty buffer. A buffer with text keeps
 * the stash pending.
 */
export function restoreStash(state: SessionState): boolean {
  const { input } = state.machine;
  if (input.stash === null || input.buffer !== '') return false;
  input.buffer = input.stash;
  input.cursor = Array.from(input.stash).length;
  input.stash = null;
  input.historyIndex = null;
  return true;
}

/** Index of the active model in the picker list */
export function currentModelIndex(state: SessionState): number {
  return modelChoiceIndex(state.model);
}

/** Whether a submission is between Submit and its terminal entry */
export function isResponding(state: SessionState): boolean {
  return state.thinking !== null;
}
