// Permission mode cycling and the policy deciding which tool calls
// stop for a confirmation dialog.

import path from 'node:path';
import type { PermissionMode, ToolCallSpec } from './scenario.js';

export type { PermissionMode };

export type PermissionKind = 'bash' | 'edit' | 'write';

export type PermissionDecision = 'yes' | 'yes-session' | 'no';

/**
 * A tool call waiting on the user
 */
export interface PermissionRequest {
  kind: PermissionKind;
  tool: string;
  /** Command for bash, file path for edit and write */
  target: string;
  call: ToolCallSpec;
  /** Highlighted option, 0-based */
  selected: number;
}

export const PERMISSION_OPTION_COUNT = 3;

/**
 * Next mode in the shift+tab cycle. Bypass is only reachable in sessions
 * started with the unsafe flag.
 */
export function nextPermissionMode(mode: PermissionMode, allowBypass: boolean): PermissionMode {
  switch (mode) {
    case 'default':
      return 'acceptEdits';
    case 'acceptEdits':
      return 'plan';
    case 'plan':
      return allowBypass ? 'bypassPermissions' : 'default';
    case 'bypassPermissions':
      return 'default';
  }
}

/** Status bar label for a mode, null for default */
export function permissionStatus(mode: PermissionMode): { icon: string; label: string } | null {
  switch (mode) {
    case 'default':
      return null;
    case 'acceptEdits':
      return { icon: '⏵⏵', label: 'accept edits' };
    case 'plan':
      return { icon: '⏸', label: 'plan mode' };
    case 'bypassPermissions':
      return { icon: '⏵⏵', label: 'bypass permissions' };
  }
}

function stringInput(call: ToolCallSpec, key: string): string {
  const value = call.input[key];
  return typeof value === 'string' ? value : '';
}

/** Which dialog a tool needs, if it is one that can ask */
export function permissionKindFor(tool: string): PermissionKind | null {
  switch (tool) {
    case 'Bash':
      return 'bash';
    case 'Edit':
      return 'edit';
    case 'Write':
      return 'write';
    default:
      return null;
  }
}

/**
 * Build the dialog request for a tool call, or null when the mode lets it
 * through. Bypass never asks; accept-edits asks only for shell commands.
 */
export function permissionRequestFor(
  call: ToolCallSpec,
  mode: PermissionMode,
  grants: ReadonlySet<PermissionKind>,
): PermissionRequest | null {
  const kind = permissionKindFor(call.tool);
  if (kind === null || grants.has(kind)) return null;
  if (mode === 'bypassPermissions') return null;
  if (mode === 'acceptEdits' && kind !== 'bash') return null;

  const target = kind === 'bash' ? stringInput(call, 'command') : stringInput(call, 'file_path');
  return { kind, tool: call.tool, target, call, selected: 0 };
}

// ============================================================================
// Dialog text
// ============================================================================

export function permissionTitle(request: PermissionRequest): string {
  switch (request.kind) {
    case 'bash':
      return 'Bash command';
    case 'edit':
      return `Edit file ${request.target}`;
    case 'write':
      return `Create file ${request.target}`;
  }
}

export function permissionQuestion(request: PermissionRequest): string {
  const file = path.basename(request.target);
  switch (request.kind) {
    case 'bash':
      return 'Do you want to proceed?';
    case 'edit':
      return `Do you want to make this edit to ${file}?`;
    case 'write':
      return `Do you want to create ${file}?`;
  }
}

export function permissionOptions(request: PermissionRequest): [string, string, string] {
  const always =
    request.kind === 'bash'
      ? "Yes, and don't ask again for Bash commands this session"
      : 'Yes, allow all edits during this session (shift+tab)';
  return ['Yes', always, 'No'];
}

/** Decision for the option at `index` */
export function decisionAt(index: number): PermissionDecision {
  switch (index) {
    case 0:
      return 'yes';
    case 1:
      return 'yes-session';
    default:
      return 'no';
  }
}
