/**
 * Shared constants for the TUI module
 */

// ============================================================================
// Glyphs
// ============================================================================

export const PROMPT_GLYPH = '❯';
export const SHELL_GLYPH = '!';
export const ASSISTANT_GLYPH = '⏺';
export const RESULT_GLYPH = '⎿';
export const SEPARATOR_CHAR = '─';

export const HEADER_LOGO = [' ▐▛███▜▌', '▝▜█████▛▘', '  ▘▘ ▝▝  '] as const;

export const STASH_INDICATOR = '  › Stashed (auto-restores after submit)';
export const CLEAR_NOTICE = '(no content)';
export const INTERRUPTED_NOTICE = 'Interrupted';

// ============================================================================
// Status bar
// ============================================================================

export const HINT_TEXT = {
  'ctrl-c': '  Press Ctrl-C again to exit',
  'ctrl-d': '  Press Ctrl-D again to exit',
  escape: '  Esc to clear again',
} as const;

export const SHORTCUTS_HINT = '  ? for shortcuts';
export const SHELL_MODE_HINT = '  ! for bash mode';

// ============================================================================
// Shortcuts panel
// ============================================================================

export const SHORTCUTS_LEFT = ['! for bash mode', '/ for commands', '@ for file paths', '& for background'];
export const SHORTCUTS_CENTER = [
  'double tap esc to clear input',
  'shift + tab to auto-accept edits',
  'ctrl + o for verbose output',
  'ctrl + t to show todos',
  'backslash (\\) + return (⏎) for',
  'newline',
];
export const SHORTCUTS_RIGHT = [
  'ctrl + _ to undo',
  'ctrl + z to suspend',
  'cmd + v to paste images',
  'meta + p to switch model',
  'ctrl + s to stash prompt',
];
export const SHORTCUTS_LEFT_WIDTH = 24;
export const SHORTCUTS_CENTER_WIDTH = 35;

// ============================================================================
// Spinner
// ============================================================================

const SPINNER_BASE = ['·', '✢', '*', '✶', '✻', '✽'];

/** Forward then back, without repeating the end frames */
export const SPINNER_FRAMES = [...SPINNER_BASE, ...SPINNER_BASE.slice(1, -1).reverse()];
export const SPINNER_FRAME_MS = 120;
export const SPINNER_VERBS = [
  'Thinking',
  'Computing',
  'Pondering',
  'Processing',
  'Contemplating',
  'Cogitating',
  'Deliberating',
  'Musing',
];

// ============================================================================
// Colors
// ============================================================================

export type ColorName = 'accent' | 'muted' | 'shell' | 'error' | 'success' | 'warning' | 'permission';

export const COLORS: Record<ColorName, readonly [number, number, number]> = {
  accent: [215, 119, 87],
  muted: [136, 136, 136],
  shell: [253, 93, 177],
  error: [255, 107, 128],
  success: [78, 186, 101],
  warning: [255, 193, 7],
  permission: [177, 185, 249],
};

// ============================================================================
// ANSI Escape Codes
// ============================================================================

export const RESET = '\x1b[0m';
export const BOLD = '\x1b[1m';
export const DIM = '\x1b[2m';
export const INVERSE = '\x1b[7m';

/** 24-bit foreground color escape */
export function fgRgb([r, g, b]: readonly [number, number, number]): string {
  return `\x1b[38;2;${r};${g};${b}m`;
}
