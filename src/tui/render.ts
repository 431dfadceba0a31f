/**
 * TUI renderer
 *
 * Pure projection of session state onto a CellGrid. The layout flows from the
 * top: header, transcript, then the input block (or whichever dialog replaces
 * it). When the content is taller than the screen the earliest lines scroll
 * off the top, so the input block always stays visible.
 */

import type { ConversationEntry } from '../conversation.js';
import { MODEL_CHOICES } from '../models.js';
import {
  type PermissionMode,
  type PermissionRequest,
  permissionOptions,
  permissionQuestion,
  permissionStatus,
  permissionTitle,
} from '../permission.js';
import {
  ASSISTANT_GLYPH,
  type ColorName,
  HEADER_LOGO,
  HINT_TEXT,
  PROMPT_GLYPH,
  RESULT_GLYPH,
  SEPARATOR_CHAR,
  SHELL_GLYPH,
  SHELL_MODE_HINT,
  SHORTCUTS_CENTER,
  SHORTCUTS_CENTER_WIDTH,
  SHORTCUTS_HINT,
  SHORTCUTS_LEFT,
  SHORTCUTS_LEFT_WIDTH,
  SHORTCUTS_RIGHT,
  SPINNER_FRAME_MS,
  SPINNER_FRAMES,
  SPINNER_VERBS,
  STASH_INDICATOR,
} from './constants.js';
import { CellGrid, type CellStyle, PLAIN, type StyleRun, style } from './grid.js';
import { SHELL_HISTORY_PREFIX } from './input.js';
import type { EphemeralHint, InputState, Mode } from './types.js';
import { wrapText } from './wrap.js';

// ============================================================================
// Types
// ============================================================================

export interface Identity {
  productName: string;
  version: string;
  modelId: string;
  modelDisplayName: string;
  provider: string;
  /** Working directory as shown, home already abbreviated to ~ */
  workingDirectory: string;
  placeholder: string;
}

export interface ThinkingState {
  startedAt: number;
  verbIndex: number;
}

export interface RenderView {
  identity: Identity;
  entries: readonly ConversationEntry[];
  /** Response text received so far for the in-flight submission */
  streaming: string;
  input: InputState;
  mode: Mode;
  permissionMode: PermissionMode;
  /** Only a hint still inside its window */
  hint: EphemeralHint | null;
  thinking: ThinkingState | null;
  now: number;
}

export interface ScreenSize {
  width: number;
  height: number;
}

export interface Line {
  runs: StyleRun[];
  /** Column drawn inverse as the cursor */
  cursorCol?: number;
}

// ============================================================================
// Styles
// ============================================================================

const MUTED = style({ fg: 'muted' });
const BOLD = style({ bold: true });
const ACCENT = style({ fg: 'accent' });

function colored(fg: ColorName, extra: Partial<CellStyle> = {}): CellStyle {
  return style({ fg, ...extra });
}

function line(...runs: StyleRun[]): Line {
  return { runs };
}

function text(value: string, runStyle: CellStyle = PLAIN): StyleRun {
  return { text: value, style: runStyle };
}

const BLANK: Line = line();

// ============================================================================
// Header
// ============================================================================

function renderHeader(identity: Identity): Line[] {
  const logo = colored('accent');
  return [
    BLANK,
    line(
      text(HEADER_LOGO[0], logo),
      text('   '),
      text(identity.productName, BOLD),
      text(` v${identity.version}`, MUTED),
    ),
    line(text(HEADER_LOGO[1], logo), text('  '), text(`${identity.modelDisplayName} · ${identity.provider}`, MUTED)),
    line(text(HEADER_LOGO[2], logo), text('  '), text(identity.workingDirectory, MUTED)),
    BLANK,
  ];
}

// ============================================================================
// Transcript
// ============================================================================

/** Wrap text behind a prefix; continuation lines are indented to match */
function prefixed(prefix: StyleRun, body: string, bodyStyle: CellStyle, width: number): Line[] {
  const indent = ' '.repeat(Array.from(prefix.text).length);
  return wrapText(body, width - indent.length).map((row, i) =>
    line(i === 0 ? prefix : text(indent), text(row, bodyStyle)),
  );
}

function resultLines(result: string, width: number): Line[] {
  const head = `  ${RESULT_GLYPH}  `;
  return prefixed(text(head, MUTED), result, MUTED, width);
}

function renderEntry(entry: ConversationEntry, width: number): Line[] {
  switch (entry.kind) {
    case 'prompt':
      return prefixed(text(`${PROMPT_GLYPH} `, MUTED), entry.text, PLAIN, width);
    case 'shell':
      return prefixed(text(`${PROMPT_GLYPH} `, MUTED), SHELL_HISTORY_PREFIX + entry.text, colored('shell'), width);
    case 'response':
      return prefixed(text(`${ASSISTANT_GLYPH} `), entry.text, PLAIN, width);
    case 'error':
      return prefixed(text(`${ASSISTANT_GLYPH} `, colored('error')), entry.text, colored('error'), width);
    case 'tool-call': {
      const lines = prefixed(text(`${ASSISTANT_GLYPH} `, colored('success')), entry.text, BOLD, width);
      return entry.result === null ? lines : [...lines, ...resultLines(entry.result, width)];
    }
    case 'notice':
      return resultLines(entry.text, width);
  }
}

function spinnerLine(thinking: ThinkingState, now: number): Line {
  const elapsed = Math.max(0, now - thinking.startedAt);
  const frame = SPINNER_FRAMES[Math.floor(elapsed / SPINNER_FRAME_MS) % SPINNER_FRAMES.length];
  const verb = SPINNER_VERBS[thinking.verbIndex % SPINNER_VERBS.length];
  return line(text(`${frame} ${verb}…`, ACCENT), text(' (ctrl+c to interrupt)', MUTED));
}

function renderTranscript(view: RenderView, width: number): Line[] {
  const lines: Line[] = [];
  const gap = (): void => {
    if (lines.length > 0) lines.push(BLANK);
  };

  for (const entry of view.entries) {
    if (entry.kind !== 'notice') gap();
    lines.push(...renderEntry(entry, width));
  }

  if (view.streaming !== '') {
    gap();
    lines.push(...prefixed(text(`${ASSISTANT_GLYPH} `), view.streaming, PLAIN, width));
  } else if (view.thinking && view.mode.kind === 'thinking') {
    gap();
    lines.push(spinnerLine(view.thinking, view.now));
  }

  if (lines.length > 0) lines.push(BLANK);
  return lines;
}

// ============================================================================
// Input block
// ============================================================================

function separator(width: number, fg: ColorName = 'muted'): Line {
  return line(text(SEPARATOR_CHAR.repeat(width), colored(fg)));
}

function showsPlaceholder(view: RenderView): boolean {
  return (
    view.mode.kind === 'normal' && view.entries.length === 0 && view.streaming === '' && view.input.buffer === ''
  );
}

function inputLine(view: RenderView, width: number): Line {
  const shell = view.mode.kind === 'shell';
  const prefix = shell ? text(`${SHELL_GLYPH} `, colored('shell')) : text(`${PROMPT_GLYPH} `);

  if (showsPlaceholder(view)) {
    return { runs: [prefix, text(view.identity.placeholder, style({ dim: true }))], cursorCol: 2 };
  }

  const cs = Array.from(view.input.buffer);
  const available = Math.max(1, width - 2);
  const start = Math.max(0, view.input.cursor - (available - 1));
  const visible = cs.slice(start, start + available).join('');
  return {
    runs: [prefix, text(visible, shell ? colored('shell') : PLAIN)],
    cursorCol: 2 + view.input.cursor - start,
  };
}

function statusLine(view: RenderView): Line {
  if (view.hint) {
    return line(text(HINT_TEXT[view.hint.kind], MUTED));
  }
  if (view.mode.kind === 'shell') {
    return line(text(SHELL_MODE_HINT, colored('shell')));
  }
  const status = permissionStatus(view.permissionMode);
  if (!status) {
    return line(text(SHORTCUTS_HINT, MUTED));
  }
  const fg: ColorName =
    view.permissionMode === 'plan' ? 'success' : view.permissionMode === 'acceptEdits' ? 'permission' : 'error';
  return line(text(`  ${status.icon} ${status.label} on`, colored(fg)), text(' (shift+tab to cycle)', MUTED));
}

function shortcutsPanel(): Line[] {
  const rows = Math.max(SHORTCUTS_LEFT.length, SHORTCUTS_CENTER.length, SHORTCUTS_RIGHT.length);
  return Array.from({ length: rows }, (_, i) => {
    const left = (SHORTCUTS_LEFT[i] ?? '').padEnd(SHORTCUTS_LEFT_WIDTH);
    const center = (SHORTCUTS_CENTER[i] ?? '').padEnd(SHORTCUTS_CENTER_WIDTH);
    const right = SHORTCUTS_RIGHT[i] ?? '';
    return line(text(`  ${left}${center}${right}`.trimEnd(), MUTED));
  });
}

function renderInputBlock(view: RenderView, width: number): Line[] {
  const lines: Line[] = [];
  if (view.input.stash !== null) {
    lines.push(line(text(STASH_INDICATOR, MUTED)));
  }
  lines.push(separator(width), inputLine(view, width), separator(width));
  if (view.mode.kind === 'shortcuts') {
    lines.push(...shortcutsPanel());
  } else {
    lines.push(statusLine(view));
  }
  return lines;
}

// ============================================================================
// Dialogs
// ============================================================================

function renderPermissionDialog(request: PermissionRequest, width: number): Line[] {
  const accent = colored('permission');
  const lines: Line[] = [
    separator(width, 'permission'),
    line(text(` ${permissionTitle(request)}`, style({ fg: 'permission', bold: true }))),
  ];

  if (request.kind === 'bash') {
    lines.push(BLANK, line(text(`   ${request.target}`)));
  }

  lines.push(BLANK, line(text(` ${permissionQuestion(request)}`)));
  permissionOptions(request).forEach((option, i) => {
    const selected = i === request.selected;
    lines.push(
      line(text(selected ? ` ${PROMPT_GLYPH} ` : '   ', accent), text(`${i + 1}. ${option}`, selected ? accent : PLAIN)),
    );
  });
  lines.push(BLANK, line(text(' Esc to cancel', MUTED)));
  return lines;
}

function renderModelPicker(selected: number, currentModel: string, width: number): Line[] {
  const lines: Line[] = [
    separator(width, 'permission'),
    line(text(' Select model', BOLD)),
    line(text(' Switch between models for this session.', MUTED)),
    BLANK,
  ];

  MODEL_CHOICES.forEach((choice, i) => {
    const isSelected = i === selected;
    const label = choice.id === currentModel ? `${choice.label} ✔` : choice.label;
    const rowStyle = isSelected ? colored('permission') : PLAIN;
    lines.push(
      line(
        text(` ${isSelected ? PROMPT_GLYPH : ' '} ${i + 1}. ${label.padEnd(25)}`, rowStyle),
        text(`${choice.displayName} · ${choice.description}`, MUTED),
      ),
    );
  });

  lines.push(BLANK, line(text(' Enter to confirm · Esc to exit', MUTED)));
  return lines;
}

// ============================================================================
// Frame
// ============================================================================

/**
 * Lay the view out as a list of lines, before clipping to the screen height
 */
export function layoutLines(view: RenderView, width: number): Line[] {
  const top = [...renderHeader(view.identity), ...renderTranscript(view, width)];

  let bottom: Line[];
  switch (view.mode.kind) {
    case 'permission':
      bottom = renderPermissionDialog(view.mode.request, width);
      break;
    case 'model-picker':
      bottom = renderModelPicker(view.mode.selected, view.identity.modelId, width);
      break;
    case 'suspended':
      bottom = [];
      break;
    default:
      bottom = renderInputBlock(view, width);
  }

  return [...top, ...bottom];
}

/**
 * Render the view into a grid of the given size
 */
export function renderFrame(view: RenderView, size: ScreenSize): CellGrid {
  const grid = new CellGrid(size.width, size.height);
  const lines = layoutLines(view, size.width);
  const visible = lines.slice(Math.max(0, lines.length - size.height));

  visible.forEach((row, y) => {
    let x = 0;
    for (const run of row.runs) {
      x = grid.put(x, y, run.text, run.style);
    }
    if (row.cursorCol !== undefined && row.cursorCol < size.width) {
      const cell = grid.cellAt(row.cursorCol, y);
      grid.restyle(row.cursorCol, y, { ...cell.style, inverse: true });
    }
  });

  return grid;
}
