/**
 * Terminal-Kit based presenter (minimal redraws)
 *
 * Feeds terminal-kit key events to the Session and paints the frames it
 * renders. Only rows that changed since the last paint are rewritten.
 */

import termKit from 'terminal-kit';
import { SystemClock } from '../clock.js';
import type { SessionSettings } from '../config.js';
import type { DebugLogWriter } from '../logger.js';
import type { Scenario } from '../scenario.js';
import { Session } from '../session.js';
import { BOLD, COLORS, DIM, fgRgb, INVERSE, RESET, SPINNER_FRAME_MS } from './constants.js';
import type { CellGrid, CellStyle } from './grid.js';
import { fromTermKitKey } from './keys.js';
import { cleanupTerminal, enterTerminal, reacquireTerminal, releaseTerminal } from './terminal-cleanup.js';
import type { ExitReason } from './types.js';

const term = termKit.terminal;

// ============================================================================
// Types
// ============================================================================

/**
 * TUI interface - main entry point for the terminal UI
 */
export interface TUI {
  /** Starts the TUI and takes over the terminal */
  start(): void;
  /** Stops the TUI and restores the terminal */
  stop(): void;
  /** Registers a callback for when the session exits */
  onExit(callback: (reason: ExitReason) => void): void;
}

export interface TUIOptions {
  onDebugLog?: DebugLogWriter;
}

// ============================================================================
// Row encoding
// ============================================================================

function styleCodes(style: CellStyle): string {
  let codes = '';
  if (style.bold) codes += BOLD;
  if (style.dim) codes += DIM;
  if (style.inverse) codes += INVERSE;
  if (style.fg) codes += fgRgb(COLORS[style.fg]);
  return codes;
}

/**
 * One grid row as an ANSI string
 */
export function encodeRow(grid: CellGrid, y: number): string {
  return grid
    .styleRuns(y)
    .map((run) => {
      const codes = styleCodes(run.style);
      return codes === '' ? run.text : `${codes}${run.text}${RESET}`;
    })
    .join('');
}

// ============================================================================
// Presenter
// ============================================================================

/**
 * Creates the interactive terminal UI for a scenario
 */
export function createTUI(scenario: Scenario, settings: SessionSettings, options: TUIOptions = {}): TUI {
  let isRunning = false;
  let drawingEnabled = true;
  let paintedRows: string[] = [];
  let animationInterval: ReturnType<typeof setInterval> | null = null;
  let exitCallback: ((reason: ExitReason) => void) | null = null;

  const session = new Session(scenario, settings, new SystemClock(), {
    onRender: () => draw(),
    onSuspend: () => suspendProcess(),
    onExit: (reason) => {
      stop();
      if (exitCallback) {
        exitCallback(reason);
      }
    },
    onDebugLog: options.onDebugLog,
  });

  // ============================================================================
  // Drawing
  // ============================================================================

  function draw(): void {
    if (!isRunning || !drawingEnabled) return;

    const grid = session.render({ width: term.width, height: term.height });
    for (let y = 0; y < grid.height; y++) {
      const row = encodeRow(grid, y);
      if (paintedRows[y] === row) continue;
      term.moveTo(1, y + 1);
      process.stdout.write(`${row}\x1b[K`);
      paintedRows[y] = row;
    }
  }

  function fullDraw(): void {
    paintedRows = [];
    term.clear();
    draw();
  }

  function startAnimation(): void {
    animationInterval = setInterval(() => {
      // Only the spinner moves on its own
      if (session.isResponding) {
        draw();
      }
    }, SPINNER_FRAME_MS);
  }

  // ============================================================================
  // Job control
  // ============================================================================

  const suspendProcess = (): void => {
    // Disable drawing first to prevent any in-flight draws
    drawingEnabled = false;
    releaseTerminal();
    // Remove any SIGTSTP listeners so the default suspend behavior happens
    process.removeAllListeners('SIGTSTP');
    // Send SIGTSTP to process group (0) for proper job control
    process.kill(0, 'SIGTSTP');
  };

  const onContinue = (): void => {
    // suspendProcess dropped our SIGTSTP listener
    process.removeListener('SIGTSTP', onExternalStop);
    process.on('SIGTSTP', onExternalStop);
    reacquireTerminal();
    drawingEnabled = true;
    session.resume();
    fullDraw();
  };

  const onExternalStop = (): void => {
    session.suspend();
    suspendProcess();
  };

  const onResize = (): void => {
    fullDraw();
  };

  const onKey = (name: string): void => {
    const key = fromTermKitKey(name);
    if (key) {
      session.handleKey(key);
    }
  };

  // ============================================================================
  // Lifecycle
  // ============================================================================

  function start(): void {
    if (isRunning) return;
    isRunning = true;

    enterTerminal();
    process.on('SIGCONT', onContinue);
    process.on('SIGTSTP', onExternalStop);

    term.on('key', onKey);
    term.on('resize', onResize);

    startAnimation();
    fullDraw();
  }

  function stop(): void {
    if (!isRunning) return;
    isRunning = false;

    if (animationInterval) {
      clearInterval(animationInterval);
      animationInterval = null;
    }
    session.stop();
    process.removeListener('SIGCONT', onContinue);
    process.removeListener('SIGTSTP', onExternalStop);
    term.off('key', onKey);
    term.off('resize', onResize);
    cleanupTerminal();
  }

  return {
    start,
    stop,
    onExit: (callback) => {
      exitCallback = callback;
    },
  };
}
