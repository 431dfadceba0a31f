/**
 * Terminal state handling shared by start, suspend and exit.
 */

import termKit from 'terminal-kit';

const term = termKit.terminal;

function setRawMode(enabled: boolean): void {
  if (process.stdin.isTTY && process.stdin.setRawMode) {
    process.stdin.setRawMode(enabled);
  }
}

/**
 * Take over the terminal: alternate screen, raw key input, hidden cursor
 * (the renderer draws its own).
 */
export function enterTerminal(): void {
  term.fullscreen(true);
  term.hideCursor();
  term.grabInput(true);
}

/**
 * Give the terminal back before the process stops on SIGTSTP
 */
export function releaseTerminal(): void {
  term.styleReset();
  setRawMode(false);
  process.stdout.write('\x1b[?25h'); // Show cursor
}

/**
 * Re-take the terminal after SIGCONT. Raw mode is toggled off and on since
 * the shell may have reset the termios attributes while we were stopped.
 */
export function reacquireTerminal(): void {
  setRawMode(false);
  setRawMode(true);
  enterTerminal();
}

/**
 * Fully reset the terminal to a clean state when the session ends.
 */
export function cleanupTerminal(): void {
  // Clear the alternate screen buffer before leaving it
  term.clear();
  term.grabInput(false);
  term.fullscreen(false);
  term.styleReset();
  setRawMode(false);

  // Plain ANSI as well, in case terminal-kit output did not complete
  process.stdout.write('\x1b[?25h'); // Show cursor
  process.stdout.write('\x1b[2J'); // Clear entire screen
  process.stdout.write('\x1b[H'); // Move cursor to home position
}
