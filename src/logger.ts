// Debug log: timestamped lines appended to a file while a session runs.
// Off unless a path is given with --debug-file or UNDERSTUDY_DEBUG_LOG.

import fs from 'node:fs';
import path from 'node:path';

export type DebugLogEntry = {
  type: 'key' | 'command' | 'schedule' | 'session' | 'error';
  text: string;
  details?: unknown;
};

export type DebugLogWriter = (entry: DebugLogEntry) => void;

export const DEBUG_LOG_ENV = 'UNDERSTUDY_DEBUG_LOG';

/**
 * Format one entry as a log line (newline included)
 */
export function formatLogLine(entry: DebugLogEntry, timestamp: string): string {
  let logLine = `[${timestamp}] [${entry.type.toUpperCase()}] ${entry.text}`;

  // Add full details as JSON if present
  if (entry.details !== undefined) {
    logLine += `\n    DETAILS: ${JSON.stringify(entry.details, null, 2).split('\n').join('\n    ')}`;
  }

  return `${logLine}\n`;
}

/**
 * Pick the debug log path: the flag wins over the environment
 */
export function resolveDebugLogPath(flag: string | null, env: NodeJS.ProcessEnv = process.env): string | null {
  if (flag) return path.resolve(flag);
  const fromEnv = env[DEBUG_LOG_ENV];
  return fromEnv ? path.resolve(fromEnv) : null;
}

/**
 * Create a writer that truncates the file with a session banner, then appends.
 * The first failed write turns logging off for the rest of the run.
 */
export function createDebugLogWriter(logPath: string): DebugLogWriter {
  let enabled = true;

  const write = (op: () => void): void => {
    if (!enabled) return;
    try {
      const dir = path.dirname(logPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      op();
    } catch (err) {
      enabled = false;
      process.stderr.write(`Debug log disabled: ${err instanceof Error ? err.message : String(err)}\n`);
    }
  };

  write(() => fs.writeFileSync(logPath, `=== Understudy session ${new Date().toISOString()} ===\n\n`));

  return (entry) => {
    write(() => fs.appendFileSync(logPath, formatLogLine(entry, new Date().toISOString())));
  };
}
