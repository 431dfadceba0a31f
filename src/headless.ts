// Headless runner: drives a Session from a key script on a virtual clock
// and captures frames as text. Used by --script and by the end-to-end tests.

import fs from 'node:fs';
import { z } from 'zod';
import { VirtualClock } from './clock.js';
import type { SessionSettings } from './config.js';
import type { DebugLogWriter } from './logger.js';
import type { Scenario } from './scenario.js';
import { Session } from './session.js';
import type { CellGrid } from './tui/grid.js';
import { parseKeySpec, typeText } from './tui/keys.js';
import type { ScreenSize } from './tui/render.js';
import type { Command, ExitReason } from './tui/types.js';

const ScriptStepSchema = z.union([
  z.object({ key: z.string().min(1) }).strict(),
  z.object({ type: z.string() }).strict(),
  z.object({ wait: z.number().int().nonnegative() }).strict(),
  z.object({ suspend: z.literal(true) }).strict(),
  z.object({ resume: z.literal(true) }).strict(),
  z.object({ frame: z.string() }).strict(),
]);

export const ScriptSchema = z.array(ScriptStepSchema);

export type ScriptStep = z.infer<typeof ScriptStepSchema>;

export interface CapturedFrame {
  name: string;
  grid: CellGrid;
}

export interface ScriptResult {
  frames: CapturedFrame[];
  /** Frame after the last step */
  final: CellGrid;
  commands: Command[];
  exitReason: ExitReason | null;
  session: Session;
}

/**
 * Read and validate a script file
 */
export function loadScript(filePath: string): ScriptStep[] {
  const value: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  const result = ScriptSchema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid script ${filePath}: ${details}`);
  }
  return result.data;
}

/**
 * Run a script against a fresh session. Identical inputs give identical frames.
 */
export function runScript(
  scenario: Scenario,
  settings: SessionSettings,
  steps: readonly ScriptStep[],
  size: ScreenSize = { width: 80, height: 24 },
  onDebugLog?: DebugLogWriter,
): ScriptResult {
  const clock = new VirtualClock();
  const commands: Command[] = [];
  const session = new Session(scenario, settings, clock, {
    onCommand: (command) => commands.push(command),
    onDebugLog,
  });
  const frames: CapturedFrame[] = [];

  for (const step of steps) {
    if (session.exitReason !== null) break;

    if ('key' in step) {
      session.handleKey(parseKeySpec(step.key));
    } else if ('type' in step) {
      for (const key of typeText(step.type)) {
        session.handleKey(key);
      }
    } else if ('wait' in step) {
      clock.advance(step.wait);
    } else if ('suspend' in step) {
      session.suspend();
    } else if ('resume' in step) {
      session.resume();
    } else {
      frames.push({ name: step.frame, grid: session.render(size) });
    }
  }

  session.stop();
  return { frames, final: session.render(size), commands, exitReason: session.exitReason, session };
}
