/**
 * Response scheduler
 *
 * Turns a matched rule into a list of timed steps (relative delays), then plays
 * them on a Clock. Playback can be paused (a permission dialog is open) and
 * cancelled (interrupt, suspend, exit). Zero-delay steps are delivered
 * synchronously; everything else waits on the clock.
 */

import type { Clock, Timer } from './clock.js';
import { failureLatencyMs } from './failure.js';
import type { CompiledRule } from './matcher.js';
import type { FailureSpec, ToolCallSpec } from './scenario.js';

// ============================================================================
// Types
// ============================================================================

export type ScheduleOutcome =
  | { kind: 'response'; text: string }
  | { kind: 'failure'; failure: FailureSpec };

export type ScheduledEvent =
  | { kind: 'tool-call'; call: ToolCallSpec }
  | { kind: 'chunk'; text: string }
  | { kind: 'complete'; outcome: ScheduleOutcome };

export interface ScheduleStep {
  /** Wait before this step, relative to the previous one */
  delayMs: number;
  event: ScheduledEvent;
}

export interface ScheduleOptions {
  /** Delay used when neither the response nor the rule sets one */
  defaultDelayMs: number;
}

export interface ScheduleHandle {
  pause(): void;
  resume(): void;
  cancel(): void;
  readonly paused: boolean;
  readonly done: boolean;
}

// ============================================================================
// Building
// ============================================================================

/**
 * Split text into chunks of at most `size` code points
 */
export function chunkText(text: string, size: number): string[] {
  const chars = Array.from(text);
  const chunks: string[] = [];
  for (let i = 0; i < chars.length; i += size) {
    chunks.push(chars.slice(i, i + size).join(''));
  }
  return chunks;
}

/**
 * Expand a rule into its timed steps. A failure rule never produces text.
 */
export function buildSchedule(rule: CompiledRule, options: ScheduleOptions): ScheduleStep[] {
  const { outcome } = rule;

  if (outcome.kind === 'fail') {
    const delayMs = (rule.delayMs ?? options.defaultDelayMs) + failureLatencyMs(outcome.failure);
    return [{ delayMs, event: { kind: 'complete', outcome: { kind: 'failure', failure: outcome.failure } } }];
  }

  const response = outcome.response;
  if (typeof response === 'string') {
    const delayMs = rule.delayMs ?? options.defaultDelayMs;
    return [
      { delayMs, event: { kind: 'chunk', text: response } },
      { delayMs: 0, event: { kind: 'complete', outcome: { kind: 'response', text: response } } },
    ];
  }

  const steps: ScheduleStep[] = [];
  let pendingDelay = response.delay_ms ?? rule.delayMs ?? options.defaultDelayMs;

  for (const call of response.tool_calls) {
    steps.push({ delayMs: pendingDelay, event: { kind: 'tool-call', call } });
    pendingDelay = 0;
  }

  const chunks =
    response.text === ''
      ? []
      : response.stream
        ? chunkText(response.text, response.stream.chunk_size)
        : [response.text];
  const interval = response.stream?.interval_ms ?? 0;
  chunks.forEach((text, i) => {
    steps.push({ delayMs: i === 0 ? pendingDelay : interval, event: { kind: 'chunk', text } });
  });
  if (chunks.length > 0) {
    pendingDelay = 0;
  }

  steps.push({ delayMs: pendingDelay, event: { kind: 'complete', outcome: { kind: 'response', text: response.text } } });
  return steps;
}

// ============================================================================
// Playback
// ============================================================================

/**
 * Play steps in order, calling `deliver` for each. The handler may pause or
 * cancel through the handle it is given; that takes effect before the next step.
 */
export function startSchedule(
  steps: readonly ScheduleStep[],
  clock: Clock,
  deliver: (event: ScheduledEvent, handle: ScheduleHandle) => void,
): ScheduleHandle {
  let position = 0;
  let paused = false;
  let cancelled = false;
  let waiting: Timer | null = null;
  // Step whose delay has elapsed but which was held back by a pause
  let due = false;

  function isDone(): boolean {
    return cancelled || position >= steps.length;
  }

  function pump(): void {
    while (!paused && !cancelled && position < steps.length) {
      const step = steps[position];
      if (!due && step.delayMs > 0) {
        waiting = clock.setTimer(step.delayMs, () => {
          waiting = null;
          due = true;
          pump();
        });
        return;
      }
      due = false;
      position++;
      deliver(step.event, handle);
    }
  }

  const handle: ScheduleHandle = {
    pause() {
      paused = true;
    },
    resume() {
      if (!paused || cancelled) return;
      paused = false;
      if (waiting === null) {
        pump();
      }
    },
    cancel() {
      cancelled = true;
      waiting?.cancel();
      waiting = null;
    },
    get paused() {
      return paused;
    },
    get done() {
      return isDone();
    },
  };

  pump();
  return handle;
}
