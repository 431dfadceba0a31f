// One-shot print mode: answer a single prompt on stdout and exit.

import { type Clock, SystemClock } from './clock.js';
import type { SessionSettings } from './config.js';
import { failureExitCode, failureMessage } from './failure.js';
import { compileScenario, matchPrompt } from './matcher.js';
import type { Scenario, ToolCallSpec } from './scenario.js';
import { buildSchedule, type ScheduleOutcome, startSchedule } from './scheduler.js';

export type OutputFormat = 'text' | 'json';

export interface PrintResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Shape of --output-format json
 */
export interface ResultMessage {
  type: 'result';
  subtype: 'success' | 'error';
  is_error: boolean;
  result: string;
  duration_ms: number;
  num_turns: number;
  model: string;
  tool_calls: { tool: string; input: Record<string, unknown> }[];
}

/**
 * Play the matched rule to completion and collect what it produced
 */
function playOnce(
  scenario: Scenario,
  settings: SessionSettings,
  prompt: string,
  clock: Clock,
): Promise<{ outcome: ScheduleOutcome; toolCalls: ToolCallSpec[] }> {
  const { rule } = matchPrompt(prompt, compileScenario(scenario));
  const steps = buildSchedule(rule, { defaultDelayMs: settings.timeouts.responseDelayMs });
  const toolCalls: ToolCallSpec[] = [];

  return new Promise((resolve) => {
    startSchedule(steps, clock, (event) => {
      if (event.kind === 'tool-call') {
        toolCalls.push(event.call);
      } else if (event.kind === 'complete') {
        resolve({ outcome: event.outcome, toolCalls });
      }
    });
  });
}

/**
 * Run print mode for one prompt
 */
export async function runPrintMode(
  scenario: Scenario,
  settings: SessionSettings,
  prompt: string,
  format: OutputFormat,
  clock: Clock = new SystemClock(),
): Promise<PrintResult> {
  const startedAt = clock.now();
  const { outcome, toolCalls } = await playOnce(scenario, settings, prompt, clock);

  const isError = outcome.kind === 'failure' && outcome.failure.type !== 'malformed_json';
  const exitCode = outcome.kind === 'failure' ? failureExitCode(outcome.failure) : 0;

  if (format === 'json') {
    const message: ResultMessage = {
      type: 'result',
      subtype: isError ? 'error' : 'success',
      is_error: isError,
      result: outcome.kind === 'response' ? outcome.text : failureMessage(outcome.failure),
      duration_ms: clock.now() - startedAt,
      num_turns: 1,
      model: settings.model,
      tool_calls: toolCalls.map((call) => ({ tool: call.tool, input: call.input })),
    };
    return { exitCode, stdout: `${JSON.stringify(message)}\n`, stderr: '' };
  }

  if (outcome.kind === 'response') {
    return { exitCode, stdout: `${outcome.text}\n`, stderr: '' };
  }
  if (outcome.failure.type === 'malformed_json') {
    return { exitCode, stdout: `${outcome.failure.raw}\n`, stderr: '' };
  }
  return { exitCode, stdout: '', stderr: `${failureMessage(outcome.failure)}\n` };
}
