/**
 * Session: the single owner of all mutable state
 *
 * Key presses, suspend/resume notifications, scheduler steps and hint expiry
 * all pass through one FIFO queue drained by one loop. Nothing else mutates
 * SessionState, so the order events are drained in is the order they happen.
 */

import type { Clock, Timer } from './clock.js';
import type { SessionSettings } from './config.js';
import {
  describeToolCall,
  errorEntry,
  noticeEntry,
  promptEntry,
  responseEntry,
  shellEntry,
  toolCallEntry,
} from './conversation.js';
import { failureMessage } from './failure.js';
import type { DebugLogWriter } from './logger.js';
import { type CompiledScenario, compileScenario, matchPrompt, recordMatch } from './matcher.js';
import { modelDisplayName } from './models.js';
import { type PermissionDecision, permissionRequestFor } from './permission.js';
import type { Scenario } from './scenario.js';
import {
  buildSchedule,
  type ScheduledEvent,
  type ScheduleHandle,
  type ScheduleOutcome,
  startSchedule,
} from './scheduler.js';
import {
  createInitialState,
  currentModelIndex,
  cyclePermissionMode,
  grantForSession,
  isResponding,
  restoreStash,
  type SessionState,
} from './state.js';
import { CLEAR_NOTICE, INTERRUPTED_NOTICE } from './tui/constants.js';
import type { CellGrid } from './tui/grid.js';
import { activeHint, handleKey } from './tui/input.js';
import { type RenderView, renderFrame, type ScreenSize } from './tui/render.js';
import type { Command, EphemeralHint, ExitReason, KeyEvent, Mode } from './tui/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Callbacks for presenters and test harnesses
 */
export type SessionCallbacks = {
  /** State changed; redraw */
  onRender?: () => void;
  /** Every command the state machine produced, after it was applied */
  onCommand?: (command: Command) => void;
  /** Ctrl+Z: the presenter should stop the process */
  onSuspend?: () => void;
  onExit?: (reason: ExitReason) => void;
  onDebugLog?: DebugLogWriter;
};

type SessionEvent =
  | { type: 'key'; key: KeyEvent }
  | { type: 'suspend' }
  | { type: 'resume' }
  | { type: 'scheduled'; submission: number; event: ScheduledEvent; handle: ScheduleHandle }
  | { type: 'hint-expired'; hint: EphemeralHint };

export const CLEAR_COMMAND = '/clear';

// ============================================================================
// Session
// ============================================================================

export class Session {
  private readonly state: SessionState;
  private readonly compiled: CompiledScenario;
  private readonly queue: SessionEvent[] = [];
  private draining = false;
  private schedule: ScheduleHandle | null = null;
  private hintTimer: Timer | null = null;

  constructor(
    scenario: Scenario,
    private readonly settings: SessionSettings,
    private readonly clock: Clock,
    private readonly callbacks: SessionCallbacks = {},
  ) {
    this.compiled = compileScenario(scenario);
    this.state = createInitialState(settings);
  }

  // ==========================================================================
  // Inputs
  // ==========================================================================

  handleKey(key: KeyEvent): void {
    this.dispatch({ type: 'key', key });
  }

  /** The process was stopped from outside (SIGTSTP) */
  suspend(): void {
    this.dispatch({ type: 'suspend' });
  }

  /** The process was continued (SIGCONT) */
  resume(): void {
    this.dispatch({ type: 'resume' });
  }

  /** Cancel timers and the in-flight response */
  stop(): void {
    this.schedule?.cancel();
    this.schedule = null;
    this.hintTimer?.cancel();
    this.hintTimer = null;
  }

  // ==========================================================================
  // Views
  // ==========================================================================

  get mode(): Mode {
    return this.state.machine.mode;
  }

  get exitReason(): ExitReason | null {
    return this.state.exitReason;
  }

  /** Whether a response is in flight (the spinner should animate) */
  get isResponding(): boolean {
    return isResponding(this.state);
  }

  get snapshot(): Readonly<SessionState> {
    return this.state;
  }

  view(): RenderView {
    const { machine } = this.state;
    return {
      identity: {
        productName: this.settings.productName,
        version: this.settings.version,
        modelId: this.state.model,
        modelDisplayName: modelDisplayName(this.state.model),
        provider: this.settings.provider,
        workingDirectory: this.settings.workingDirectory,
        placeholder: this.settings.placeholder,
      },
      entries: this.state.conversation.entries(),
      streaming: this.state.streaming,
      input: machine.input,
      mode: machine.mode,
      permissionMode: this.state.permissionMode,
      hint: activeHint(machine.hint, this.clock.now(), this.settings.timeouts.exitHintMs),
      thinking: this.state.thinking,
      now: this.clock.now(),
    };
  }

  render(size: ScreenSize): CellGrid {
    return renderFrame(this.view(), size);
  }

  // ==========================================================================
  // Event loop
  // ==========================================================================

  private dispatch(event: SessionEvent): void {
    this.queue.push(event);
    if (this.draining) return;

    this.draining = true;
    try {
      for (let next = this.queue.shift(); next; next = this.queue.shift()) {
        this.process(next);
      }
    } finally {
      this.draining = false;
    }
    this.callbacks.onRender?.();
  }

  private process(event: SessionEvent): void {
    if (this.state.exitReason !== null) return;

    switch (event.type) {
      case 'key':
        this.processKey(event.key);
        break;
      case 'suspend':
        if (this.state.machine.mode.kind !== 'suspended') {
          this.enterSuspended();
        }
        break;
      case 'resume':
        this.processResume();
        break;
      case 'scheduled':
        if (event.submission === this.state.submissionCount) {
          this.processScheduled(event.event, event.handle);
        }
        break;
      case 'hint-expired':
        if (this.state.machine.hint === event.hint) {
          this.state.machine.hint = null;
        }
        break;
    }
  }

  private processKey(key: KeyEvent): void {
    const previousHint = this.state.machine.hint;
    const { state: next, commands } = handleKey(this.state.machine, key, {
      now: this.clock.now(),
      exitHintMs: this.settings.timeouts.exitHintMs,
      modelIndex: currentModelIndex(this.state),
    });
    this.state.machine = next;

    if (next.hint !== previousHint) {
      this.armHintTimer(next.hint);
    }

    for (const command of commands) {
      this.log('command', command.type, command);
      this.apply(command);
      this.callbacks.onCommand?.(command);
    }
  }

  private armHintTimer(hint: EphemeralHint | null): void {
    this.hintTimer?.cancel();
    this.hintTimer = null;
    if (!hint) return;
    this.hintTimer = this.clock.setTimer(this.settings.timeouts.exitHintMs, () => {
      this.hintTimer = null;
      this.dispatch({ type: 'hint-expired', hint });
    });
  }

  // ==========================================================================
  // Commands
  // ==========================================================================

  private apply(command: Command): void {
    switch (command.type) {
      case 'submit':
        this.submit(command.text);
        break;
      case 'execute-shell':
        this.state.conversation.append(shellEntry(command.command));
        break;
      case 'cycle-permission':
        this.log('session', `permission mode ${cyclePermissionMode(this.state)}`);
        break;
      case 'toggle-panel':
        break;
      case 'suspend':
        this.enterSuspended();
        this.callbacks.onSuspend?.();
        break;
      case 'exit':
        this.stop();
        this.state.exitReason = command.reason;
        this.callbacks.onExit?.(command.reason);
        break;
      case 'interrupt':
        this.interrupt();
        break;
      case 'select-model':
        this.selectModel(command.model);
        break;
      case 'resolve-permission':
        this.resolvePermission(command.decision);
        break;
    }
  }

  private submit(text: string): void {
    if (this.schedule && !this.schedule.done) {
      this.log('session', 'submission rejected: response in flight');
      return;
    }

    const { conversation } = this.state;
    if (text.trim() === CLEAR_COMMAND) {
      conversation.clear();
      conversation.append(promptEntry(CLEAR_COMMAND));
      conversation.append(noticeEntry(CLEAR_NOTICE));
      this.state.machine.mode = { kind: 'normal' };
      return;
    }

    conversation.append(promptEntry(text));

    const { rule, fallback } = matchPrompt(text, this.compiled, this.state.matchCounts);
    this.state.matchCounts = recordMatch(this.state.matchCounts, rule);
    this.log('schedule', fallback ? 'no rule matched, using default response' : `matched rule ${(rule.index ?? 0) + 1}`, {
      prompt: text,
    });

    this.state.submissionCount++;
    this.state.thinking = { startedAt: this.clock.now(), verbIndex: this.state.submissionCount - 1 };
    this.state.streaming = '';

    const submission = this.state.submissionCount;
    const steps = buildSchedule(rule, { defaultDelayMs: this.settings.timeouts.responseDelayMs });
    const handle = startSchedule(steps, this.clock, (event, scheduleHandle) => {
      if (this.draining) {
        if (submission === this.state.submissionCount) {
          this.processScheduled(event, scheduleHandle);
        }
      } else {
        this.dispatch({ type: 'scheduled', submission, event, handle: scheduleHandle });
      }
    });
    this.schedule = handle.done ? null : handle;
  }

  private processScheduled(event: ScheduledEvent, handle: ScheduleHandle): void {
    this.log('schedule', event.kind);
    switch (event.kind) {
      case 'tool-call': {
        const request = permissionRequestFor(event.call, this.state.permissionMode, this.state.sessionGrants);
        if (request) {
          handle.pause();
          this.state.pendingPermission = request;
          this.state.machine.mode = { kind: 'permission', request };
          return;
        }
        this.state.conversation.append(
          toolCallEntry(event.call.tool, describeToolCall(event.call), event.call.result ?? null),
        );
        break;
      }
      case 'chunk':
        this.state.streaming += event.text;
        break;
      case 'complete':
        this.finish(event.outcome);
        break;
    }
  }

  private finish(outcome: ScheduleOutcome): void {
    const { conversation } = this.state;
    if (outcome.kind === 'response') {
      conversation.append(responseEntry(outcome.text));
    } else {
      conversation.append(errorEntry(failureMessage(outcome.failure), outcome.failure.type));
    }

    this.state.streaming = '';
    this.state.thinking = null;
    this.schedule = null;
    if (this.state.machine.mode.kind === 'thinking') {
      this.state.machine.mode = { kind: 'normal' };
    }
    if (restoreStash(this.state)) {
      this.log('session', 'stash restored');
    }
  }

  /** Drop the in-flight response, keeping whatever text already arrived */
  private cancelResponse(): void {
    if (!this.state.thinking) return;
    this.schedule?.cancel();
    this.schedule = null;

    const { conversation } = this.state;
    if (this.state.streaming !== '') {
      conversation.append(responseEntry(this.state.streaming));
    }
    conversation.append(noticeEntry(INTERRUPTED_NOTICE));
    this.state.streaming = '';
    this.state.thinking = null;
    this.state.pendingPermission = null;
  }

  private interrupt(): void {
    this.cancelResponse();
    this.state.machine.mode = { kind: 'normal' };
  }

  private enterSuspended(): void {
    const current = this.state.machine.mode;
    const previous = current.kind === 'suspended' ? current.previous : current;
    const responding = isResponding(this.state);
    this.cancelResponse();
    this.state.machine.mode = {
      kind: 'suspended',
      previous: responding || previous.kind === 'permission' ? { kind: 'normal' } : previous,
    };
  }

  private processResume(): void {
    const { mode } = this.state.machine;
    if (mode.kind !== 'suspended') return;
    this.state.machine.mode = mode.previous;
  }

  private selectModel(model: string): void {
    if (model === this.state.model) return;
    this.state.model = model;
    this.state.conversation.append(noticeEntry(`Set model to ${modelDisplayName(model)}`));
  }

  private resolvePermission(decision: PermissionDecision): void {
    const request = this.state.pendingPermission;
    const handle = this.schedule;
    if (!request || !handle) {
      throw new Error('Permission answered with no tool call waiting');
    }
    this.state.pendingPermission = null;

    const { call } = request;
    if (decision === 'no') {
      this.state.conversation.append(toolCallEntry(call.tool, describeToolCall(call), 'Permission denied'));
      handle.cancel();
      this.schedule = null;
      this.state.streaming = '';
      this.state.thinking = null;
      this.state.machine.mode = { kind: 'normal' };
      return;
    }

    if (decision === 'yes-session') {
      grantForSession(this.state, request.kind);
    }
    this.state.conversation.append(toolCallEntry(call.tool, describeToolCall(call), call.result ?? null));
    this.state.machine.mode = { kind: 'thinking' };
    handle.resume();
  }

  private log(type: 'command' | 'schedule' | 'session', text: string, details?: unknown): void {
    this.callbacks.onDebugLog?.({ type, text, details });
  }
}
