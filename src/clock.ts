// Time source for everything that waits: response delays, stream intervals,
// exit-hint expiry and the spinner. Tests drive a VirtualClock by hand.

/**
 * Handle returned by Clock.setTimer
 */
export interface Timer {
  cancel(): void;
}

/**
 * Monotonic millisecond clock with cancellable one-shot timers
 */
export interface Clock {
  now(): number;
  setTimer(delayMs: number, callback: () => void): Timer;
}

/**
 * Clock backed by the real event loop
 */
export class SystemClock implements Clock {
  private readonly origin = performance.now();

  now(): number {
    return Math.floor(performance.now() - this.origin);
  }

  setTimer(delayMs: number, callback: () => void): Timer {
    const handle = setTimeout(callback, Math.max(0, delayMs));
    return {
      cancel: () => clearTimeout(handle),
    };
  }
}

interface PendingTimer {
  dueAt: number;
  seq: number;
  callback: () => void;
  cancelled: boolean;
}

/**
 * Manually advanced clock. Timers fire in deadline order, ties in creation order.
 */
export class VirtualClock implements Clock {
  private current: number;
  private seq = 0;
  private pending: PendingTimer[] = [];

  constructor(start: number = 0) {
    this.current = start;
  }

  now(): number {
    return this.current;
  }

  setTimer(delayMs: number, callback: () => void): Timer {
    const timer: PendingTimer = {
      dueAt: this.current + Math.max(0, delayMs),
      seq: this.seq++,
      callback,
      cancelled: false,
    };
    this.pending.push(timer);
    return {
      cancel: () => {
        timer.cancelled = true;
      },
    };
  }

  /** Number of timers still waiting to fire */
  get pendingCount(): number {
    return this.pending.filter((t) => !t.cancelled).length;
  }

  /**
   * Move time forward, firing every timer that falls due on the way.
   * Timers created by callbacks are honoured if they fall inside the window.
   */
  advance(ms: number): void {
    const target = this.current + Math.max(0, ms);
    for (;;) {
      const next = this.nextDue(target);
      if (!next) break;
      this.pending = this.pending.filter((t) => t !== next);
      this.current = next.dueAt;
      next.callback();
    }
    this.current = target;
  }

  /** Fire everything that is pending, however far away */
  runAll(limit: number = 10_000): void {
    for (let i = 0; i < limit; i++) {
      const live = this.pending.filter((t) => !t.cancelled);
      if (live.length === 0) return;
      const latest = Math.max(...live.map((t) => t.dueAt));
      this.advance(latest - this.current);
    }
    throw new Error(`VirtualClock.runAll gave up after ${limit} rounds`);
  }

  private nextDue(target: number): PendingTimer | null {
    this.pending = this.pending.filter((t) => !t.cancelled);
    let best: PendingTimer | null = null;
    for (const timer of this.pending) {
      if (timer.dueAt > target) continue;
      if (!best || timer.dueAt < best.dueAt || (timer.dueAt === best.dueAt && timer.seq < best.seq)) {
        best = timer;
      }
    }
    return best;
  }
}
