import { describe, expect, it } from 'vitest';
import { VirtualClock } from './clock.js';
import { type CompiledRule, compileScenario } from './matcher.js';
import { parseScenario } from './scenario.js';
import { buildSchedule, chunkText, type ScheduledEvent, startSchedule } from './scheduler.js';

function ruleFrom(rule: Record<string, unknown>): CompiledRule {
  return compileScenario(parseScenario({ responses: [{ pattern: { type: 'any' }, ...rule }] })).rules[0];
}

describe('scheduler', () => {
  describe('chunkText', () => {
    it('should split into fixed-size chunks with a shorter tail', () => {
      expect(chunkText('abcdefghij', 4)).toEqual(['abcd', 'efgh', 'ij']);
    });

    it('should never split a code point', () => {
      expect(chunkText('😀😀😀', 2)).toEqual(['😀😀', '😀']);
    });

    it('should return nothing for empty text', () => {
      expect(chunkText('', 3)).toEqual([]);
    });
  });

  describe('buildSchedule', () => {
    it('should emit one chunk then completion for a plain response', () => {
      const steps = buildSchedule(ruleFrom({ response: 'hi', delay_ms: 100 }), { defaultDelayMs: 0 });
      expect(steps).toEqual([
        { delayMs: 100, event: { kind: 'chunk', text: 'hi' } },
        { delayMs: 0, event: { kind: 'complete', outcome: { kind: 'response', text: 'hi' } } },
      ]);
    });

    it('should use the default delay when the rule has none', () => {
      const steps = buildSchedule(ruleFrom({ response: 'hi' }), { defaultDelayMs: 250 });
      expect(steps[0].delayMs).toBe(250);
    });

    it('should place tool calls before text and give the first one the delay', () => {
      const steps = buildSchedule(
        ruleFrom({
          delay_ms: 200,
          response: {
            text: 'ok',
            tool_calls: [
              { tool: 'Bash', input: { command: 'ls' } },
              { tool: 'Read', input: { file_path: 'a.ts' } },
            ],
          },
        }),
        { defaultDelayMs: 0 },
      );

      expect(steps.map((step) => [step.delayMs, step.event.kind])).toEqual([
        [200, 'tool-call'],
        [0, 'tool-call'],
        [0, 'chunk'],
        [0, 'complete'],
      ]);
    });

    it('should prefer the response delay over the rule delay', () => {
      const steps = buildSchedule(ruleFrom({ delay_ms: 200, response: { text: 'ok', delay_ms: 50 } }), {
        defaultDelayMs: 0,
      });
      expect(steps[0]).toEqual({ delayMs: 50, event: { kind: 'chunk', text: 'ok' } });
    });

    it('should space streamed chunks by the interval', () => {
      const steps = buildSchedule(
        ruleFrom({ response: { text: 'abcdefghij', stream: { chunk_size: 4, interval_ms: 30 } } }),
        { defaultDelayMs: 10 },
      );

      expect(steps).toEqual([
        { delayMs: 10, event: { kind: 'chunk', text: 'abcd' } },
        { delayMs: 30, event: { kind: 'chunk', text: 'efgh' } },
        { delayMs: 30, event: { kind: 'chunk', text: 'ij' } },
        { delayMs: 0, event: { kind: 'complete', outcome: { kind: 'response', text: 'abcdefghij' } } },
      ]);
    });

    it('should carry the delay to completion when there is no text', () => {
      const steps = buildSchedule(ruleFrom({ delay_ms: 40, response: { text: '' } }), { defaultDelayMs: 0 });
      expect(steps).toEqual([{ delayMs: 40, event: { kind: 'complete', outcome: { kind: 'response', text: '' } } }]);
    });

    it('should add connection timeout latency to a failure', () => {
      const steps = buildSchedule(ruleFrom({ delay_ms: 100, failure: { type: 'connection_timeout', after_ms: 1500 } }), {
        defaultDelayMs: 0,
      });
      expect(steps).toEqual([
        {
          delayMs: 1600,
          event: {
            kind: 'complete',
            outcome: { kind: 'failure', failure: { type: 'connection_timeout', after_ms: 1500 } },
          },
        },
      ]);
    });

    it('should produce no text for a failure', () => {
      const steps = buildSchedule(ruleFrom({ failure: { type: 'out_of_credits' } }), { defaultDelayMs: 0 });
      expect(steps.some((step) => step.event.kind === 'chunk')).toBe(false);
    });
  });

  describe('startSchedule', () => {
    it('should deliver zero-delay steps synchronously', () => {
      const clock = new VirtualClock();
      const events: ScheduledEvent[] = [];
      const steps = buildSchedule(ruleFrom({ response: 'now' }), { defaultDelayMs: 0 });

      const handle = startSchedule(steps, clock, (event) => events.push(event));
      expect(events.map((event) => event.kind)).toEqual(['chunk', 'complete']);
      expect(handle.done).toBe(true);
    });

    it('should wait on the clock for delayed steps', () => {
      const clock = new VirtualClock();
      const events: string[] = [];
      const steps = buildSchedule(ruleFrom({ response: 'later', delay_ms: 100 }), { defaultDelayMs: 0 });

      const handle = startSchedule(steps, clock, (event) => events.push(event.kind));
      clock.advance(99);
      expect(events).toEqual([]);
      expect(handle.done).toBe(false);

      clock.advance(1);
      expect(events).toEqual(['chunk', 'complete']);
      expect(handle.done).toBe(true);
    });

    it('should stop before the next step when the handler pauses', () => {
      const clock = new VirtualClock();
      const events: string[] = [];
      const steps = buildSchedule(
        ruleFrom({
          response: {
            text: 'ok',
            tool_calls: [{ tool: 'Bash', input: { command: 'ls' } }],
            stream: { chunk_size: 2, interval_ms: 50 },
          },
        }),
        { defaultDelayMs: 0 },
      );

      const handle = startSchedule(steps, clock, (event, h) => {
        events.push(event.kind);
        if (event.kind === 'tool-call') h.pause();
      });
      expect(events).toEqual(['tool-call']);
      expect(handle.paused).toBe(true);

      clock.advance(1000);
      expect(events).toEqual(['tool-call']);

      handle.resume();
      expect(events).toEqual(['tool-call', 'chunk', 'complete']);
    });

    it('should hold an elapsed step until resumed', () => {
      const clock = new VirtualClock();
      const events: string[] = [];
      const steps = buildSchedule(ruleFrom({ response: 'held', delay_ms: 100 }), { defaultDelayMs: 0 });

      const handle = startSchedule(steps, clock, (event) => events.push(event.kind));
      handle.pause();
      clock.advance(200);
      expect(events).toEqual([]);

      handle.resume();
      expect(events).toEqual(['chunk', 'complete']);
    });

    it('should resume a paused wait without restarting it', () => {
      const clock = new VirtualClock();
      const events: string[] = [];
      const steps = buildSchedule(ruleFrom({ response: 'x', delay_ms: 100 }), { defaultDelayMs: 0 });

      const handle = startSchedule(steps, clock, (event) => events.push(event.kind));
      clock.advance(60);
      handle.pause();
      handle.resume();
      clock.advance(40);
      expect(events).toEqual(['chunk', 'complete']);
    });

    it('should deliver nothing after cancel', () => {
      const clock = new VirtualClock();
      const events: string[] = [];
      const steps = buildSchedule(ruleFrom({ response: 'never', delay_ms: 100 }), { defaultDelayMs: 0 });

      const handle = startSchedule(steps, clock, (event) => events.push(event.kind));
      handle.cancel();
      clock.advance(500);

      expect(events).toEqual([]);
      expect(handle.done).toBe(true);
      expect(clock.pendingCount).toBe(0);
    });
  });
});
