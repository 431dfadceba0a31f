import { describe, expect, it, vi } from 'vitest';
import { VirtualClock } from './clock.js';

describe('VirtualClock', () => {
  it('should start at the given time', () => {
    expect(new VirtualClock().now()).toBe(0);
    expect(new VirtualClock(500).now()).toBe(500);
  });

  it('should fire timers only once their deadline is reached', () => {
    const clock = new VirtualClock();
    const fired = vi.fn();
    clock.setTimer(100, fired);

    clock.advance(99);
    expect(fired).not.toHaveBeenCalled();

    clock.advance(1);
    expect(fired).toHaveBeenCalledTimes(1);
    expect(clock.now()).toBe(100);
  });

  it('should fire in deadline order, ties in creation order', () => {
    const clock = new VirtualClock();
    const order: string[] = [];
    clock.setTimer(50, () => order.push('b'));
    clock.setTimer(20, () => order.push('a'));
    clock.setTimer(50, () => order.push('c'));

    clock.advance(100);
    expect(order).toEqual(['a', 'b', 'c']);
  });

  it('should report the deadline as now inside a callback', () => {
    const clock = new VirtualClock();
    let seen = -1;
    clock.setTimer(30, () => {
      seen = clock.now();
    });
    clock.advance(100);
    expect(seen).toBe(30);
    expect(clock.now()).toBe(100);
  });

  it('should not fire cancelled timers', () => {
    const clock = new VirtualClock();
    const fired = vi.fn();
    const timer = clock.setTimer(10, fired);
    timer.cancel();

    clock.advance(20);
    expect(fired).not.toHaveBeenCalled();
    expect(clock.pendingCount).toBe(0);
  });

  it('should fire timers scheduled by callbacks within the same advance', () => {
    const clock = new VirtualClock();
    const order: number[] = [];
    clock.setTimer(10, () => {
      order.push(clock.now());
      clock.setTimer(10, () => order.push(clock.now()));
    });

    clock.advance(25);
    expect(order).toEqual([10, 20]);
  });

  it('should run everything pending with runAll', () => {
    const clock = new VirtualClock();
    const fired = vi.fn();
    clock.setTimer(5000, fired);

    clock.runAll();
    expect(fired).toHaveBeenCalledTimes(1);
    expect(clock.now()).toBe(5000);
  });
});
