import { describe, expect, it } from 'vitest';

import { ManualClock } from '../testing/fakes.js';

import { IntervalGate } from './gate.js';

describe('IntervalGate', () => {
  it('lets the first call through and holds back calls inside the interval', () => {
    const clock = new ManualClock(1_000);
    const gate = new IntervalGate({ intervalMs: 5_000, now: clock.now });

    expect(gate.tryPass()).toBe(true);
    clock.advance(4_999);
    expect(gate.tryPass()).toBe(false);
    clock.advance(1);
    expect(gate.tryPass()).toBe(true);
  });

  it('does not restart the interval on a refused pass', () => {
    const clock = new ManualClock();
    const gate = new IntervalGate({ intervalMs: 100, now: clock.now });

    gate.tryPass();
    clock.advance(50);
    expect(gate.tryPass()).toBe(false);
    clock.advance(50);
    expect(gate.tryPass()).toBe(true);
  });

  it('separates checking from marking', () => {
    const clock = new ManualClock();
    const gate = new IntervalGate({ intervalMs: 100, now: clock.now });

    expect(gate.isOpen()).toBe(true);
    expect(gate.isOpen()).toBe(true);

    clock.advance(10);
    gate.mark(5);
    expect(gate.isOpen()).toBe(false);
    clock.advance(94);
    expect(gate.isOpen()).toBe(false);
    clock.advance(1);
    expect(gate.isOpen()).toBe(true);
  });

  it('is always open with a zero interval', () => {
    const gate = new IntervalGate({ intervalMs: 0, now: () => 42 });
    expect(gate.tryPass()).toBe(true);
    expect(gate.tryPass()).toBe(true);
  });
});
