import { describe, it, expect } from 'vitest';

import { PhaseTimer } from '../../../src/ai/newsletter/phase-timer';
import { createMockClock, type Clock } from '../../../src/ai/newsletter/types';

function createControllableClock(start = 0): Clock & { advance(ms: number): void } {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe('PhaseTimer', () => {
  it('measures a started and ended phase', () => {
    const clock = createControllableClock(1_000);
    const timer = new PhaseTimer(clock);

    timer.start('planner');
    clock.advance(1_500);

    expect(timer.isRunning('planner')).toBe(true);
    expect(timer.end('planner')).toBe(1_500);
    expect(timer.isRunning('planner')).toBe(false);
    expect(timer.getDuration('planner')).toBe(1_500);
  });

  it('treats a start time of zero as valid', () => {
    const clock = createControllableClock(0);
    const timer = new PhaseTimer(clock);

    timer.start('scout');
    clock.advance(250);

    expect(timer.end('scout')).toBe(250);
  });

  it('records zero for a phase that was never started', () => {
    const timer = new PhaseTimer(createMockClock(5_000));

    expect(timer.end('writer')).toBe(0);
  });

  it('reports every stage and the total', () => {
    const clock = createControllableClock();
    const timer = new PhaseTimer(clock);

    timer.start('planner');
    clock.advance(100);
    timer.end('planner');
    timer.start('evaluator');
    clock.advance(300);
    timer.end('evaluator');

    expect(timer.getDurations()).toEqual({ planner: 100, scout: 0, evaluator: 300, writer: 0 });
    expect(timer.getTotalDuration()).toBe(400);
  });

  it('measures async work even when it throws', async () => {
    const clock = createControllableClock();
    const timer = new PhaseTimer(clock);

    await expect(
      timer.measure('writer', async () => {
        clock.advance(40);
        throw new Error('writer failed');
      })
    ).rejects.toThrow('writer failed');

    expect(timer.getDuration('writer')).toBe(40);
    expect(timer.isRunning('writer')).toBe(false);
  });

  it('returns the measured value', async () => {
    const timer = new PhaseTimer(createMockClock(0, 10));

    await expect(timer.measure('scout', async () => 'stories')).resolves.toBe('stories');
    expect(timer.getDuration('scout')).toBe(10);
  });
});
