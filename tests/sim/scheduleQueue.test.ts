import { describe, expect, it } from 'vitest';

import { ScheduleQueue } from '@/lib/sim/scheduleQueue';
import { advanceClock, compareClocks, makeClock } from '@/lib/agents/agentClock';
import { SchedulerInvariantError } from '@/lib/errors';

describe('ScheduleQueue', () => {
  it('orders by time, then by registration order', () => {
    const q = new ScheduleQueue();
    q.push('late', makeClock(1, 0));
    q.push('second', makeClock(0.5, 2));
    q.push('first', makeClock(0.5, 1));
    q.push('zero', makeClock(0, 3));

    expect(q.toArray().map((e) => e.agentId)).toEqual(['zero', 'first', 'second', 'late']);
    expect(q.peek()?.agentId).toBe('zero');
    expect(q.pop()?.agentId).toBe('zero');
    expect(q.size).toBe(3);
  });

  it('snapshots the clock at push time', () => {
    const q = new ScheduleQueue();
    const clock = makeClock(0, 0);
    q.push('a', clock);
    advanceClock(clock, 3, 'a');

    expect(q.peek()).toEqual({ agentId: 'a', actrTime: 0, seq: 0 });
  });

  it('rejects double scheduling and supports removal', () => {
    const q = new ScheduleQueue();
    q.push('a', makeClock(0, 0));

    expect(() => q.push('a', makeClock(1, 0))).toThrow(RangeError);
    expect(q.remove('a')).toBe(true);
    expect(q.remove('a')).toBe(false);
    expect(q.pop()).toBeNull();
  });
});

describe('AgentClock', () => {
  it('never runs backwards', () => {
    const clock = makeClock(1, 0);
    expect(() => advanceClock(clock, 0.5, 'a')).toThrow(SchedulerInvariantError);
    expect(() => advanceClock(clock, Number.NaN, 'a')).toThrow('next due time of a must be a finite non-negative number, got NaN');
    expect(advanceClock(clock, 1, 'a').actrTime).toBe(1);
    expect(clock.actrTime).toBe(1);
  });

  it('rejects negative start times', () => {
    expect(() => makeClock(-1, 0)).toThrow(SchedulerInvariantError);
  });

  it('compares by time then sequence', () => {
    expect(compareClocks({ actrTime: 1, seq: 0 }, { actrTime: 2, seq: 0 })).toBeLessThan(0);
    expect(compareClocks({ actrTime: 1, seq: 3 }, { actrTime: 1, seq: 1 })).toBeGreaterThan(0);
  });
});
