// lib/agents/agentClock.ts
// Per-agent architecture time plus the insertion sequence used for tie-breaks.

import { SchedulerInvariantError } from '../errors';

export type AgentClock = {
  // model seconds, monotonically non-decreasing
  actrTime: number;
  // registration order; lower steps first on equal actrTime
  seq: number;
};

export function makeClock(actrTime: number, seq: number): AgentClock {
  assertDueTime(actrTime, `initial time of agent #${seq}`);
  return { actrTime, seq };
}

export function compareClocks(a: AgentClock, b: AgentClock): number {
  if (a.actrTime !== b.actrTime) return a.actrTime < b.actrTime ? -1 : 1;
  return a.seq - b.seq;
}

export function assertDueTime(t: number, what: string) {
  if (typeof t !== 'number' || !Number.isFinite(t) || t < 0) {
    throw new SchedulerInvariantError(`${what} must be a finite non-negative number, got ${String(t)}`);
  }
}

/** Moves the clock to `next`; time never runs backwards. */
export function advanceClock(clock: AgentClock, next: number, agentId: string): AgentClock {
  assertDueTime(next, `next due time of ${agentId}`);
  if (next < clock.actrTime) {
    throw new SchedulerInvariantError(
      `next due time of ${agentId} (${next}) is earlier than its current time (${clock.actrTime})`
    );
  }
  clock.actrTime = next;
  return clock;
}
