// lib/sim/scheduleQueue.ts
// Pending agents ordered by (actrTime, seq). Entries are copies: the queue never
// observes later mutations of an agent's clock.

import { compareClocks, type AgentClock } from '../agents/agentClock';

export type ScheduleEntry = {
  agentId: string;
  actrTime: number;
  seq: number;
};

export class ScheduleQueue {
  private entries: ScheduleEntry[] = [];

  get size(): number {
    return this.entries.length;
  }

  push(agentId: string, clock: AgentClock): void {
    if (this.entries.some((e) => e.agentId === agentId)) {
      throw new RangeError(`agent ${agentId} is already scheduled`);
    }
    const entry: ScheduleEntry = { agentId, actrTime: clock.actrTime, seq: clock.seq };
    // first index whose entry sorts after the new one
    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (compareClocks(this.entries[mid], entry) <= 0) lo = mid + 1;
      else hi = mid;
    }
    this.entries.splice(lo, 0, entry);
  }

  peek(): ScheduleEntry | null {
    return this.entries[0] ?? null;
  }

  pop(): ScheduleEntry | null {
    return this.entries.shift() ?? null;
  }

  remove(agentId: string): boolean {
    const idx = this.entries.findIndex((e) => e.agentId === agentId);
    if (idx < 0) return false;
    this.entries.splice(idx, 1);
    return true;
  }

  clear(): void {
    this.entries = [];
  }

  toArray(): ScheduleEntry[] {
    return this.entries.map((e) => ({ ...e }));
  }
}
