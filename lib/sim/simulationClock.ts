// lib/sim/simulationClock.ts
// Model time -> wall time mapping for real-time pacing.
//
// real_seconds = model_time / speedFactor, measured from start(). With the
// 'unthrottled' sentinel every deadline is "now".

import { setTimeout as sleepMs } from 'node:timers/promises';

export const UNTHROTTLED = 'unthrottled';
export type SpeedFactor = number | typeof UNTHROTTLED;

export type ClockDeps = {
  // wall clock in milliseconds
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
};

export class SimulationClock {
  readonly speedFactor: SpeedFactor;
  private startedAt: number | null = null;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(speedFactor: SpeedFactor, deps: ClockDeps = {}) {
    if (speedFactor !== UNTHROTTLED && !(Number.isFinite(speedFactor) && speedFactor > 0)) {
      throw new RangeError(`speedFactor must be a positive number or '${UNTHROTTLED}', got ${String(speedFactor)}`);
    }
    this.speedFactor = speedFactor;
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? ((ms) => sleepMs(ms).then(() => undefined));
  }

  get throttled(): boolean {
    return this.speedFactor !== UNTHROTTLED;
  }

  get started(): boolean {
    return this.startedAt !== null;
  }

  /** Anchors model time 0 to the current wall time; later calls keep the anchor. */
  start(): void {
    if (this.startedAt === null) this.startedAt = this.now();
  }

  reset(): void {
    this.startedAt = null;
  }

  /** Wall time (ms) at which `modelTime` is due, or null when unthrottled. */
  deadlineFor(modelTime: number): number | null {
    if (this.speedFactor === UNTHROTTLED) return null;
    this.start();
    const anchor = this.startedAt ?? this.now();
    return anchor + (modelTime / this.speedFactor) * 1000;
  }

  /** Sleeps until `modelTime` is due; resolves with the milliseconds waited. */
  async waitUntil(modelTime: number): Promise<number> {
    const deadline = this.deadlineFor(modelTime);
    if (deadline === null) return 0;
    const delay = deadline - this.now();
    if (delay <= 0) return 0;
    await this.sleep(delay);
    return delay;
  }
}
