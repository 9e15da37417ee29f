// lib/sim/types.ts
// Step records, run reports and plugin contract of the scheduler.

import type { AgentState } from '../agents/types';
import type { GridChange } from '../grid/types';
import type { MotorOutcome, SymbolMap } from '../mediator/symbols';
import type { SimErrorCode } from '../errors';

export type StepRecord = {
  index: number;
  agentId: string;
  // the agent's actrTime when selected
  dueTime: number;
  nextDueTime: number;
  stateAfter: AgentState;
  firedProduction: string | null;
  motorCommand: string | null;
  motor: MotorOutcome | null;
  stimulus: SymbolMap | null;
  gridDiff: GridChange[];
  failure: { code: SimErrorCode | 'engine-error'; message: string } | null;
  // wall milliseconds spent waiting for real-time pacing before this step
  pacedMs: number;
  // plugin outputs, keyed by plugin id
  plugins: Record<string, unknown>;
};

export type StopReason = 'all-blocked' | 'max-steps' | 'max-time' | 'stopped';

export type RunReport = {
  reason: StopReason;
  steps: number;
  finalTime: number;
  blocked: string[];
  done: string[];
  failures: Array<{ agentId: string; message: string }>;
};

export type StepListener = (record: StepRecord) => void;

export type SimPlugin<S = unknown> = {
  id: string;
  afterStep?: (args: { sim: S; record: StepRecord }) => unknown;
};
