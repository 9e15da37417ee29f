// lib/agents/types.ts
// Agent record, cognitive-engine capability and adapter contract.

import type { AgentClock } from './agentClock';
import type { AgentEvents } from './agentEvents';
import type { MotorOutcome, SymbolMap } from '../mediator/symbols';
import type { SimError } from '../errors';

export type AgentState = 'pending' | 'stepping' | 'blocked' | 'done';

export type EngineStepContext = {
  agentId: string;
  // due time of this step (the agent's current actrTime)
  actrTime: number;
  events: AgentEvents;
};

export type StepResult = {
  nextDueTime: number;
  // request a fresh SymbolMap after this step
  perceive?: boolean;
  // key symbol handed to the mediator
  motorCommand?: string | null;
  // the engine has nothing further scheduled in this run
  terminal?: boolean;
  firedProduction?: string | null;
};

/**
 * Anything that can advance an agent by one discrete reasoning step. Native
 * engines, scripted test engines and remote controllers all satisfy this.
 */
export interface CognitiveEngine {
  step(ctx: EngineStepContext): StepResult | Promise<StepResult>;
  injectPerception(stimulus: SymbolMap): void;
  injectMotorResult(outcome: MotorOutcome): void;
  reset?(): void;
  // read-only summary for adapters and debuggers
  inspect?(): Record<string, unknown>;
}

export type AgentFailure = {
  at: number;
  error: SimError | Error;
};

export type SimAgent = {
  id: string;
  label: string;
  type: string;
  losRadius: number;
  clock: AgentClock;
  initialTime: number;
  state: AgentState;
  engine: CognitiveEngine;
  events: AgentEvents;
  visualStimuli: SymbolMap;
  lastMotor: MotorOutcome | null;
  failure: AgentFailure | null;
  steps: number;
};

export type AdapterContext = {
  agentId: string;
  events: AgentEvents;
  // both go through the mediator and are only valid during this agent's own step
  issueMotor: (key: string) => MotorOutcome;
  overridePerception: (stimulus: SymbolMap) => void;
  inspect: () => Record<string, unknown>;
};

export type AgentAdapter = {
  id: string;
  attach: (ctx: AdapterContext) => void | (() => void);
};
