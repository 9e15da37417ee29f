// lib/engines/scriptedEngine.ts
// Stub engine that replays a fixed list of steps. Used by tests and demos.

import type { CognitiveEngine, EngineStepContext, StepResult } from '../agents/types';
import type { MotorOutcome, SymbolMap } from '../mediator/symbols';

export type ScriptedStep =
  | StepResult
  | ((ctx: EngineStepContext) => StepResult | Promise<StepResult>);

export class ScriptedEngine implements CognitiveEngine {
  readonly perceptions: SymbolMap[] = [];
  readonly motorResults: MotorOutcome[] = [];
  private cursor = 0;

  constructor(private script: ScriptedStep[]) {}

  step(ctx: EngineStepContext): StepResult | Promise<StepResult> {
    const next = this.script[this.cursor];
    if (next === undefined) return { nextDueTime: ctx.actrTime, terminal: true };
    this.cursor += 1;
    return typeof next === 'function' ? next(ctx) : { ...next };
  }

  injectPerception(stimulus: SymbolMap): void {
    this.perceptions.push(stimulus);
  }

  injectMotorResult(outcome: MotorOutcome): void {
    this.motorResults.push(outcome);
  }

  reset(): void {
    this.cursor = 0;
    this.perceptions.length = 0;
    this.motorResults.length = 0;
  }

  inspect(): Record<string, unknown> {
    return { kind: 'scripted', cursor: this.cursor, remaining: this.script.length - this.cursor };
  }
}

/** Steps every `interval` model seconds, `count` times, then stops. */
export function everyInterval(interval: number, count: number, extra: Partial<StepResult> = {}): ScriptedStep[] {
  return Array.from({ length: count }, () => (ctx: EngineStepContext): StepResult => ({
    ...extra,
    nextDueTime: ctx.actrTime + interval,
  }));
}
