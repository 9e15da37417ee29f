// lib/engines/remoteControllerEngine.ts
// Engine whose decisions come from an external controller (LLM bridge, robot, human UI).
// The step is asynchronous; the scheduler awaits it before advancing the agent's clock.

import type { CognitiveEngine, EngineStepContext, StepResult } from '../agents/types';
import type { MotorOutcome, SymbolMap } from '../mediator/symbols';

export type ControllerInput = {
  agentId: string;
  actrTime: number;
  stimulus: SymbolMap | null;
  lastMotor: MotorOutcome | null;
};

export type ControllerDecision = {
  key?: string | null;
  perceive?: boolean;
  // model seconds this decision takes; defaults to `defaultThinkTime`
  think?: number;
  done?: boolean;
  label?: string | null;
};

export type RemoteController = {
  decide: (input: ControllerInput) => Promise<ControllerDecision>;
};

export class RemoteControllerEngine implements CognitiveEngine {
  private stimulus: SymbolMap | null = null;
  private lastMotor: MotorOutcome | null = null;
  private decisions = 0;

  constructor(
    private controller: RemoteController,
    private defaultThinkTime = 1,
  ) {}

  async step(ctx: EngineStepContext): Promise<StepResult> {
    const d = await this.controller.decide({
      agentId: ctx.agentId,
      actrTime: ctx.actrTime,
      stimulus: this.stimulus,
      lastMotor: this.lastMotor,
    });
    this.decisions += 1;
    this.lastMotor = null;

    const think = typeof d.think === 'number' && Number.isFinite(d.think) && d.think >= 0 ? d.think : this.defaultThinkTime;
    return {
      nextDueTime: ctx.actrTime + think,
      motorCommand: d.key ?? null,
      perceive: d.perceive ?? true,
      terminal: d.done === true,
      firedProduction: d.label ?? null,
    };
  }

  injectPerception(stimulus: SymbolMap): void {
    this.stimulus = stimulus;
  }

  injectMotorResult(outcome: MotorOutcome): void {
    this.lastMotor = outcome;
  }

  reset(): void {
    this.stimulus = null;
    this.lastMotor = null;
    this.decisions = 0;
  }

  inspect(): Record<string, unknown> {
    return { kind: 'remote', decisions: this.decisions, hasStimulus: this.stimulus !== null };
  }
}
