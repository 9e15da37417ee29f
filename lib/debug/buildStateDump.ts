// lib/debug/buildStateDump.ts
// Plain-JSON picture of a simulation, attached to fatal scheduler errors and
// offered by the debugger panel.
//
// Must not import the Simulation class at runtime (it imports this file).

import type { Simulation } from '../sim/simulation';
import type { AgentState } from '../agents/types';
import type { ScheduleEntry } from '../sim/scheduleQueue';
import type { StepRecord } from '../sim/types';
import { errorMessage } from '../errors';

export type AgentDump = {
  id: string;
  label: string;
  type: string;
  state: AgentState;
  actrTime: number;
  seq: number;
  steps: number;
  position: { row: number; col: number } | null;
  failure: string | null;
  engine: Record<string, unknown>;
};

export type StateDump = {
  schema: 'CogridStateDumpV1';
  exportedAt: string;
  steppingAgentId: string | null;
  stepCount: number;
  agents: AgentDump[];
  externalAgents: string[];
  queue: ScheduleEntry[];
  level: string[][][];
  consistency: string[];
  lastRecords: StepRecord[];
};

export function buildStateDump(sim: Simulation, opts: { lastRecords?: number } = {}): StateDump {
  const keep = opts.lastRecords ?? 10;
  const agents = sim.agentList().map((a): AgentDump => {
    let engine: Record<string, unknown> = {};
    try {
      engine = a.engine.inspect?.() ?? {};
    } catch (e) {
      engine = { error: errorMessage(e) };
    }
    return {
      id: a.id,
      label: a.label,
      type: a.type,
      state: a.state,
      actrTime: a.clock.actrTime,
      seq: a.clock.seq,
      steps: a.steps,
      position: sim.world.has(a.id) ? sim.world.positionOf(a.id) : null,
      failure: a.failure ? errorMessage(a.failure.error) : null,
      engine,
    };
  });

  return {
    schema: 'CogridStateDumpV1',
    exportedAt: new Date().toISOString(),
    steppingAgentId: sim.steppingAgentId,
    stepCount: sim.stepCount,
    agents,
    externalAgents: sim.externalAgentIds(),
    queue: sim.pending(),
    level: sim.world.levelMatrix(),
    consistency: sim.world.checkConsistency(),
    lastRecords: keep > 0 ? sim.records.slice(-keep) : [],
  };
}
