import { describe, expect, it } from 'vitest';

import { buildStateDump } from '@/lib/debug/buildStateDump';
import { GridWorld } from '@/lib/grid/gridWorld';
import { Simulation } from '@/lib/sim/simulation';
import { ScriptedEngine, everyInterval } from '@/lib/engines/scriptedEngine';

describe('buildStateDump', () => {
  it('captures agents, queue, grid and the most recent records', async () => {
    const world = new GridWorld(2, 3);
    const sim = new Simulation(world);
    sim.addAgent({ id: 'A', label: 'Ada', engine: new ScriptedEngine(everyInterval(1, 3)), position: { row: 0, col: 0 } });
    sim.addAgent({ id: 'B', engine: new ScriptedEngine(everyInterval(2, 3)), position: { row: 1, col: 2 }, startTime: 0.5 });

    await sim.step();
    await sim.step();
    await sim.step();
    const dump = buildStateDump(sim, { lastRecords: 2 });

    expect(dump.schema).toBe('CogridStateDumpV1');
    expect(dump.steppingAgentId).toBeNull();
    expect(dump.stepCount).toBe(3);
    expect(dump.queue).toEqual([
      { agentId: 'A', actrTime: 2, seq: 0 },
      { agentId: 'B', actrTime: 2.5, seq: 1 },
    ]);
    expect(dump.agents[0]).toEqual({
      id: 'A',
      label: 'Ada',
      type: 'agent',
      state: 'pending',
      actrTime: 2,
      seq: 0,
      steps: 2,
      position: { row: 0, col: 0 },
      failure: null,
      engine: { kind: 'scripted', cursor: 2, remaining: 1 },
    });
    expect(dump.level).toEqual([
      [['Ada'], [], []],
      [[], [], ['B']],
    ]);
    expect(dump.consistency).toEqual([]);
    expect(dump.lastRecords.map((r) => r.index)).toEqual([1, 2]);
  });
});
