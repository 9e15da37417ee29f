import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import seedrandom from 'seedrandom';

import { AgentTypeRegistry, HUMAN_TYPE } from '@/lib/agents/agentTypeRegistry';
import { createDefaultRegistry, freeMoveKeys } from '@/lib/agents/builtinTypes';
import { AgentEvents } from '@/lib/agents/agentEvents';
import { GridWorld } from '@/lib/grid/gridWorld';
import { Middleman } from '@/lib/mediator/middleman';
import { Simulation } from '@/lib/sim/simulation';
import { ScriptedEngine } from '@/lib/engines/scriptedEngine';

const env = (params: Record<string, unknown> = {}) => ({ agentId: 'x', params, rng: seedrandom('registry') });

describe('AgentTypeRegistry', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('resolves Human to null and lists the built-in types', () => {
    const reg = createDefaultRegistry();

    expect(reg.types()).toEqual([HUMAN_TYPE, 'Scripted', 'Wanderer']);
    expect(reg.resolve('Human')).toBeNull();
    expect(reg.create('Human', env())).toBeNull();
    expect(reg.has('Human')).toBe(true);
  });

  it('falls back to a case-insensitive match and caches it', () => {
    const reg = createDefaultRegistry();
    const exact = reg.resolve('Scripted');

    expect(reg.resolve('scripted')).toBe(exact);
    expect(reg.resolve('SCRIPTED')).toBe(exact);
    expect(reg.has('wanderer')).toBe(true);
  });

  it('names the known types when a type is unknown', () => {
    const reg = createDefaultRegistry();
    expect(() => reg.resolve('Robot')).toThrow('unknown agent type "Robot"; registered types: Human, Scripted, Wanderer');
    expect(reg.has('Robot')).toBe(false);
  });

  it('reserves Human and warns on redefinition', () => {
    const reg = new AgentTypeRegistry();
    const def = { engine: () => new ScriptedEngine([]) };

    expect(() => reg.register('Human', def)).toThrow(RangeError);
    reg.register('Bot', def).register('Bot', def);
    expect(console.warn).toHaveBeenCalledWith('[agents]', 'agent type Bot re-registered; previous definition replaced');
  });

  it('builds scripted engines from parameters', async () => {
    const kit = createDefaultRegistry().create('Scripted', env({ interval: 0.5, count: 1, key: 'W' }));
    const ctx = { agentId: 'x', actrTime: 1, events: new AgentEvents() };

    expect(kit?.adapters).toEqual([]);
    expect(await kit?.engine.step(ctx)).toEqual({ motorCommand: 'W', perceive: true, nextDueTime: 1.5 });
  });
});

describe('Wanderer', () => {
  it('looks before every move and only walks into free cells', async () => {
    const world = new GridWorld(3, 3);
    const sim = new Simulation(world);
    const kit = createDefaultRegistry().create('Wanderer', env({ moves: 2 }));
    if (!kit) throw new Error('Wanderer must build an engine');
    sim.addAgent({ id: 'w', engine: kit.engine, position: { row: 1, col: 1 } });
    for (const a of kit.adapters) sim.attachAdapter('w', a);

    const report = await sim.run();

    expect(sim.records.map((r) => r.firedProduction)).toEqual(['look', 'step', 'look', 'step', 'look', 'rest']);
    expect(sim.records.filter((r) => r.motor).map((r) => r.motor?.token)).toEqual(['moved', 'moved']);
    expect(report).toMatchObject({ reason: 'all-blocked', steps: 6 });
  });

  it('lists keys whose target cell is visible and empty', () => {
    const world = new GridWorld(2, 2);
    world.place({ id: 'me', label: 'me', kind: 'agent', opaque: false }, { row: 0, col: 0 });
    world.place({ id: 'rock', label: 'rock', kind: 'obstacle', opaque: false }, { row: 0, col: 1 });
    const view = new Middleman(world).getAgentStimulus({ id: 'me', losRadius: 1, visualStimuli: {}, lastMotor: null });

    expect(freeMoveKeys(view, ['W', 'A', 'S', 'D'])).toEqual(['S']);
    expect(freeMoveKeys(null, ['W'])).toEqual([]);
  });
});
