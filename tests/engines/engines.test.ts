import { describe, expect, it } from 'vitest';

import { ScriptedEngine, everyInterval } from '@/lib/engines/scriptedEngine';
import { RemoteControllerEngine, type ControllerInput } from '@/lib/engines/remoteControllerEngine';
import { AgentEvents } from '@/lib/agents/agentEvents';
import type { SymbolMap } from '@/lib/mediator/symbols';

const ctx = (actrTime: number) => ({ agentId: 'x', actrTime, events: new AgentEvents() });

describe('ScriptedEngine', () => {
  it('replays its script and then reports itself finished', async () => {
    const engine = new ScriptedEngine([{ nextDueTime: 1, motorCommand: 'W' }, ...everyInterval(0.5, 1)]);

    expect(await engine.step(ctx(0))).toEqual({ nextDueTime: 1, motorCommand: 'W' });
    expect(await engine.step(ctx(1))).toEqual({ nextDueTime: 1.5 });
    expect(await engine.step(ctx(1.5))).toEqual({ nextDueTime: 1.5, terminal: true });
    expect(engine.inspect()).toEqual({ kind: 'scripted', cursor: 2, remaining: 0 });

    engine.reset();
    expect(engine.inspect()).toEqual({ kind: 'scripted', cursor: 0, remaining: 2 });
  });

  it('passes extra fields through everyInterval', () => {
    const [first] = everyInterval(2, 1, { perceive: true });
    const result = typeof first === 'function' ? first(ctx(3)) : first;
    expect(result).toEqual({ perceive: true, nextDueTime: 5 });
  });
});

describe('RemoteControllerEngine', () => {
  it('awaits the controller and maps its decision onto a step result', async () => {
    const inputs: ControllerInput[] = [];
    const engine = new RemoteControllerEngine({
      decide: async (input) => {
        inputs.push(input);
        return inputs.length === 1 ? { key: 'S', think: 0.3, label: 'explore' } : { done: true };
      },
    });

    expect(await engine.step(ctx(0))).toEqual({
      nextDueTime: 0.3,
      motorCommand: 'S',
      perceive: true,
      terminal: false,
      firedProduction: 'explore',
    });

    const view: SymbolMap = {};
    engine.injectPerception(view);
    engine.injectMotorResult({ ok: true, key: 'S', token: 'moved', from: { row: 0, col: 0 }, to: { row: 1, col: 0 } });
    const last = await engine.step(ctx(0.3));

    expect(last.nextDueTime).toBeCloseTo(1.3, 10);
    expect(last).toMatchObject({ terminal: true, motorCommand: null });
    expect(inputs[1].stimulus).toBe(view);
    expect(inputs[1].lastMotor?.token).toBe('moved');
    expect(engine.inspect()).toEqual({ kind: 'remote', decisions: 2, hasStimulus: true });
  });

  it('falls back to the default think time for invalid values', async () => {
    const engine = new RemoteControllerEngine({ decide: async () => ({ think: -1 }) }, 2);
    expect((await engine.step(ctx(1))).nextDueTime).toBe(3);
  });
});
