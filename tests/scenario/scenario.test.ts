import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { buildSimulation, loadScenarioFile, normalizeScenario } from '@/lib/scenario';
import { createDefaultRegistry } from '@/lib/agents/builtinTypes';
import { ScenarioError } from '@/lib/errors';
import { stimulusTokens } from '@/lib/mediator/symbols';

const scenarioPath = (name: string) => fileURLToPath(new URL(`../../data/scenarios/${name}`, import.meta.url));

function problemsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (e) {
    if (e instanceof ScenarioError) return e.problems;
    throw e;
  }
  throw new Error('expected a ScenarioError');
}

describe('normalizeScenario', () => {
  it('fills in defaults', () => {
    const s = normalizeScenario({ rows: 3, cols: 4, agents: [{ id: 'a', type: 'Scripted', position: [1, 2] }] });

    expect(s).toEqual({
      id: 'scenario',
      title: 'scenario',
      seed: 1,
      rows: 3,
      cols: 4,
      layout: null,
      markers: [],
      agents: [{ id: 'a', type: 'Scripted', label: 'a', losRadius: 1, startTime: 0, position: { row: 1, col: 2 }, params: {} }],
      options: {},
    });
  });

  it('reports every problem at once', () => {
    expect(
      problemsOf(() =>
        normalizeScenario({
          seed: 'x',
          rows: 0,
          agents: [
            { id: 'a', type: 'Scripted', losRadius: -1 },
            { id: 'a', type: 'Scripted' },
          ],
        })
      )
    ).toEqual([
      'seed: seed must be a non-negative integer',
      'rows: rows must be a positive integer',
      'rows: either a layout or rows and cols are required',
      'agents[0].losRadius: losRadius must be a non-negative integer',
      'agents[1].id: duplicate agent id a',
    ]);
  });

  it('checks the size against the layout and agent cells against the grid', () => {
    expect(problemsOf(() => normalizeScenario({ layout: ['...'], rows: 2, agents: [] }))).toEqual([
      'rows: rows=2 disagrees with the layout (1)',
    ]);
    expect(
      problemsOf(() =>
        normalizeScenario({
          rows: 2,
          cols: 2,
          agents: [
            { id: 'a', type: 'Scripted', position: { row: 2, col: 0 } },
            { id: 'b', type: 'Scripted', position: { row: 1, col: 1 } },
            { id: 'c', type: 'Scripted', position: { row: 1, col: 1 } },
          ],
        })
      )
    ).toEqual(['agents.a.position: (2,0) is outside the 2x2 grid', 'agents.c.position: (1,1) is already taken by b']);
  });

  it('rejects non-object input', () => {
    expect(problemsOf(() => normalizeScenario(null))).toEqual(['scenario must be a JSON object']);
  });
});

describe('buildSimulation', () => {
  beforeEach(() => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs the 5x5 wall scenario from disk', async () => {
    const scenario = await loadScenarioFile(scenarioPath('wall-5x5.json'));
    const { sim } = buildSimulation(scenario, createDefaultRegistry());

    const report = await sim.run();
    const first = sim.records[0];

    expect(report).toMatchObject({ reason: 'all-blocked', steps: 3, finalTime: 1 });
    expect(first.motor?.token).toBe('failure:occupied');
    expect(first.stimulus && stimulusTokens(first.stimulus)).toEqual([
      'empty@-1,-1',
      'empty@-1,0',
      'empty@-1,1',
      'empty@0,-1',
      'self@0,0',
      'wall@0,1',
      'empty@1,-1',
      'empty@1,0',
      'empty@1,1',
    ]);
    expect(sim.world.positionOf('a1')).toEqual({ row: 2, col: 2 });
  });

  it('places humans without scheduling them and is deterministic per seed', async () => {
    const scenario = await loadScenarioFile(scenarioPath('wanderers.json'));
    const runOnce = async () => {
      const built = buildSimulation(scenario, createDefaultRegistry());
      const report = await built.sim.run();
      return { built, report, grid: built.sim.world.snapshot() };
    };

    const a = await runOnce();
    const b = await runOnce();

    expect(a.built.external).toEqual(['p1']);
    expect(a.built.sim.agentList().map((x) => x.id)).toEqual(['w1', 'w2']);
    expect(a.built.sim.world.positionOf('p1')).toEqual({ row: 5, col: 8 });
    expect(a.report).toMatchObject({ reason: 'all-blocked', steps: 28 });
    expect(b.grid).toEqual(a.grid);
    expect(b.built.sim.records.map((r) => r.motor?.token ?? null)).toEqual(a.built.sim.records.map((r) => r.motor?.token ?? null));
  });

  it('merges option overrides over the scenario options', () => {
    const scenario = normalizeScenario({ rows: 1, cols: 1, agents: [], options: { speedFactor: 2, maxSteps: 9 } });
    const { sim } = buildSimulation(scenario, createDefaultRegistry(), { options: { maxSteps: 1 } });

    expect(sim.options.speedFactor).toBe(2);
    expect(sim.options.maxSteps).toBe(1);
  });

  it('rejects unknown types, blocked cells and overfull layouts', () => {
    const reg = createDefaultRegistry();

    expect(problemsOf(() => buildSimulation(normalizeScenario({ rows: 1, cols: 1, agents: [{ id: 'r', type: 'Robot' }] }), reg))).toEqual([
      'agents.r.type: unknown agent type "Robot" (known: Human, Scripted, Wanderer)',
    ]);
    expect(
      problemsOf(() =>
        buildSimulation(normalizeScenario({ layout: ['#.'], agents: [{ id: 'a', type: 'Scripted', position: [0, 0] }] }), reg)
      )
    ).toEqual(['agents.a.position: (0,0) is occupied by wall@0,0']);
    expect(
      problemsOf(() =>
        buildSimulation(
          normalizeScenario({ layout: ['#.'], agents: [{ id: 'a', type: 'Scripted' }, { id: 'b', type: 'Scripted' }] }),
          reg
        )
      )
    ).toEqual(['agents: not enough free cells: 2 agents for 1 cells']);
    expect(problemsOf(() => buildSimulation(normalizeScenario({ layout: ['.?'], agents: [] }), reg))).toEqual([
      'layout: unknown layout symbol "?" at (0,1)',
    ]);
  });
});

describe('loadScenarioFile', () => {
  it('reports invalid JSON with the file path', async () => {
    const dir = await mkdtemp(path.join(tmpdir(), 'scenario-'));
    const file = path.join(dir, 'broken.json');
    await writeFile(file, '{ "rows": ', 'utf8');

    const err = await loadScenarioFile(file).then(
      () => null,
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(ScenarioError);
    expect(err instanceof ScenarioError ? err.problems[0].startsWith(`${file}: invalid JSON`) : false).toBe(true);
  });
});
