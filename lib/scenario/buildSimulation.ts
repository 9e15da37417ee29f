// lib/scenario/buildSimulation.ts
// Scenario -> ready-to-run Simulation: grid, agents (in scenario order), adapters.

import seedrandom from 'seedrandom';
import { GridWorld } from '../grid/gridWorld';
import { parseLayout, shuffledFreeCells, type Rng } from '../grid/levelBuilder';
import { coordKey, type Coord } from '../grid/types';
import type { AgentTypeRegistry } from '../agents/agentTypeRegistry';
import { Simulation, type SimulationDeps } from '../sim/simulation';
import { ScenarioError, errorMessage } from '../errors';
import type { Scenario } from './types';
import { makeLog } from '../util/log';

const log = makeLog('scenario');

export type BuildSimulationOptions = {
  // merged over the scenario's own options
  options?: Record<string, unknown>;
  deps?: SimulationDeps;
};

export type BuiltScenario = {
  sim: Simulation;
  scenario: Scenario;
  rng: Rng;
  // agents controlled from outside (type 'Human')
  external: string[];
};

function buildWorld(s: Scenario): GridWorld {
  try {
    const world = s.layout ? parseLayout(s.layout) : new GridWorld(s.rows, s.cols);
    for (const m of s.markers) {
      world.addMarker({ row: m.row, col: m.col }, { id: `${m.label}@${m.row},${m.col}`, label: m.label });
    }
    world.takeChanges();
    return world;
  } catch (e) {
    throw new ScenarioError([`layout: ${errorMessage(e)}`]);
  }
}

export function buildSimulation(
  scenario: Scenario,
  registry: AgentTypeRegistry,
  opts: BuildSimulationOptions = {}
): BuiltScenario {
  const unknown = scenario.agents.filter((a) => !registry.has(a.type));
  if (unknown.length) {
    throw new ScenarioError(
      unknown.map((a) => `agents.${a.id}.type: unknown agent type "${a.type}" (known: ${registry.types().join(', ')})`)
    );
  }

  const world = buildWorld(scenario);
  const rng = seedrandom(String(scenario.seed));

  // explicit cells first, then random free cells for the rest
  const fixed = new Set<string>();
  const problems: string[] = [];
  for (const a of scenario.agents) {
    if (!a.position) continue;
    const occupant = world.query(a.position).occupant;
    if (occupant) problems.push(`agents.${a.id}.position: (${a.position.row},${a.position.col}) is occupied by ${occupant.id}`);
    fixed.add(coordKey(a.position));
  }
  const pool = shuffledFreeCells(world, rng).filter((c) => !fixed.has(coordKey(c)));
  const needed = scenario.agents.filter((a) => !a.position).length;
  if (needed > pool.length) problems.push(`agents: not enough free cells: ${needed} agents for ${pool.length} cells`);
  if (problems.length) throw new ScenarioError(problems);

  const sim = new Simulation(world, { ...scenario.options, ...(opts.options ?? {}) }, opts.deps);
  const external: string[] = [];
  let next = 0;
  for (const a of scenario.agents) {
    const position: Coord = a.position ?? pool[next++];
    const kit = registry.create(a.type, { agentId: a.id, params: a.params, rng });
    if (!kit) {
      sim.addExternalAgent(a.id, position, a.label);
      external.push(a.id);
      continue;
    }
    sim.addAgent({
      id: a.id,
      label: a.label,
      type: a.type,
      engine: kit.engine,
      losRadius: a.losRadius,
      startTime: a.startTime,
      position,
    });
    for (const adapter of kit.adapters) sim.attachAdapter(a.id, adapter);
  }

  log.info(`scenario ${scenario.id}: ${scenario.rows}x${scenario.cols}, ${scenario.agents.length} agents, seed ${scenario.seed}`);
  return { sim, scenario, rng, external };
}
