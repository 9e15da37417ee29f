// lib/agents/builtinTypes.ts
// Agent types available to scenarios without extra registration.

import { AgentTypeRegistry, type AgentTypeEnv } from './agentTypeRegistry';
import type { AgentAdapter } from './types';
import { ScriptedEngine, everyInterval } from '../engines/scriptedEngine';
import { ProductionEngine } from '../engines/productionEngine';
import { buildChunk, type Chunk } from '../engines/chunks';
import { DEFAULT_KEY_MAP, TOKEN_SELF, type SymbolMap } from '../mediator/symbols';
import { makeLog } from '../util/log';

const log = makeLog('agents');

function numParam(params: Record<string, unknown>, key: string, fb: number): number {
  const v = params[key];
  return typeof v === 'number' && Number.isFinite(v) && v >= 0 ? v : fb;
}

function keyParam(params: Record<string, unknown>, key: string): string | null {
  const v = params[key];
  return typeof v === 'string' && v ? v : null;
}

/** Logs every production the agent fires (debug level). */
export function traceAdapter(): AgentAdapter {
  return {
    id: 'trace',
    attach: (ctx) =>
      ctx.events.on('production-fired', (p) => {
        log.debug(`${p.agentId} t=${p.actrTime.toFixed(3)} ${p.production}`);
      }),
  };
}

/** Keys whose target cell is visible and free, given the last SymbolMap. */
export function freeMoveKeys(visual: SymbolMap | null, keys: readonly string[]): string[] {
  if (!visual) return [];
  const self = Object.values(visual).find((e) => e.token === TOKEN_SELF);
  if (!self) return [];
  return keys.filter((k) => {
    const d = DEFAULT_KEY_MAP[k];
    if (!d) return false;
    const target = visual[`${self.row + d.dRow},${self.col + d.dCol}`];
    return target !== undefined && target.occupantId === null && target.token !== 'occluded';
  });
}

const WANDER_KEYS = ['W', 'A', 'S', 'D'];

function wanderGoal(state: string, moves: number): Chunk {
  return buildChunk([
    ['isa', 'wander'],
    ['state', state],
    ['moves', moves],
  ]);
}

/**
 * Look, pick a random free neighbour, step; `moves` times, then stop.
 */
export function makeWanderer(env: AgentTypeEnv): ProductionEngine {
  const maxMoves = numParam(env.params, 'moves', 10);
  const moveTime = numParam(env.params, 'moveTime', 0.25);
  const movesOf = (g: Chunk | null) => (typeof g?.slots.moves === 'number' ? g.slots.moves : 0);

  return new ProductionEngine({
    goal: wanderGoal('look', 0),
    productions: [
      {
        name: 'look',
        when: (v) => v.goal?.slots.state === 'look',
        then: (v) => ({ perceive: true, goal: wanderGoal('decide', movesOf(v.goal)) }),
      },
      {
        name: 'step',
        extraTime: moveTime,
        when: (v) => v.goal?.slots.state === 'decide' && movesOf(v.goal) < maxMoves,
        then: (v) => {
          const free = freeMoveKeys(v.visual, WANDER_KEYS);
          const pool = free.length ? free : WANDER_KEYS;
          const key = pool[Math.floor(env.rng() * pool.length) % pool.length];
          return { press: key, goal: wanderGoal('look', movesOf(v.goal) + 1) };
        },
      },
      {
        name: 'rest',
        when: (v) => v.goal?.slots.state === 'decide' && movesOf(v.goal) >= maxMoves,
        then: () => ({ stop: true }),
      },
    ],
  });
}

export function createDefaultRegistry(): AgentTypeRegistry {
  return new AgentTypeRegistry()
    .register('Scripted', {
      description: 'steps every `interval` seconds `count` times, optionally pressing `key`',
      engine: ({ params }) =>
        new ScriptedEngine(
          everyInterval(numParam(params, 'interval', 1), numParam(params, 'count', 1), {
            motorCommand: keyParam(params, 'key'),
            perceive: params['perceive'] !== false,
          })
        ),
    })
    .register('Wanderer', {
      description: 'random walk over free neighbouring cells',
      engine: makeWanderer,
      adapters: [() => traceAdapter()],
    });
}
