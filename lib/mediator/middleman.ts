// lib/mediator/middleman.ts
// Mediator between agent-local symbolic I/O and the shared grid.
//
// Perception: line-of-sight view around the agent, encoded as a SymbolMap and stored
// in the agent's own `visualStimuli`.
// Motor: key symbol -> grid delta -> GridWorld.move. Cell and command errors are
// returned as failure outcomes; they never escape as exceptions.

import type { GridWorld } from '../grid/gridWorld';
import type { Coord, Delta } from '../grid/types';
import { coordKey } from '../grid/types';
import { visibleCells } from '../grid/lineOfSight';
import {
  OccupiedCellError,
  OutOfBoundsError,
  SchedulerInvariantError,
  UnknownCommandError,
} from '../errors';
import type { SimAgent } from '../agents/types';
import {
  DEFAULT_KEY_MAP,
  TOKEN_EMPTY,
  TOKEN_OCCLUDED,
  TOKEN_SELF,
  type KeyMap,
  type MotorOutcome,
  type StimulusEntry,
  type SymbolMap,
} from './symbols';
import { makeLog } from '../util/log';

const log = makeLog('mediator');

export type MediatedAgent = Pick<SimAgent, 'id' | 'losRadius' | 'visualStimuli' | 'lastMotor'>;

export type MiddlemanOptions = {
  keyMap?: KeyMap;
  // When set, only the agent for which this returns true may perceive or act.
  isStepping?: (agentId: string) => boolean;
};

export class Middleman {
  readonly world: GridWorld;
  private keyMap: KeyMap;
  private readonly isStepping: ((agentId: string) => boolean) | null;

  constructor(world: GridWorld, opts: MiddlemanOptions = {}) {
    this.world = world;
    this.keyMap = { ...(opts.keyMap ?? DEFAULT_KEY_MAP) };
    this.isStepping = opts.isStepping ?? null;
  }

  keys(): string[] {
    return Object.keys(this.keyMap);
  }

  /** Resolves a key symbol: exact match first, then upper/lower case variants. */
  resolveKey(key: string): Delta {
    for (const k of [key, key.toUpperCase(), key.toLowerCase()]) {
      if (Object.hasOwn(this.keyMap, k)) return { ...this.keyMap[k] };
    }
    throw new UnknownCommandError(key);
  }

  getAgentStimulus(agent: MediatedAgent): SymbolMap {
    this.guard(agent.id, 'perceive');
    const origin = this.world.positionOf(agent.id);
    const vis = visibleCells(this.world, origin, agent.losRadius);
    const occluded = new Set(vis.occluded.map(coordKey));

    const cells = [...vis.visible, ...vis.occluded].sort((a, b) => a.row - b.row || a.col - b.col);
    const map: SymbolMap = {};
    for (const c of cells) {
      map[coordKey(c)] = occluded.has(coordKey(c)) ? occludedEntry(origin, c) : this.encodeCell(origin, c);
    }

    agent.visualStimuli = map;
    return map;
  }

  motorInput(agent: MediatedAgent, key: string): MotorOutcome {
    this.guard(agent.id, 'act');
    let outcome: MotorOutcome;
    try {
      const delta = this.resolveKey(key);
      const { from, to } = this.world.move(agent.id, delta);
      outcome = { ok: true, key, token: 'moved', from, to };
    } catch (e) {
      if (e instanceof OccupiedCellError) {
        outcome = { ok: false, key, token: 'failure:occupied', reason: 'occupied', at: e.cell, error: e };
      } else if (e instanceof OutOfBoundsError) {
        outcome = { ok: false, key, token: 'failure:out-of-bounds', reason: 'out-of-bounds', at: e.cell, error: e };
      } else if (e instanceof UnknownCommandError) {
        outcome = { ok: false, key, token: 'failure:unknown-command', reason: 'unknown-command', at: null, error: e };
      } else {
        throw e;
      }
      log.debug(`${agent.id} ${key}: ${outcome.error.message}`);
    }
    agent.lastMotor = outcome;
    return outcome;
  }

  private encodeCell(origin: Coord, c: Coord): StimulusEntry {
    const contents = this.world.query(c);
    const markers = contents.markers.map((m) => m.label);
    const isOrigin = c.row === origin.row && c.col === origin.col;
    const token = isOrigin ? TOKEN_SELF : contents.occupant?.label ?? markers[0] ?? TOKEN_EMPTY;
    return {
      token,
      row: c.row,
      col: c.col,
      dRow: c.row - origin.row,
      dCol: c.col - origin.col,
      occupantId: contents.occupant?.id ?? null,
      markers,
    };
  }

  private guard(agentId: string, what: string) {
    if (this.isStepping && !this.isStepping(agentId)) {
      throw new SchedulerInvariantError(`${agentId} tried to ${what} outside its own step`);
    }
  }
}

function occludedEntry(origin: Coord, c: Coord): StimulusEntry {
  return {
    token: TOKEN_OCCLUDED,
    row: c.row,
    col: c.col,
    dRow: c.row - origin.row,
    dCol: c.col - origin.col,
    occupantId: null,
    markers: [],
  };
}
