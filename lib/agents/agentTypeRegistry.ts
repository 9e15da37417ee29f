// lib/agents/agentTypeRegistry.ts
// Logical agent type name -> engine (+ adapters) factory.
//
// 'Human' is reserved: it resolves to null, meaning the entity is placed on the grid
// but driven from outside (Simulation.externalInput) and never scheduled.

import type { AgentAdapter, CognitiveEngine } from './types';
import type { Rng } from '../grid/levelBuilder';
import { makeLog } from '../util/log';

const log = makeLog('agents');

export const HUMAN_TYPE = 'Human';

export type AgentTypeEnv = {
  agentId: string;
  // free-form per-agent parameters from the scenario
  params: Record<string, unknown>;
  rng: Rng;
};

export type AgentKit = {
  engine: CognitiveEngine;
  adapters: AgentAdapter[];
};

export type AgentTypeDefinition = {
  engine: (env: AgentTypeEnv) => CognitiveEngine;
  adapters?: Array<(env: AgentTypeEnv) => AgentAdapter>;
  description?: string;
};

export class AgentTypeRegistry {
  private defs = new Map<string, AgentTypeDefinition>();
  // requested name -> canonical registered name
  private cache = new Map<string, string>();

  register(name: string, def: AgentTypeDefinition): this {
    if (!name.trim()) throw new RangeError('agent type name must be a non-empty string');
    if (name === HUMAN_TYPE) throw new RangeError(`"${HUMAN_TYPE}" is reserved for externally controlled agents`);
    if (this.defs.has(name)) log.warn(`agent type ${name} re-registered; previous definition replaced`);
    this.defs.set(name, def);
    this.cache.clear();
    return this;
  }

  has(name: string): boolean {
    return name === HUMAN_TYPE || this.lookup(name) !== null;
  }

  types(): string[] {
    return [HUMAN_TYPE, ...this.defs.keys()];
  }

  /**
   * Definition for `name` (exact match, then case-insensitive). Null for 'Human'.
   * Throws for names that resolve to nothing.
   */
  resolve(name: string): AgentTypeDefinition | null {
    if (name === HUMAN_TYPE) return null;
    const def = this.lookup(name);
    if (!def) {
      throw new RangeError(`unknown agent type "${name}"; registered types: ${this.types().join(', ')}`);
    }
    return def;
  }

  create(name: string, env: AgentTypeEnv): AgentKit | null {
    const def = this.resolve(name);
    if (!def) return null;
    return {
      engine: def.engine(env),
      adapters: (def.adapters ?? []).map((make) => make(env)),
    };
  }

  private lookup(name: string): AgentTypeDefinition | null {
    const cached = this.cache.get(name);
    if (cached !== undefined) return this.defs.get(cached) ?? null;

    let canonical: string | null = this.defs.has(name) ? name : null;
    if (canonical === null) {
      const lower = name.toLowerCase();
      canonical = Array.from(this.defs.keys()).find((k) => k.toLowerCase() === lower) ?? null;
    }
    if (canonical === null) return null;
    this.cache.set(name, canonical);
    return this.defs.get(canonical) ?? null;
  }
}
