// lib/engines/productionEngine.ts
// Small built-in production-system engine.
//
// One step = one production firing. Conflict resolution picks the highest utility;
// equal utilities fall back to registration order. Each firing costs `firingTime`
// model seconds plus the production's `extraTime` (motor, retrieval latency).

import type { CognitiveEngine, EngineStepContext, StepResult } from '../agents/types';
import type { MotorOutcome, SymbolMap } from '../mediator/symbols';
import { chunkMatches, chunkToString, cloneChunk, type Chunk, type ChunkPattern } from './chunks';
import { makeLog } from '../util/log';

const log = makeLog('engine');

export const IMAGINAL_BUFFER = 'imaginal';
export const DEFAULT_FIRING_TIME = 0.05;

export type ProductionView = {
  actrTime: number;
  goal: Chunk | null;
  buffer: (name: string) => Chunk | null;
  // latest SymbolMap, kept until the next perception
  visual: SymbolMap | null;
  // motor outcome injected since the previous step, if any
  lastMotor: MotorOutcome | null;
  retrieve: (pattern: ChunkPattern) => Chunk | null;
};

export type ProductionEffects = {
  goal?: Chunk | null;
  buffers?: Record<string, Chunk | null>;
  press?: string;
  perceive?: boolean;
  remember?: Chunk;
  stop?: boolean;
};

export type Production = {
  name: string;
  utility?: number;
  extraTime?: number;
  when: (view: ProductionView) => boolean;
  then: (view: ProductionView) => ProductionEffects;
};

type ProductionEntry = Production & { utility: number };

export type ProductionEngineOptions = {
  goal?: Chunk | null;
  buffers?: string[];
  productions?: Production[];
  memory?: Chunk[];
  firingTime?: number;
  // what to do when nothing matches: stop the agent, or poll again after `idleTime`
  noMatch?: 'terminal' | 'idle';
  idleTime?: number;
};

export class ProductionEngine implements CognitiveEngine {
  private goal: Chunk | null;
  private buffers = new Map<string, Chunk | null>();
  private productions = new Map<string, ProductionEntry>();
  private memory: Chunk[];
  private visual: SymbolMap | null = null;
  private lastMotor: MotorOutcome | null = null;
  private lastFired: string | null = null;

  private readonly firingTime: number;
  private readonly noMatch: 'terminal' | 'idle';
  private readonly idleTime: number;
  private readonly initial: ProductionEngineOptions;

  constructor(opts: ProductionEngineOptions = {}) {
    this.initial = opts;
    this.firingTime = opts.firingTime ?? DEFAULT_FIRING_TIME;
    this.noMatch = opts.noMatch ?? 'terminal';
    this.idleTime = opts.idleTime ?? DEFAULT_FIRING_TIME;
    this.goal = cloneChunk(opts.goal ?? null);
    this.memory = (opts.memory ?? []).map((c) => ({ isa: c.isa, slots: { ...c.slots } }));
    for (const name of opts.buffers ?? [IMAGINAL_BUFFER]) this.buffers.set(name, null);
    for (const p of opts.productions ?? []) this.addProduction(p);
  }

  step(ctx: EngineStepContext): StepResult {
    const view = this.view(ctx.actrTime);
    this.lastMotor = null;

    let pick: ProductionEntry | null = null;
    for (const p of this.productions.values()) {
      if (!p.when(view)) continue;
      if (!pick || p.utility > pick.utility) pick = p;
    }

    if (!pick) {
      this.lastFired = null;
      if (this.noMatch === 'terminal') return { nextDueTime: ctx.actrTime, terminal: true };
      return { nextDueTime: ctx.actrTime + this.idleTime };
    }

    const fx = pick.then(view);
    this.lastFired = pick.name;
    log.debug(`${ctx.agentId} t=${ctx.actrTime.toFixed(3)} fired ${pick.name}`);

    if (fx.goal !== undefined) {
      const before = cloneChunk(this.goal);
      this.goal = cloneChunk(fx.goal);
      ctx.events.emit('goal-changed', { agentId: ctx.agentId, actrTime: ctx.actrTime, before, after: cloneChunk(this.goal) });
    }
    for (const [name, chunk] of Object.entries(fx.buffers ?? {})) {
      const before = this.buffers.get(name) ?? null;
      if (!this.setImaginal(chunk, name)) continue;
      ctx.events.emit('imaginal-changed', {
        agentId: ctx.agentId,
        actrTime: ctx.actrTime,
        buffer: name,
        before,
        after: cloneChunk(chunk),
      });
    }
    if (fx.remember) this.addToDeclarativeMemory(fx.remember);

    return {
      nextDueTime: ctx.actrTime + this.firingTime + (pick.extraTime ?? 0),
      firedProduction: pick.name,
      motorCommand: fx.press ?? null,
      perceive: fx.perceive === true,
      terminal: fx.stop === true,
    };
  }

  injectPerception(stimulus: SymbolMap): void {
    this.visual = stimulus;
  }

  injectMotorResult(outcome: MotorOutcome): void {
    this.lastMotor = outcome;
  }

  reset(): void {
    const o = this.initial;
    this.goal = cloneChunk(o.goal ?? null);
    this.memory = (o.memory ?? []).map((c) => ({ isa: c.isa, slots: { ...c.slots } }));
    this.buffers.clear();
    for (const name of o.buffers ?? [IMAGINAL_BUFFER]) this.buffers.set(name, null);
    this.productions.clear();
    for (const p of o.productions ?? []) this.addProduction(p);
    this.visual = null;
    this.lastMotor = null;
    this.lastFired = null;
  }

  inspect(): Record<string, unknown> {
    return {
      kind: 'production',
      goal: chunkToString(this.goal),
      buffers: Object.fromEntries(Array.from(this.buffers, ([k, v]) => [k, chunkToString(v)])),
      productions: this.productions.size,
      memory: this.memory.length,
      lastFired: this.lastFired,
    };
  }

  // --- goal and imaginal buffers

  getGoal(): Chunk | null {
    return cloneChunk(this.goal);
  }

  setGoal(chunk: Chunk | null): void {
    this.goal = cloneChunk(chunk);
  }

  getImaginal(name: string = IMAGINAL_BUFFER): Chunk | null {
    if (!this.buffers.has(name)) {
      log.warn(`buffer '${name}' not found. Available buffers: ${Array.from(this.buffers.keys()).join(', ')}`);
      return null;
    }
    return cloneChunk(this.buffers.get(name) ?? null);
  }

  /** Returns false (and leaves buffers untouched) for an undeclared buffer. */
  setImaginal(chunk: Chunk | null, name: string = IMAGINAL_BUFFER): boolean {
    if (!this.buffers.has(name)) {
      log.warn(`buffer '${name}' not found. Available buffers: ${Array.from(this.buffers.keys()).join(', ')}`);
      return false;
    }
    this.buffers.set(name, cloneChunk(chunk));
    return true;
  }

  // --- productions

  addProduction(p: Production): void {
    this.productions.set(p.name, { ...p, utility: p.utility ?? 0 });
  }

  updateUtility(name: string, utility: number): void {
    const p = this.productions.get(name);
    if (!p) throw new RangeError(`unknown production ${name}`);
    p.utility = utility;
  }

  getProductionUtility(name: string): number | null {
    return this.productions.get(name)?.utility ?? null;
  }

  /** Copy of production metadata; mutating it does not affect the engine. */
  getAllProductions(): Record<string, { utility: number; extraTime: number }> {
    const out: Record<string, { utility: number; extraTime: number }> = {};
    for (const [name, p] of this.productions) out[name] = { utility: p.utility, extraTime: p.extraTime ?? 0 };
    return out;
  }

  // --- declarative memory

  addToDeclarativeMemory(chunk: Chunk): void {
    this.memory.push({ isa: chunk.isa, slots: { ...chunk.slots } });
  }

  getDeclarativeMemory(): Chunk[] {
    return this.memory.map((c) => ({ isa: c.isa, slots: { ...c.slots } }));
  }

  getDeclarativeChunkType(isa: string): Chunk[] {
    return this.getDeclarativeMemory().filter((c) => c.isa === isa);
  }

  deleteDeclarativeChunkType(isa: string): number {
    const before = this.memory.length;
    this.memory = this.memory.filter((c) => c.isa !== isa);
    return before - this.memory.length;
  }

  private view(actrTime: number): ProductionView {
    return {
      actrTime,
      goal: cloneChunk(this.goal),
      buffer: (name) => cloneChunk(this.buffers.get(name) ?? null),
      visual: this.visual,
      lastMotor: this.lastMotor,
      // most recent matching chunk wins
      retrieve: (pattern) => {
        for (let i = this.memory.length - 1; i >= 0; i--) {
          if (chunkMatches(this.memory[i], pattern)) return cloneChunk(this.memory[i]);
        }
        return null;
      },
    };
  }
}
