// lib/sim/simulation.ts
// Time-aware multi-agent scheduler over one shared grid.
//
// One logical thread of control: the agent with the earliest due time (ties: the
// one registered first) is the only agent in 'stepping' state, and the only one the
// mediator will act for. Engine steps are awaited to completion (bounded by the step
// timeout) before anything else is selected. Real-time pacing and the single-step
// gate are the only suspension points between steps.

import type { GridWorld } from '../grid/gridWorld';
import type { Coord, GridSnapshot } from '../grid/types';
import { Middleman } from '../mediator/middleman';
import type { MotorOutcome, SymbolMap } from '../mediator/symbols';
import { AgentEvents } from '../agents/agentEvents';
import { advanceClock, makeClock } from '../agents/agentClock';
import type { AdapterContext, AgentAdapter, CognitiveEngine, SimAgent, StepResult } from '../agents/types';
import {
  EngineStepTimeoutError,
  SchedulerInvariantError,
  SimError,
  UnknownEntityError,
  errorMessage,
} from '../errors';
import { SimulationClock, type ClockDeps } from './simulationClock';
import { ScheduleQueue, type ScheduleEntry } from './scheduleQueue';
import { StepGate } from './stepGate';
import { normalizeSimulationOptions, type SimulationOptions } from './options';
import type { RunReport, SimPlugin, StepListener, StepRecord, StopReason } from './types';
import { buildRunExport, type RunExport } from './export';
import { buildStateDump } from '../debug/buildStateDump';
import { withTimeout } from '../util/withTimeout';
import { makeLog } from '../util/log';

const log = makeLog('sim');

export type AddAgentSpec = {
  id: string;
  engine: CognitiveEngine;
  label?: string;
  type?: string;
  losRadius?: number;
  startTime?: number;
  // placed on the grid when given; otherwise the entity must already be there
  position?: Coord;
};

export type SimulationDeps = ClockDeps & {
  plugins?: SimPlugin<Simulation>[];
};

export class Simulation {
  readonly world: GridWorld;
  readonly mediator: Middleman;
  readonly options: SimulationOptions;
  readonly clock: SimulationClock;
  records: StepRecord[] = [];

  private agents = new Map<string, SimAgent>();
  private externalIds = new Set<string>();
  private queue = new ScheduleQueue();
  private gate = new StepGate();
  private listeners = new Set<StepListener>();
  private plugins: SimPlugin<Simulation>[];

  private steppingId: string | null = null;
  private running = false;
  private started = false;
  private stopRequested = false;
  private stepIndex = 0;
  private lastDueTime = 0;
  private nextSeq = 0;
  private initialGrid: GridSnapshot | null = null;

  constructor(world: GridWorld, options: unknown = {}, deps: SimulationDeps = {}) {
    this.world = world;
    this.options = normalizeSimulationOptions(options);
    this.clock = new SimulationClock(this.options.speedFactor, deps);
    this.plugins = deps.plugins ?? [];
    this.mediator = new Middleman(world, {
      keyMap: this.options.keyMap,
      isStepping: (id) => this.steppingId === id,
    });
  }

  // --- setup

  addAgent(spec: AddAgentSpec): SimAgent {
    if (this.started) throw new Error(`cannot add agent ${spec.id}: the simulation has already started`);
    if (this.agents.has(spec.id) || this.externalIds.has(spec.id)) {
      throw new Error(`agent ${spec.id} is already registered`);
    }
    const radius = spec.losRadius ?? 1;
    if (!Number.isInteger(radius) || radius < 0) {
      throw new RangeError(`line-of-sight radius of ${spec.id} must be a non-negative integer, got ${radius}`);
    }
    const label = spec.label ?? spec.id;
    if (spec.position) {
      this.world.place({ id: spec.id, label, kind: 'agent', opaque: false }, spec.position);
    } else if (!this.world.has(spec.id)) {
      throw new UnknownEntityError(spec.id);
    }

    const startTime = spec.startTime ?? 0;
    const agent: SimAgent = {
      id: spec.id,
      label,
      type: spec.type ?? 'agent',
      losRadius: radius,
      clock: makeClock(startTime, this.nextSeq++),
      initialTime: startTime,
      state: 'pending',
      engine: spec.engine,
      events: new AgentEvents(),
      visualStimuli: {},
      lastMotor: null,
      failure: null,
      steps: 0,
    };
    this.agents.set(agent.id, agent);
    this.queue.push(agent.id, agent.clock);
    return agent;
  }

  /** Registers an externally controlled entity (e.g. a human player): on the grid, never scheduled. */
  addExternalAgent(id: string, position: Coord, label = id): void {
    if (this.started) throw new Error(`cannot add agent ${id}: the simulation has already started`);
    if (this.agents.has(id) || this.externalIds.has(id)) throw new Error(`agent ${id} is already registered`);
    this.world.place({ id, label, kind: 'agent', opaque: false }, position);
    this.externalIds.add(id);
  }

  attachAdapter(agentId: string, adapter: AgentAdapter): () => void {
    const agent = this.requireAgent(agentId);
    const ctx: AdapterContext = {
      agentId,
      events: agent.events,
      issueMotor: (key) => this.applyMotor(agent, key),
      overridePerception: (stimulus) => this.applyPerception(agent, stimulus),
      inspect: () => agent.engine.inspect?.() ?? {},
    };
    const detach = adapter.attach(ctx);
    log.debug(`adapter ${adapter.id} attached to ${agentId}`);
    return () => {
      if (typeof detach === 'function') detach();
    };
  }

  subscribe(listener: StepListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // --- queries

  agent(id: string): SimAgent | undefined {
    return this.agents.get(id);
  }

  agentList(): SimAgent[] {
    return Array.from(this.agents.values());
  }

  externalAgentIds(): string[] {
    return Array.from(this.externalIds);
  }

  get steppingAgentId(): string | null {
    return this.steppingId;
  }

  get isRunning(): boolean {
    return this.running;
  }

  get isPaused(): boolean {
    return this.gate.waiting;
  }

  get stepCount(): number {
    return this.stepIndex;
  }

  pending(): ScheduleEntry[] {
    return this.queue.toArray();
  }

  // --- control

  async run(): Promise<RunReport> {
    if (this.running) throw new Error('simulation is already running');
    this.running = true;
    this.stopRequested = false;
    this.gate.reopen();
    this.ensureStarted();
    try {
      while (true) {
        const reason = this.stopReason();
        if (reason) return this.finish(reason);
        const rec = await this.stepOnce();
        if (!rec) return this.finish(this.stopReason() ?? 'all-blocked');
        if (this.options.mode === 'single-step' && !this.stopReason()) await this.gate.wait(rec);
      }
    } catch (e) {
      throw this.fatal(e);
    } finally {
      this.running = false;
    }
  }

  /** Performs one agent step outside run(); null when nothing is pending. */
  async step(): Promise<StepRecord | null> {
    if (this.running) throw new Error('simulation is already running');
    this.ensureStarted();
    try {
      return await this.stepOnce();
    } catch (e) {
      throw this.fatal(e);
    }
  }

  /** Requests a stop; honoured between steps, never mid-step. */
  stop(): void {
    this.stopRequested = true;
    this.gate.release();
  }

  advance(): void {
    this.gate.advance();
  }

  jumpToNextProduction(): void {
    this.gate.jumpToNextProduction();
  }

  /** Moves an external agent through the mediator while no scheduled agent is stepping. */
  externalInput(id: string, key: string): MotorOutcome {
    if (!this.externalIds.has(id)) throw new UnknownEntityError(id);
    if (this.steppingId !== null) {
      throw new SchedulerInvariantError(`external input for ${id} while ${this.steppingId} is stepping`);
    }
    this.steppingId = id;
    try {
      return this.mediator.motorInput({ id, losRadius: 0, visualStimuli: {}, lastMotor: null }, key);
    } finally {
      this.steppingId = null;
    }
  }

  reset(): void {
    if (this.running) throw new Error('cannot reset a running simulation');
    if (this.initialGrid) this.world.restore(this.initialGrid);
    this.queue.clear();
    for (const a of this.agents.values()) {
      a.clock.actrTime = a.initialTime;
      a.state = 'pending';
      a.failure = null;
      a.visualStimuli = {};
      a.lastMotor = null;
      a.steps = 0;
      a.engine.reset?.();
      this.queue.push(a.id, a.clock);
    }
    this.records = [];
    this.clock.reset();
    this.gate.reopen();
    this.steppingId = null;
    this.started = false;
    this.stopRequested = false;
    this.stepIndex = 0;
    this.lastDueTime = 0;
  }

  exportRun(meta: { scenarioId?: string; seed?: number } = {}): RunExport {
    return buildRunExport({
      scenarioId: meta.scenarioId ?? 'adhoc',
      seed: meta.seed ?? null,
      options: this.options,
      grid: this.world.snapshot(),
      records: this.records,
    });
  }

  // --- loop internals

  private ensureStarted() {
    if (this.started) return;
    this.started = true;
    this.initialGrid = this.world.snapshot();
    this.world.takeChanges();
    this.clock.start();
  }

  private stopReason(): StopReason | null {
    if (this.stopRequested) return 'stopped';
    if (this.options.maxSteps !== null && this.stepIndex >= this.options.maxSteps) return 'max-steps';
    const next = this.queue.peek();
    if (!next) return 'all-blocked';
    if (this.options.maxTime !== null && next.actrTime > this.options.maxTime) return 'max-time';
    return null;
  }

  private finish(reason: StopReason): RunReport {
    const done: string[] = [];
    const blocked: string[] = [];
    for (const a of this.agents.values()) {
      if (a.state === 'pending') a.state = 'done';
      if (a.state === 'done') done.push(a.id);
      if (a.state === 'blocked') blocked.push(a.id);
    }
    this.queue.clear();
    const finalTime = this.agentList().reduce((t, a) => Math.max(t, a.clock.actrTime), 0);
    const failures = this.agentList()
      .filter((a) => a.failure !== null)
      .map((a) => ({ agentId: a.id, message: a.failure ? errorMessage(a.failure.error) : '' }));
    log.info(`run finished: ${reason} after ${this.stepIndex} steps at t=${finalTime}`);
    return { reason, steps: this.stepIndex, finalTime, blocked, done, failures };
  }

  private async stepOnce(): Promise<StepRecord | null> {
    const entry = this.queue.pop();
    if (!entry) return null;
    const agent = this.agents.get(entry.agentId);
    if (!agent) throw new SchedulerInvariantError(`scheduled agent ${entry.agentId} is not registered`);
    if (agent.state !== 'pending') {
      throw new SchedulerInvariantError(`selected agent ${agent.id} is ${agent.state}, expected pending`);
    }
    if (entry.actrTime < this.lastDueTime) {
      throw new SchedulerInvariantError(
        `due time went backwards: ${agent.id} at ${entry.actrTime} after ${this.lastDueTime}`
      );
    }

    const pacedMs = this.options.mode === 'continuous' ? await this.clock.waitUntil(entry.actrTime) : 0;
    if (this.running && this.stopRequested) {
      // stopped while pacing: the selected agent keeps its turn
      this.queue.push(agent.id, agent.clock);
      return null;
    }

    // host edits between steps are not attributed to this step
    this.world.takeChanges();
    this.beginStepping(agent);
    this.lastDueTime = entry.actrTime;

    const dueTime = agent.clock.actrTime;
    let result: StepResult | null = null;
    let failure: Error | null = null;
    let motor: MotorOutcome | null = null;
    let stimulus: SymbolMap | null = null;
    // any failure here other than an invariant breach blocks the agent
    try {
      result = await this.callEngine(agent);
      if (result.firedProduction) {
        agent.events.emit('production-fired', { agentId: agent.id, actrTime: dueTime, production: result.firedProduction });
      }
      if (result.motorCommand) {
        agent.events.emit('key-pressed', { agentId: agent.id, actrTime: dueTime, key: result.motorCommand });
        motor = this.applyMotor(agent, result.motorCommand);
      }
      if (result.perceive) {
        stimulus = this.mediator.getAgentStimulus(agent);
        agent.engine.injectPerception(stimulus);
        agent.events.emit('stimulus', { agentId: agent.id, actrTime: dueTime, stimulus });
      }
      advanceClock(agent.clock, result.nextDueTime, agent.id);
    } catch (e) {
      if (e instanceof SchedulerInvariantError) throw e;
      failure = e instanceof Error ? e : new Error(errorMessage(e));
    }

    this.endStepping(agent);
    agent.steps += 1;
    if (failure) {
      agent.state = 'blocked';
      agent.failure = { at: dueTime, error: failure };
      log.warn(`${agent.id} blocked: ${failure.message}`);
    } else if (result?.terminal) {
      agent.state = 'blocked';
    } else {
      agent.state = 'pending';
      this.queue.push(agent.id, agent.clock);
    }

    const record: StepRecord = {
      index: this.stepIndex++,
      agentId: agent.id,
      dueTime,
      nextDueTime: agent.clock.actrTime,
      stateAfter: agent.state,
      firedProduction: result?.firedProduction ?? null,
      motorCommand: result?.motorCommand ?? null,
      motor,
      stimulus,
      gridDiff: this.world.takeChanges(),
      failure: failure
        ? { code: failure instanceof SimError ? failure.code : 'engine-error', message: failure.message }
        : null,
      pacedMs,
      plugins: {},
    };
    this.publish(record);
    return record;
  }

  private async callEngine(agent: SimAgent): Promise<StepResult> {
    const ctx = { agentId: agent.id, actrTime: agent.clock.actrTime, events: agent.events };
    const pending = Promise.resolve().then(() => agent.engine.step(ctx));
    return withTimeout(pending, this.options.stepTimeoutMs, () =>
      new EngineStepTimeoutError(agent.id, this.options.stepTimeoutMs ?? 0)
    );
  }

  private applyMotor(agent: SimAgent, key: string): MotorOutcome {
    const outcome = this.mediator.motorInput(agent, key);
    agent.engine.injectMotorResult(outcome);
    agent.events.emit('motor-result', { agentId: agent.id, actrTime: agent.clock.actrTime, outcome });
    return outcome;
  }

  private applyPerception(agent: SimAgent, stimulus: SymbolMap) {
    if (this.steppingId !== agent.id) {
      throw new SchedulerInvariantError(`${agent.id} tried to override perception outside its own step`);
    }
    agent.visualStimuli = stimulus;
    agent.engine.injectPerception(stimulus);
    agent.events.emit('stimulus', { agentId: agent.id, actrTime: agent.clock.actrTime, stimulus });
  }

  private beginStepping(agent: SimAgent) {
    if (this.steppingId !== null) {
      throw new SchedulerInvariantError(`${agent.id} selected while ${this.steppingId} is still stepping`);
    }
    const others = this.agentList().filter((a) => a.state === 'stepping');
    if (others.length) {
      throw new SchedulerInvariantError(`agents already stepping: ${others.map((a) => a.id).join(', ')}`);
    }
    this.steppingId = agent.id;
    agent.state = 'stepping';
  }

  private endStepping(agent: SimAgent) {
    if (this.steppingId !== agent.id) {
      throw new SchedulerInvariantError(`${agent.id} finished a step it did not own (owner: ${String(this.steppingId)})`);
    }
    this.steppingId = null;
  }

  private publish(record: StepRecord) {
    for (const p of this.plugins) {
      try {
        const out = p.afterStep?.({ sim: this, record });
        if (out !== undefined) record.plugins[p.id] = out;
      } catch (e) {
        record.plugins[p.id] = { error: errorMessage(e) };
        log.error(`plugin ${p.id} failed at step ${record.index}`, e);
      }
    }

    this.records.push(record);
    const max = this.options.maxRecords;
    if (max !== null && this.records.length > max) this.records = this.records.slice(-max);

    for (const l of Array.from(this.listeners)) {
      try {
        l(record);
      } catch (e) {
        log.error(`step listener failed at step ${record.index}`, e);
      }
    }
  }

  private fatal(e: unknown): unknown {
    if (e instanceof SchedulerInvariantError) {
      e.dump = buildStateDump(this);
      log.error('fatal scheduler invariant violation:', e.message, e.dump);
    }
    return e;
  }

  private requireAgent(id: string): SimAgent {
    const a = this.agents.get(id);
    if (!a) throw new UnknownEntityError(id);
    return a;
  }
}
