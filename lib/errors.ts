// lib/errors.ts
// Error taxonomy for grid, mediator and scheduler layers.
//
// Grid/mediator errors are recoverable: the mediator turns them into failure
// outcomes for the issuing agent. SchedulerInvariantError is fatal.

import type { Coord } from './grid/types';

export type SimErrorCode =
  | 'out-of-bounds'
  | 'occupied'
  | 'unknown-command'
  | 'unknown-entity'
  | 'duplicate-entity'
  | 'step-timeout'
  | 'scheduler-invariant'
  | 'scenario';

export class SimError extends Error {
  readonly code: SimErrorCode;

  constructor(code: SimErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class OutOfBoundsError extends SimError {
  readonly cell: Coord;

  constructor(cell: Coord, size: { rows: number; cols: number }) {
    super('out-of-bounds', `cell (${cell.row},${cell.col}) is outside the ${size.rows}x${size.cols} grid`);
    this.cell = cell;
  }
}

export class OccupiedCellError extends SimError {
  readonly cell: Coord;
  readonly occupantId: string;

  constructor(cell: Coord, occupantId: string) {
    super('occupied', `cell (${cell.row},${cell.col}) is occupied by ${occupantId}`);
    this.cell = cell;
    this.occupantId = occupantId;
  }
}

export class UnknownCommandError extends SimError {
  readonly command: string;

  constructor(command: string) {
    super('unknown-command', `unknown motor command "${command}"`);
    this.command = command;
  }
}

export class UnknownEntityError extends SimError {
  readonly entityId: string;

  constructor(entityId: string) {
    super('unknown-entity', `entity ${entityId} is not on the grid`);
    this.entityId = entityId;
  }
}

export class DuplicateEntityError extends SimError {
  readonly entityId: string;

  constructor(entityId: string) {
    super('duplicate-entity', `entity ${entityId} is already on the grid`);
    this.entityId = entityId;
  }
}

export class EngineStepTimeoutError extends SimError {
  readonly agentId: string;
  readonly timeoutMs: number;

  constructor(agentId: string, timeoutMs: number) {
    super('step-timeout', `agent ${agentId} did not finish its step within ${timeoutMs}ms`);
    this.agentId = agentId;
    this.timeoutMs = timeoutMs;
  }
}

export class SchedulerInvariantError extends SimError {
  // Filled in by the run driver before the error leaves Simulation.run().
  dump: unknown = null;

  constructor(message: string) {
    super('scheduler-invariant', message);
  }
}

export class ScenarioError extends SimError {
  readonly problems: string[];

  constructor(problems: string[]) {
    super('scenario', `invalid scenario: ${problems.join('; ')}`);
    this.problems = problems;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
