// lib/mediator/symbols.ts
// Symbolic I/O exchanged between agents and the mediator.

import type { Coord, Delta } from '../grid/types';
import type { SimError } from '../errors';

export const TOKEN_SELF = 'self';
export const TOKEN_EMPTY = 'empty';
export const TOKEN_OCCLUDED = 'occluded';

export type StimulusEntry = {
  token: string;
  row: number;
  col: number;
  // offset from the perceiving agent
  dRow: number;
  dCol: number;
  occupantId: string | null;
  markers: string[];
};

// Keyed by absolute cell, `${row},${col}`; keys are inserted in row-major order.
export type SymbolMap = Record<string, StimulusEntry>;

export type MotorFailureReason = 'occupied' | 'out-of-bounds' | 'unknown-command';

export type MotorOutcome =
  | { ok: true; key: string; token: 'moved'; from: Coord; to: Coord }
  | {
      ok: false;
      key: string;
      token: `failure:${MotorFailureReason}`;
      reason: MotorFailureReason;
      at: Coord | null;
      error: SimError;
    };

export type KeyMap = Record<string, Delta>;

export const DEFAULT_KEY_MAP: KeyMap = {
  W: { dRow: -1, dCol: 0 },
  A: { dRow: 0, dCol: -1 },
  S: { dRow: 1, dCol: 0 },
  D: { dRow: 0, dCol: 1 },
  up: { dRow: -1, dCol: 0 },
  left: { dRow: 0, dCol: -1 },
  down: { dRow: 1, dCol: 0 },
  right: { dRow: 0, dCol: 1 },
};

export function stimulusTokens(map: SymbolMap): string[] {
  return Object.values(map).map((e) => `${e.token}@${e.dRow},${e.dCol}`);
}
