// lib/grid/levelBuilder.ts
// Level construction: random agent placement and ASCII layouts.

import seedrandom from 'seedrandom';
import { GridWorld } from './gridWorld';
import type { Coord, EntityKind } from './types';

export type Rng = () => number;

export const DEFAULT_LEVEL_SEED = 1;

function shuffleInPlace<T>(xs: T[], rng: Rng): T[] {
  for (let i = xs.length - 1; i > 0; i--) {
    const j = Math.floor(rng() * (i + 1));
    const tmp = xs[i];
    xs[i] = xs[j];
    xs[j] = tmp;
  }
  return xs;
}

/**
 * Places each agent on a distinct random cell of an empty height × width matrix.
 * Throws for non-positive sizes or when there are more agents than cells.
 */
export function buildLevel<T>(height: number, width: number, agents: readonly T[], rng?: Rng): Array<Array<T | null>> {
  if (!Number.isInteger(height) || !Number.isInteger(width) || height <= 0 || width <= 0) {
    throw new RangeError('height and width must be positive integers');
  }
  const total = height * width;
  if (agents.length > total) {
    throw new RangeError(`not enough space: ${agents.length} agents for ${total} cells (${height}x${width})`);
  }

  const matrix: Array<Array<T | null>> = Array.from({ length: height }, () =>
    Array.from({ length: width }, (): T | null => null)
  );

  const coords: Coord[] = [];
  for (let row = 0; row < height; row++) for (let col = 0; col < width; col++) coords.push({ row, col });
  shuffleInPlace(coords, rng ?? seedrandom(String(DEFAULT_LEVEL_SEED)));

  agents.forEach((agent, i) => {
    const c = coords[i];
    matrix[c.row][c.col] = agent;
  });
  return matrix;
}

/** Free cells of `world` in random order; deterministic for a given rng. */
export function shuffledFreeCells(world: GridWorld, rng: Rng): Coord[] {
  const free: Coord[] = [];
  for (let row = 0; row < world.rows; row++) {
    for (let col = 0; col < world.cols; col++) {
      if (world.query({ row, col }).occupant === null) free.push({ row, col });
    }
  }
  return shuffleInPlace(free, rng);
}

export type LegendEntry =
  | { type: 'floor' }
  | { type: 'solid'; kind: EntityKind; label: string; opaque: boolean }
  | { type: 'marker'; label: string };

export const DEFAULT_LEGEND: Record<string, LegendEntry> = {
  '.': { type: 'floor' },
  ' ': { type: 'floor' },
  '#': { type: 'solid', kind: 'wall', label: 'wall', opaque: true },
  'o': { type: 'solid', kind: 'obstacle', label: 'rock', opaque: false },
  '*': { type: 'marker', label: 'resource' },
};

/**
 * Builds a grid from equal-length ASCII rows. Entity and marker ids are derived from
 * their label and cell, e.g. `wall@2,3`.
 */
export function parseLayout(rows: readonly string[], legend: Record<string, LegendEntry> = DEFAULT_LEGEND): GridWorld {
  if (!rows.length) throw new RangeError('layout has no rows');
  const width = rows[0].length;
  rows.forEach((line, i) => {
    if (line.length !== width) throw new RangeError(`layout row ${i} has length ${line.length}, expected ${width}`);
  });

  const world = new GridWorld(rows.length, width);
  rows.forEach((line, row) => {
    for (let col = 0; col < line.length; col++) {
      const ch = line[col];
      const entry = legend[ch];
      if (!entry) throw new RangeError(`unknown layout symbol "${ch}" at (${row},${col})`);
      if (entry.type === 'solid') {
        world.place({ id: `${entry.label}@${row},${col}`, label: entry.label, kind: entry.kind, opaque: entry.opaque }, { row, col });
      } else if (entry.type === 'marker') {
        world.addMarker({ row, col }, { id: `${entry.label}@${row},${col}`, label: entry.label });
      }
    }
  });
  world.takeChanges();
  return world;
}
