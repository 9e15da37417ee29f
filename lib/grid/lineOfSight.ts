// lib/grid/lineOfSight.ts
// Line-of-sight over a square neighborhood of the grid.
//
// A cell is occluded when an opaque occupant sits strictly between the origin and the
// cell on the Bresenham segment. The origin is always visible, and so is an opaque
// cell itself. The segment only depends on |dx|, |dy| and their signs, so the result
// mirrors exactly under reflections and 180° rotation.

import type { Coord } from './types';
import type { GridWorld } from './gridWorld';

export type Visibility = {
  origin: Coord;
  radius: number;
  // row-major order
  visible: Coord[];
  occluded: Coord[];
};

export function bresenham(from: Coord, to: Coord): Coord[] {
  const points: Coord[] = [];
  const dx = Math.abs(to.col - from.col);
  const dy = Math.abs(to.row - from.row);
  const sx = from.col < to.col ? 1 : -1;
  const sy = from.row < to.row ? 1 : -1;
  let err = dx - dy;

  let col = from.col;
  let row = from.row;

  while (true) {
    points.push({ row, col });
    if (col === to.col && row === to.row) break;
    const e2 = 2 * err;
    if (e2 > -dy) {
      err -= dy;
      col += sx;
    }
    if (e2 < dx) {
      err += dx;
      row += sy;
    }
  }
  return points;
}

function isOpaque(world: GridWorld, c: Coord): boolean {
  return world.query(c).occupant?.opaque === true;
}

export function isVisibleFrom(world: GridWorld, origin: Coord, target: Coord): boolean {
  const seg = bresenham(origin, target);
  // skip both endpoints: origin is always seen, a wall is seen itself
  for (let k = 1; k < seg.length - 1; k++) {
    if (isOpaque(world, seg[k])) return false;
  }
  return true;
}

export function visibleCells(world: GridWorld, origin: Coord, radius: number): Visibility {
  const hood = world.neighborhood(origin, radius);
  const visible: Coord[] = [];
  const occluded: Coord[] = [];

  for (let i = 0; i < hood.cells.length; i++) {
    for (let j = 0; j < hood.cells[i].length; j++) {
      const c = { row: hood.top + i, col: hood.left + j };
      if (isVisibleFrom(world, origin, c)) visible.push(c);
      else occluded.push(c);
    }
  }

  return { origin: { ...origin }, radius: hood.radius, visible, occluded };
}
