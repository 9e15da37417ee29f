import { describe, expect, it } from 'vitest';
import seedrandom from 'seedrandom';

import { GridWorld } from '@/lib/grid/gridWorld';
import { bresenham, isVisibleFrom, visibleCells } from '@/lib/grid/lineOfSight';
import { coordKey, type Coord } from '@/lib/grid/types';

function worldWithWalls(rows: number, cols: number, walls: Coord[]): GridWorld {
  const w = new GridWorld(rows, cols);
  for (const c of walls) w.place({ id: `wall@${coordKey(c)}`, label: 'wall', kind: 'wall', opaque: true }, c);
  return w;
}

const keys = (cs: Coord[]) => cs.map(coordKey).sort();

describe('bresenham', () => {
  it('includes both endpoints', () => {
    const seg = bresenham({ row: 2, col: 2 }, { row: 0, col: 4 });
    expect(seg[0]).toEqual({ row: 2, col: 2 });
    expect(seg[seg.length - 1]).toEqual({ row: 0, col: 4 });
  });

  it('walks a straight row cell by cell', () => {
    expect(bresenham({ row: 1, col: 0 }, { row: 1, col: 3 })).toEqual([
      { row: 1, col: 0 },
      { row: 1, col: 1 },
      { row: 1, col: 2 },
      { row: 1, col: 3 },
    ]);
  });

  it('is a single cell for a zero-length segment', () => {
    expect(bresenham({ row: 3, col: 3 }, { row: 3, col: 3 })).toEqual([{ row: 3, col: 3 }]);
  });
});

describe('visibleCells', () => {
  it('sees everything on an empty grid', () => {
    const w = new GridWorld(5, 5);
    const vis = visibleCells(w, { row: 2, col: 2 }, 2);
    expect(vis.visible.length).toBe(25);
    expect(vis.occluded).toEqual([]);
  });

  it('a wall hides what is behind it but not itself', () => {
    const w = worldWithWalls(5, 5, [{ row: 2, col: 3 }]);
    w.place({ id: 'a', label: 'A', kind: 'agent', opaque: false }, { row: 2, col: 2 });
    const vis = visibleCells(w, { row: 2, col: 2 }, 2);

    expect(isVisibleFrom(w, { row: 2, col: 2 }, { row: 2, col: 3 })).toBe(true);
    expect(vis.occluded).toEqual([
      { row: 1, col: 4 },
      { row: 2, col: 4 },
      { row: 3, col: 4 },
    ]);
    expect(vis.visible.length).toBe(22);
  });

  it('is clipped to the radius and the grid', () => {
    const w = new GridWorld(3, 3);
    const vis = visibleCells(w, { row: 0, col: 0 }, 1);
    expect(vis.visible).toEqual([
      { row: 0, col: 0 },
      { row: 0, col: 1 },
      { row: 1, col: 0 },
      { row: 1, col: 1 },
    ]);
  });

  it('does not let non-opaque agents block the view', () => {
    const w = new GridWorld(1, 4);
    w.place({ id: 'b', label: 'B', kind: 'agent', opaque: false }, { row: 0, col: 1 });
    expect(isVisibleFrom(w, { row: 0, col: 0 }, { row: 0, col: 3 })).toBe(true);
  });

  it('mirrors exactly under 180-degree rotation and reflections', () => {
    const rng = seedrandom('los-symmetry');
    const rows = 9;
    const cols = 8;
    for (let trial = 0; trial < 25; trial++) {
      const walls: Coord[] = [];
      for (let row = 0; row < rows; row++) {
        for (let col = 0; col < cols; col++) if (rng() < 0.2) walls.push({ row, col });
      }
      const origin = { row: Math.floor(rng() * rows), col: Math.floor(rng() * cols) };
      const radius = 1 + Math.floor(rng() * 4);
      const base = visibleCells(worldWithWalls(rows, cols, walls), origin, radius);

      const transforms: Array<(c: Coord) => Coord> = [
        (c) => ({ row: rows - 1 - c.row, col: cols - 1 - c.col }),
        (c) => ({ row: rows - 1 - c.row, col: c.col }),
        (c) => ({ row: c.row, col: cols - 1 - c.col }),
      ];
      for (const t of transforms) {
        const mirrored = visibleCells(worldWithWalls(rows, cols, walls.map(t)), t(origin), radius);
        expect(keys(mirrored.visible)).toEqual(keys(base.visible.map(t)));
        expect(keys(mirrored.occluded)).toEqual(keys(base.occluded.map(t)));
      }
    }
  });
});
