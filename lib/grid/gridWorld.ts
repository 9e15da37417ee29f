// lib/grid/gridWorld.ts
// Shared occupancy grid: the only state agents have in common.
//
// Invariants kept by every public mutation:
// - at most one solid occupant per cell;
// - every entity position is inside the grid;
// - `positions` and the per-cell `occupant` references agree.
// Mutations validate first and write second, so a thrown error leaves the grid untouched.

import type {
  CellContents,
  Coord,
  Delta,
  GridChange,
  GridEntity,
  GridMarker,
  GridSnapshot,
  Neighborhood,
} from './types';
import {
  DuplicateEntityError,
  OccupiedCellError,
  OutOfBoundsError,
  UnknownEntityError,
} from '../errors';

type Cell = {
  occupant: string | null;
  markers: GridMarker[];
};

export class GridWorld {
  readonly rows: number;
  readonly cols: number;

  private cells: Cell[][];
  private entities = new Map<string, GridEntity>();
  private positions = new Map<string, Coord>();
  private journal: GridChange[] = [];

  constructor(rows: number, cols: number) {
    if (!Number.isInteger(rows) || !Number.isInteger(cols) || rows <= 0 || cols <= 0) {
      throw new RangeError(`grid size must be positive integers, got ${rows}x${cols}`);
    }
    this.rows = rows;
    this.cols = cols;
    this.cells = Array.from({ length: rows }, () =>
      Array.from({ length: cols }, (): Cell => ({ occupant: null, markers: [] }))
    );
  }

  static fromSnapshot(s: GridSnapshot): GridWorld {
    const w = new GridWorld(s.rows, s.cols);
    w.restore(s);
    return w;
  }

  /** Replaces all contents with `s` in place; the journal is cleared. */
  restore(s: GridSnapshot): void {
    if (s.rows !== this.rows || s.cols !== this.cols) {
      throw new RangeError(`snapshot is ${s.rows}x${s.cols}, grid is ${this.rows}x${this.cols}`);
    }
    for (const line of this.cells) {
      for (const c of line) {
        c.occupant = null;
        c.markers = [];
      }
    }
    this.entities.clear();
    this.positions.clear();
    for (const e of s.entities) {
      this.place({ id: e.id, label: e.label, kind: e.kind, opaque: e.opaque }, { row: e.row, col: e.col });
    }
    for (const m of s.markers) {
      this.addMarker({ row: m.row, col: m.col }, { id: m.id, label: m.label });
    }
    this.journal = [];
  }

  inBounds(c: Coord): boolean {
    return (
      Number.isInteger(c.row) &&
      Number.isInteger(c.col) &&
      c.row >= 0 &&
      c.col >= 0 &&
      c.row < this.rows &&
      c.col < this.cols
    );
  }

  place(entity: GridEntity, cell: Coord): void {
    const target = this.cellAt(cell);
    if (this.entities.has(entity.id)) throw new DuplicateEntityError(entity.id);
    if (target.occupant !== null) throw new OccupiedCellError(cell, target.occupant);

    target.occupant = entity.id;
    this.entities.set(entity.id, { ...entity });
    this.positions.set(entity.id, { row: cell.row, col: cell.col });
    this.journal.push({ op: 'place', entityId: entity.id, to: { row: cell.row, col: cell.col } });
  }

  move(entityId: string, delta: Delta): { from: Coord; to: Coord } {
    const from = this.positionOf(entityId);
    const to = { row: from.row + delta.dRow, col: from.col + delta.dCol };
    const target = this.cellAt(to);
    if (target.occupant !== null && target.occupant !== entityId) {
      throw new OccupiedCellError(to, target.occupant);
    }

    // zero delta: nothing to transfer
    if (target.occupant === entityId) return { from, to };

    this.cells[from.row][from.col].occupant = null;
    target.occupant = entityId;
    this.positions.set(entityId, to);
    this.journal.push({ op: 'move', entityId, from, to });
    return { from, to };
  }

  remove(entityId: string): GridEntity {
    const from = this.positionOf(entityId);
    const entity = this.entity(entityId);
    this.cells[from.row][from.col].occupant = null;
    this.positions.delete(entityId);
    this.entities.delete(entityId);
    this.journal.push({ op: 'remove', entityId, from });
    return entity;
  }

  query(cell: Coord): CellContents {
    const c = this.cellAt(cell);
    const occupant = c.occupant === null ? null : this.entities.get(c.occupant) ?? null;
    return {
      occupant: occupant ? { ...occupant } : null,
      markers: c.markers.map((m) => ({ ...m })),
    };
  }

  neighborhood(origin: Coord, radius: number): Neighborhood {
    this.cellAt(origin);
    const r = Math.max(0, Math.floor(radius));
    const top = Math.max(0, origin.row - r);
    const left = Math.max(0, origin.col - r);
    const bottom = Math.min(this.rows - 1, origin.row + r);
    const right = Math.min(this.cols - 1, origin.col + r);

    const cells: CellContents[][] = [];
    for (let row = top; row <= bottom; row++) {
      const line: CellContents[] = [];
      for (let col = left; col <= right; col++) line.push(this.query({ row, col }));
      cells.push(line);
    }
    return { origin: { ...origin }, radius: r, top, left, cells };
  }

  addMarker(cell: Coord, marker: GridMarker): void {
    const c = this.cellAt(cell);
    c.markers.push({ ...marker });
    this.journal.push({ op: 'marker-add', markerId: marker.id, at: { ...cell } });
  }

  removeMarker(cell: Coord, markerId: string): boolean {
    const c = this.cellAt(cell);
    const idx = c.markers.findIndex((m) => m.id === markerId);
    if (idx < 0) return false;
    c.markers.splice(idx, 1);
    this.journal.push({ op: 'marker-remove', markerId, at: { ...cell } });
    return true;
  }

  has(entityId: string): boolean {
    return this.entities.has(entityId);
  }

  entity(entityId: string): GridEntity {
    const e = this.entities.get(entityId);
    if (!e) throw new UnknownEntityError(entityId);
    return { ...e };
  }

  positionOf(entityId: string): Coord {
    const p = this.positions.get(entityId);
    if (!p) throw new UnknownEntityError(entityId);
    return { row: p.row, col: p.col };
  }

  /** Labels per cell (occupant first, then markers), for renderers. */
  levelMatrix(): string[][][] {
    return this.cells.map((line) =>
      line.map((c) => {
        const out: string[] = [];
        if (c.occupant !== null) out.push(this.entities.get(c.occupant)?.label ?? c.occupant);
        for (const m of c.markers) out.push(m.label);
        return out;
      })
    );
  }

  /** Returns and clears the mutations recorded since the previous call. */
  takeChanges(): GridChange[] {
    const out = this.journal;
    this.journal = [];
    return out;
  }

  snapshot(): GridSnapshot {
    const entities: GridSnapshot['entities'] = [];
    const markers: GridSnapshot['markers'] = [];
    for (let row = 0; row < this.rows; row++) {
      for (let col = 0; col < this.cols; col++) {
        const c = this.cells[row][col];
        const e = c.occupant === null ? undefined : this.entities.get(c.occupant);
        if (e) entities.push({ ...e, row, col });
        for (const m of c.markers) markers.push({ ...m, row, col });
      }
    }
    return { schema: 'GridSnapshotV1', rows: this.rows, cols: this.cols, entities, markers };
  }

  /** Index/cell mismatches; empty when the grid is consistent. */
  checkConsistency(): string[] {
    const problems: string[] = [];
    const seen = new Set<string>();
    for (let row = 0; row < this.rows; row++) {
      for (let col = 0; col < this.cols; col++) {
        const id = this.cells[row][col].occupant;
        if (id === null) continue;
        if (seen.has(id)) problems.push(`${id} occupies more than one cell`);
        seen.add(id);
        const p = this.positions.get(id);
        if (!p) problems.push(`cell (${row},${col}) references unindexed ${id}`);
        else if (p.row !== row || p.col !== col) {
          problems.push(`${id} indexed at (${p.row},${p.col}) but found at (${row},${col})`);
        }
      }
    }
    for (const [id, p] of this.positions) {
      if (!this.inBounds(p)) problems.push(`${id} positioned out of bounds at (${p.row},${p.col})`);
      else if (this.cells[p.row][p.col].occupant !== id) problems.push(`${id} missing from its cell (${p.row},${p.col})`);
      if (!this.entities.has(id)) problems.push(`${id} positioned but not registered`);
    }
    return problems;
  }

  private cellAt(c: Coord): Cell {
    if (!this.inBounds(c)) throw new OutOfBoundsError(c, { rows: this.rows, cols: this.cols });
    return this.cells[c.row][c.col];
  }
}
