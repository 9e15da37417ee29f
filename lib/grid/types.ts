// lib/grid/types.ts
// Grid coordinates, entities, cell contents and the mutation journal.

export type Coord = { row: number; col: number };
export type Delta = { dRow: number; dCol: number };

export type EntityKind = 'agent' | 'wall' | 'obstacle';

export type GridEntity = {
  id: string;
  label: string;
  kind: EntityKind;
  // Opaque entities stop line of sight (walls by default).
  opaque: boolean;
};

// Passive, non-solid content (resources, pickups, floor marks).
export type GridMarker = {
  id: string;
  label: string;
};

export type CellContents = {
  occupant: GridEntity | null;
  markers: GridMarker[];
};

export type Neighborhood = {
  origin: Coord;
  radius: number;
  // top-left cell of the clipped square
  top: number;
  left: number;
  cells: CellContents[][];
};

export type GridChange =
  | { op: 'place'; entityId: string; to: Coord }
  | { op: 'move'; entityId: string; from: Coord; to: Coord }
  | { op: 'remove'; entityId: string; from: Coord }
  | { op: 'marker-add'; markerId: string; at: Coord }
  | { op: 'marker-remove'; markerId: string; at: Coord };

export type GridSnapshot = {
  schema: 'GridSnapshotV1';
  rows: number;
  cols: number;
  entities: Array<GridEntity & Coord>;
  markers: Array<GridMarker & Coord>;
};

export const coordKey = (c: Coord) => `${c.row},${c.col}`;
