// lib/engines/chunks.ts
// Minimal chunk representation for the built-in production engine.

export type SlotValue = string | number | boolean | null;

export type Chunk = {
  isa: string;
  slots: Record<string, SlotValue>;
};

/**
 * Builds a chunk from ordered (slot, value) pairs; the first pair must be `['isa', type]`.
 */
export function buildChunk(pairs: ReadonlyArray<readonly [string, SlotValue]>): Chunk {
  if (!pairs.length) throw new RangeError('at least one (slot, value) pair is required to build a chunk');
  const [[head, type], ...rest] = pairs;
  if (head !== 'isa' || typeof type !== 'string' || !type) {
    throw new RangeError(`first pair must be ['isa', <type>], got [${head}, ${String(type)}]`);
  }
  const slots: Record<string, SlotValue> = {};
  for (const [slot, value] of rest) slots[slot] = value;
  return { isa: type, slots };
}

export type ChunkPattern = {
  isa?: string;
  slots?: Record<string, SlotValue>;
};

/** True when `chunk` has the pattern's type and every slot the pattern names. */
export function chunkMatches(chunk: Chunk | null, pattern: ChunkPattern): boolean {
  if (!chunk) return false;
  if (pattern.isa !== undefined && chunk.isa !== pattern.isa) return false;
  for (const [k, v] of Object.entries(pattern.slots ?? {})) {
    if (chunk.slots[k] !== v) return false;
  }
  return true;
}

export function cloneChunk(c: Chunk | null): Chunk | null {
  return c ? { isa: c.isa, slots: { ...c.slots } } : null;
}

export function chunkToString(c: Chunk | null): string {
  if (!c) return 'null';
  const parts = Object.entries(c.slots).map(([k, v]) => `${k}=${v === null ? 'null' : String(v)}`);
  return parts.length ? `${c.isa}(${parts.join(' ')})` : c.isa;
}
