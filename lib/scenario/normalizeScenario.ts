// lib/scenario/normalizeScenario.ts
// Validates raw scenario JSON and fills in defaults. All problems are collected and
// reported together in one ScenarioError.

import { ScenarioError } from '../errors';
import { isRecord } from '../sim/options';
import type { Coord } from '../grid/types';
import type { Scenario, ScenarioAgent, ScenarioIssue, ScenarioMarker } from './types';

const DEFAULT_SEED = 1;
const DEFAULT_RADIUS = 1;

const isNonNegInt = (x: unknown): x is number => typeof x === 'number' && Number.isInteger(x) && x >= 0;
const isPosInt = (x: unknown): x is number => isNonNegInt(x) && x > 0;

function readCoord(x: unknown, path: string, issues: ScenarioIssue[]): Coord | null {
  if (x === undefined || x === null) return null;
  const [row, col]: unknown[] = isRecord(x) ? [x['row'], x['col']] : Array.isArray(x) && x.length === 2 ? x : [];
  if (isNonNegInt(row) && isNonNegInt(col)) return { row, col };
  issues.push({ path, message: 'expected { row, col } or [row, col] with non-negative integers' });
  return null;
}

function readLayout(x: unknown, issues: ScenarioIssue[]): string[] | null {
  if (x === undefined || x === null) return null;
  const rows: unknown[] = Array.isArray(x) ? x : [];
  const lines = rows.filter((r): r is string => typeof r === 'string');
  if (!lines.length || lines.length !== rows.length) {
    issues.push({ path: 'layout', message: 'layout must be a non-empty array of strings' });
    return null;
  }
  const width = lines[0].length;
  lines.forEach((r, i) => {
    if (r.length !== width) issues.push({ path: `layout[${i}]`, message: `row has length ${r.length}, expected ${width}` });
  });
  return width > 0 ? lines : null;
}

function readAgent(x: unknown, i: number, issues: ScenarioIssue[]): ScenarioAgent | null {
  const path = `agents[${i}]`;
  if (!isRecord(x)) {
    issues.push({ path, message: 'agent must be an object' });
    return null;
  }
  const id = x['id'];
  if (typeof id !== 'string' || !id) {
    issues.push({ path: `${path}.id`, message: 'id must be a non-empty string' });
    return null;
  }
  const type = x['type'];
  if (typeof type !== 'string' || !type) {
    issues.push({ path: `${path}.type`, message: 'type must be a non-empty string' });
    return null;
  }

  let losRadius = DEFAULT_RADIUS;
  const radius = x['losRadius'];
  if (radius !== undefined) {
    if (isNonNegInt(radius)) losRadius = radius;
    else issues.push({ path: `${path}.losRadius`, message: 'losRadius must be a non-negative integer' });
  }
  let startTime = 0;
  const st = x['startTime'];
  if (st !== undefined) {
    if (typeof st === 'number' && Number.isFinite(st) && st >= 0) startTime = st;
    else issues.push({ path: `${path}.startTime`, message: 'startTime must be a finite non-negative number' });
  }
  const rawLabel = x['label'];
  const label = typeof rawLabel === 'string' && rawLabel ? rawLabel : id;
  const rawParams = x['params'];
  const params = isRecord(rawParams) ? { ...rawParams } : {};

  return { id, type, label, losRadius, startTime, position: readCoord(x['position'], `${path}.position`, issues), params };
}

function readMarkers(x: unknown, issues: ScenarioIssue[]): ScenarioMarker[] {
  if (x === undefined) return [];
  if (!Array.isArray(x)) {
    issues.push({ path: 'markers', message: 'markers must be an array' });
    return [];
  }
  const out: ScenarioMarker[] = [];
  x.forEach((m: unknown, i) => {
    const label = isRecord(m) ? m['label'] : undefined;
    if (!isRecord(m) || typeof label !== 'string' || !label) {
      issues.push({ path: `markers[${i}]`, message: 'marker needs a label and a cell' });
      return;
    }
    const at = readCoord(m, `markers[${i}]`, issues);
    if (at) out.push({ label, ...at });
  });
  return out;
}

export function normalizeScenario(raw: unknown): Scenario {
  const issues: ScenarioIssue[] = [];
  if (!isRecord(raw)) throw new ScenarioError(['scenario must be a JSON object']);

  const rawId = raw['id'];
  const rawTitle = raw['title'];
  const rawSeed = raw['seed'];
  const id = typeof rawId === 'string' && rawId ? rawId : 'scenario';
  const title = typeof rawTitle === 'string' ? rawTitle : id;
  let seed = DEFAULT_SEED;
  if (rawSeed !== undefined) {
    if (isNonNegInt(rawSeed)) seed = rawSeed;
    else issues.push({ path: 'seed', message: 'seed must be a non-negative integer' });
  }

  const layout = readLayout(raw['layout'], issues);
  let rows = layout ? layout.length : 0;
  let cols = layout ? layout[0].length : 0;
  for (const [k, fromLayout] of [['rows', rows], ['cols', cols]] as const) {
    const v = raw[k];
    if (v === undefined) continue;
    if (!isPosInt(v)) issues.push({ path: k, message: `${k} must be a positive integer` });
    else if (layout && v !== fromLayout) issues.push({ path: k, message: `${k}=${v} disagrees with the layout (${fromLayout})` });
    else if (k === 'rows') rows = v;
    else cols = v;
  }
  if (!layout && (!rows || !cols)) issues.push({ path: 'rows', message: 'either a layout or rows and cols are required' });

  const agentsRaw = raw['agents'];
  const agents: ScenarioAgent[] = [];
  if (!Array.isArray(agentsRaw)) {
    issues.push({ path: 'agents', message: 'agents must be an array' });
  } else {
    agentsRaw.forEach((a, i) => {
      const agent = readAgent(a, i, issues);
      if (!agent) return;
      if (agents.some((b) => b.id === agent.id)) issues.push({ path: `agents[${i}].id`, message: `duplicate agent id ${agent.id}` });
      else agents.push(agent);
    });
  }

  const markers = readMarkers(raw['markers'], issues);

  // cell checks need the final size
  if (rows && cols) {
    const taken = new Map<string, string>();
    for (const a of agents) {
      if (!a.position) continue;
      const { row, col } = a.position;
      if (row >= rows || col >= cols) {
        issues.push({ path: `agents.${a.id}.position`, message: `(${row},${col}) is outside the ${rows}x${cols} grid` });
        continue;
      }
      const key = `${row},${col}`;
      const other = taken.get(key);
      if (other) issues.push({ path: `agents.${a.id}.position`, message: `(${row},${col}) is already taken by ${other}` });
      else taken.set(key, a.id);
    }
    for (const m of markers) {
      if (m.row >= rows || m.col >= cols) {
        issues.push({ path: 'markers', message: `${m.label} at (${m.row},${m.col}) is outside the ${rows}x${cols} grid` });
      }
    }
  }

  let options: Record<string, unknown> = {};
  const rawOptions = raw['options'];
  if (rawOptions !== undefined) {
    if (isRecord(rawOptions)) options = { ...rawOptions };
    else issues.push({ path: 'options', message: 'options must be an object' });
  }

  if (issues.length) throw new ScenarioError(issues.map((p) => `${p.path}: ${p.message}`));
  return { id, title, seed, rows, cols, layout, markers, agents, options };
}
