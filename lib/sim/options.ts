// lib/sim/options.ts
// Simulation options with defaults; raw input is read field by field with fallbacks.

import { DEFAULT_KEY_MAP, type KeyMap } from '../mediator/symbols';
import type { Delta } from '../grid/types';
import { UNTHROTTLED, type SpeedFactor } from './simulationClock';
import { makeLog } from '../util/log';

const log = makeLog('config');

export type ExecutionMode = 'continuous' | 'single-step';

export type SimulationOptions = {
  speedFactor: SpeedFactor;
  mode: ExecutionMode;
  // null: wait for the engine indefinitely
  stepTimeoutMs: number | null;
  maxSteps: number | null;
  // stop once the next due time would exceed this model time
  maxTime: number | null;
  maxRecords: number | null;
  keyMap: KeyMap;
};

export const DEFAULT_SIMULATION_OPTIONS: SimulationOptions = {
  speedFactor: UNTHROTTLED,
  mode: 'continuous',
  stepTimeoutMs: null,
  maxSteps: null,
  maxTime: null,
  maxRecords: 5000,
  keyMap: DEFAULT_KEY_MAP,
};

export function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function pickPositiveOrNull(cfg: Record<string, unknown>, k: string, fb: number | null, integer: boolean): number | null {
  if (!(k in cfg)) return fb;
  const v = cfg[k];
  if (v === null) return null;
  if (typeof v === 'number' && Number.isFinite(v) && v > 0 && (!integer || Number.isInteger(v))) return v;
  log.warn(`ignoring ${k}=${String(v)}; using ${String(fb)}`);
  return fb;
}

function pickSpeed(cfg: Record<string, unknown>, fb: SpeedFactor): SpeedFactor {
  const v = cfg['speedFactor'];
  if (v === undefined) return fb;
  if (v === UNTHROTTLED) return UNTHROTTLED;
  if (typeof v === 'number' && Number.isFinite(v) && v > 0) return v;
  log.warn(`ignoring speedFactor=${String(v)}; using ${String(fb)}`);
  return fb;
}

function pickMode(cfg: Record<string, unknown>, fb: ExecutionMode): ExecutionMode {
  const v = cfg['mode'];
  if (v === undefined) return fb;
  if (v === 'continuous' || v === 'single-step') return v;
  log.warn(`ignoring mode=${String(v)}; using ${fb}`);
  return fb;
}

function isDelta(x: unknown): x is Delta {
  return (
    isRecord(x) &&
    typeof x['dRow'] === 'number' &&
    typeof x['dCol'] === 'number' &&
    Number.isInteger(x['dRow']) &&
    Number.isInteger(x['dCol'])
  );
}

function pickKeyMap(cfg: Record<string, unknown>, fb: KeyMap): KeyMap {
  const v = cfg['keyMap'];
  if (v === undefined) return fb;
  if (!isRecord(v)) {
    log.warn('ignoring keyMap: expected an object of { dRow, dCol } deltas');
    return fb;
  }
  const out: KeyMap = {};
  for (const [key, d] of Object.entries(v)) {
    if (isDelta(d)) out[key] = { dRow: d.dRow, dCol: d.dCol };
    else log.warn(`ignoring keyMap entry "${key}": not an integer delta`);
  }
  return Object.keys(out).length ? out : fb;
}

export function normalizeSimulationOptions(raw: unknown): SimulationOptions {
  const cfg = isRecord(raw) ? raw : {};
  const d = DEFAULT_SIMULATION_OPTIONS;
  return {
    speedFactor: pickSpeed(cfg, d.speedFactor),
    mode: pickMode(cfg, d.mode),
    stepTimeoutMs: pickPositiveOrNull(cfg, 'stepTimeoutMs', d.stepTimeoutMs, false),
    maxSteps: pickPositiveOrNull(cfg, 'maxSteps', d.maxSteps, true),
    maxTime: pickPositiveOrNull(cfg, 'maxTime', d.maxTime, false),
    maxRecords: pickPositiveOrNull(cfg, 'maxRecords', d.maxRecords, true),
    keyMap: pickKeyMap(cfg, d.keyMap),
  };
}
