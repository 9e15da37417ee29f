// lib/sim/export.ts
// Helpers for deterministic run export.

import type { GridSnapshot } from '../grid/types';
import type { MotorOutcome } from '../mediator/symbols';
import type { SimErrorCode } from '../errors';
import type { SimulationOptions } from './options';
import type { StepRecord } from './types';

type MotorFailure = Extract<MotorOutcome, { ok: false }>;

export type ExportedMotor =
  | Extract<MotorOutcome, { ok: true }>
  | (Omit<MotorFailure, 'error'> & { error: { name: string; code: SimErrorCode; message: string } });

export type ExportedStepRecord = Omit<StepRecord, 'motor'> & { motor: ExportedMotor | null };

export type RunExport = {
  schema: 'CogridRunExportV1';
  createdAt: string;
  scenarioId: string;
  seed: number | null;
  options: SimulationOptions;
  grid: GridSnapshot;
  records: ExportedStepRecord[];
};

const nowIso = () => new Date().toISOString();

export function buildRunExport(args: {
  scenarioId: string;
  seed: number | null;
  options: SimulationOptions;
  grid: GridSnapshot;
  records: StepRecord[];
}): RunExport {
  return {
    schema: 'CogridRunExportV1',
    createdAt: nowIso(),
    seed: args.seed,
    scenarioId: args.scenarioId,
    options: args.options,
    grid: args.grid,
    records: args.records.map((r) => ({ ...r, motor: exportMotor(r.motor) })),
  };
}

// Error instances serialize to {}; keep what a reader needs.
function exportMotor(m: MotorOutcome | null): ExportedMotor | null {
  if (!m || m.ok) return m;
  const { error, ...rest } = m;
  return { ...rest, error: { name: error.name, code: error.code, message: error.message } };
}
