// hooks/useSimulationRunner.ts
// React binding for a Simulation: latest record, grid snapshot, run status.

import { useState, useCallback, useEffect } from 'react';
import type { Simulation } from '../lib/sim/simulation';
import type { RunReport, StepRecord } from '../lib/sim/types';
import type { GridSnapshot } from '../lib/grid/types';
import { errorMessage } from '../lib/errors';
import { makeLog } from '../lib/util/log';

const log = makeLog('ui');

export type SimulationRunnerState = {
  record: StepRecord | null;
  grid: GridSnapshot;
  running: boolean;
  paused: boolean;
  report: RunReport | null;
  error: string | null;
};

function readState(sim: Simulation, report: RunReport | null, error: string | null): SimulationRunnerState {
  return {
    record: sim.records[sim.records.length - 1] ?? null,
    grid: sim.world.snapshot(),
    running: sim.isRunning,
    paused: sim.isPaused,
    report,
    error,
  };
}

/**
 * Calls `onChange` on the tick after each step record: the gate closes right after
 * listeners fire. The returned cleanup also cancels a pending call.
 */
export function subscribeNextTick(sim: Simulation, onChange: () => void): () => void {
  let timer: ReturnType<typeof setTimeout> | null = null;
  const unsubscribe = sim.subscribe(() => {
    if (timer !== null) clearTimeout(timer);
    timer = setTimeout(() => {
      timer = null;
      onChange();
    }, 0);
  });
  return () => {
    unsubscribe();
    if (timer !== null) clearTimeout(timer);
  };
}

export function useSimulationRunner(sim: Simulation) {
  const [state, setState] = useState<SimulationRunnerState>(() => readState(sim, null, null));

  useEffect(() => {
    setState((s) => readState(sim, s.report, s.error));
    return subscribeNextTick(sim, () => setState((s) => readState(sim, s.report, s.error)));
  }, [sim]);

  const start = useCallback(() => {
    if (sim.isRunning) return;
    void sim.run().then(
      (report) => setState(readState(sim, report, null)),
      (e: unknown) => {
        log.error('run failed', e);
        setState(readState(sim, null, errorMessage(e)));
      }
    );
    // run() flips isRunning synchronously
    setState(readState(sim, null, null));
  }, [sim]);

  const advance = useCallback(() => sim.advance(), [sim]);
  const jump = useCallback(() => sim.jumpToNextProduction(), [sim]);
  const stop = useCallback(() => sim.stop(), [sim]);
  const reset = useCallback(() => {
    if (sim.isRunning) return;
    sim.reset();
    setState(readState(sim, null, null));
  }, [sim]);

  return { ...state, start, advance, jump, stop, reset };
}
