// components/SimulationDebugger.tsx
// Grid, stepper and agent table for one Simulation.

import React, { useState } from 'react';
import type { Simulation } from '../lib/sim/simulation';
import { useSimulationRunner } from '../hooks/useSimulationRunner';
import { GridView } from './GridView';
import { StepperPanel } from './StepperPanel';

type Props = {
  sim: Simulation;
  cellSize?: number;
};

export const SimulationDebugger: React.FC<Props> = ({ sim, cellSize }) => {
  const runner = useSimulationRunner(sim);
  const [selected, setSelected] = useState<string | null>(null);
  const selectedAgent = selected ? sim.agent(selected) : undefined;

  return (
    <div className="simulation-debugger flex gap-4">
      <GridView grid={runner.grid} cellSize={cellSize} selectedId={selected} view={selectedAgent?.visualStimuli ?? null} />

      <div className="flex flex-col gap-3">
        <div className="flex gap-2">
          <button type="button" disabled={runner.running} onClick={runner.start}>
            run
          </button>
          <button type="button" disabled={runner.running} onClick={runner.reset}>
            reset
          </button>
        </div>

        <StepperPanel
          record={runner.record}
          paused={runner.paused}
          onAdvance={runner.advance}
          onJump={runner.jump}
          onStop={runner.running ? runner.stop : undefined}
        />

        <table className="text-xs font-mono">
          <thead>
            <tr>
              <th>agent</th>
              <th>state</th>
              <th>t</th>
              <th>steps</th>
            </tr>
          </thead>
          <tbody>
            {sim.agentList().map((a) => (
              <tr key={a.id} onClick={() => setSelected(a.id === selected ? null : a.id)}>
                <td>{a.label}</td>
                <td>{a.state}</td>
                <td>{a.clock.actrTime.toFixed(3)}</td>
                <td>{a.steps}</td>
              </tr>
            ))}
          </tbody>
        </table>

        {runner.report ? <div>{`finished: ${runner.report.reason} after ${runner.report.steps} steps`}</div> : null}
        {runner.error ? <div className="text-red-600">{`error: ${runner.error}`}</div> : null}
      </div>
    </div>
  );
};
