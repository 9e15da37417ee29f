// components/StepperPanel.tsx
// Last step record plus the single-step controls.

import React from 'react';
import type { StepRecord } from '../lib/sim/types';

type Props = {
  record: StepRecord | null;
  paused: boolean;
  onAdvance: () => void;
  onJump: () => void;
  onStop?: () => void;
};

const fmt = (t: number) => t.toFixed(3);

export const StepperPanel: React.FC<Props> = ({ record, paused, onAdvance, onJump, onStop }) => {
  return (
    <div className="stepper-panel flex flex-col gap-2 font-mono text-sm">
      <div className="flex gap-2">
        <button type="button" disabled={!paused} onClick={onAdvance}>
          advance
        </button>
        <button type="button" disabled={!paused} onClick={onJump}>
          jump to next production
        </button>
        {onStop ? (
          <button type="button" onClick={onStop}>
            stop
          </button>
        ) : null}
      </div>

      {!record ? (
        <div className="opacity-70">no steps yet</div>
      ) : (
        <dl className="grid grid-cols-2 gap-1">
          <dt>step</dt>
          <dd>{`#${record.index} ${record.agentId}`}</dd>
          <dt>time</dt>
          <dd>{`${fmt(record.dueTime)} → ${fmt(record.nextDueTime)}`}</dd>
          <dt>production</dt>
          <dd>{record.firedProduction ?? '—'}</dd>
          <dt>motor</dt>
          <dd>{record.motor ? `${record.motor.key}: ${record.motor.token}` : '—'}</dd>
          <dt>stimulus</dt>
          <dd>{record.stimulus ? `${Object.keys(record.stimulus).length} cells` : '—'}</dd>
          <dt>state</dt>
          <dd>{record.failure ? `${record.stateAfter} (${record.failure.code}: ${record.failure.message})` : record.stateAfter}</dd>
        </dl>
      )}
    </div>
  );
};
