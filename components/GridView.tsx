// components/GridView.tsx
// SVG rendering of a grid snapshot: walls, obstacles, markers and labelled agent discs.

import React, { useMemo } from 'react';
import type { GridSnapshot } from '../lib/grid/types';
import type { SymbolMap } from '../lib/mediator/symbols';
import { TOKEN_OCCLUDED } from '../lib/mediator/symbols';
import { colorForLabel, shortLabel } from '../lib/ui/colors';

type Props = {
  grid: GridSnapshot;
  cellSize?: number;
  // highlighted agent (thicker outline)
  selectedId?: string | null;
  // shade the cells of this view (visible vs occluded)
  view?: SymbolMap | null;
};

const WALL = '#334155';
const OBSTACLE = '#a8a29e';
const FLOOR = '#f8fafc';
const SEEN = '#fef9c3';
const HIDDEN = '#e2e8f0';

export const GridView: React.FC<Props> = ({ grid, cellSize = 32, selectedId = null, view = null }) => {
  const floor = useMemo(() => {
    const out: Array<{ key: string; row: number; col: number; fill: string }> = [];
    for (let row = 0; row < grid.rows; row++) {
      for (let col = 0; col < grid.cols; col++) {
        const key = `${row},${col}`;
        const seen = view?.[key];
        const fill = !seen ? FLOOR : seen.token === TOKEN_OCCLUDED ? HIDDEN : SEEN;
        out.push({ key, row, col, fill });
      }
    }
    return out;
  }, [grid.rows, grid.cols, view]);

  const W = grid.cols * cellSize;
  const H = grid.rows * cellSize;
  const half = cellSize / 2;

  return (
    <svg
      className="grid-view"
      width={W}
      height={H}
      viewBox={`0 0 ${W} ${H}`}
      role="img"
      aria-label={`grid ${grid.rows}x${grid.cols}`}
    >
      {floor.map((c) => (
        <rect
          key={`f:${c.key}`}
          x={c.col * cellSize}
          y={c.row * cellSize}
          width={cellSize}
          height={cellSize}
          fill={c.fill}
          stroke="#cbd5e1"
        />
      ))}

      {grid.markers.map((m) => (
        <circle
          key={`m:${m.id}`}
          data-marker={m.label}
          cx={m.col * cellSize + half}
          cy={m.row * cellSize + half}
          r={cellSize * 0.12}
          fill="#64748b"
        >
          <title>{m.label}</title>
        </circle>
      ))}

      {grid.entities.map((e) => {
        const x = e.col * cellSize;
        const y = e.row * cellSize;
        if (e.kind !== 'agent') {
          return (
            <rect
              key={`e:${e.id}`}
              data-kind={e.kind}
              x={x}
              y={y}
              width={cellSize}
              height={cellSize}
              fill={e.kind === 'wall' ? WALL : OBSTACLE}
            />
          );
        }
        return (
          <g key={`e:${e.id}`} data-agent={e.id}>
            <circle
              cx={x + half}
              cy={y + half}
              r={half * 0.8}
              fill={colorForLabel(e.label)}
              stroke="#0f172a"
              strokeWidth={e.id === selectedId ? 3 : 1}
            />
            <text
              x={x + half}
              y={y + half}
              textAnchor="middle"
              dominantBaseline="central"
              fontSize={cellSize * 0.3}
              fontFamily="monospace"
            >
              {shortLabel(e.label)}
            </text>
          </g>
        );
      })}
    </svg>
  );
};
