// lib/scenario/types.ts

import type { Coord } from '../grid/types';

export type ScenarioAgent = {
  id: string;
  // logical type resolved through the AgentTypeRegistry ('Human' = external)
  type: string;
  label: string;
  losRadius: number;
  startTime: number;
  // null: a random free cell drawn from the scenario seed
  position: Coord | null;
  params: Record<string, unknown>;
};

export type ScenarioMarker = {
  label: string;
  row: number;
  col: number;
};

export type Scenario = {
  id: string;
  title: string;
  seed: number;
  rows: number;
  cols: number;
  // ASCII rows (see DEFAULT_LEGEND); null for an empty grid
  layout: string[] | null;
  markers: ScenarioMarker[];
  agents: ScenarioAgent[];
  // raw simulation options; normalized by the Simulation
  options: Record<string, unknown>;
};

export type ScenarioIssue = {
  path: string;
  message: string;
};
