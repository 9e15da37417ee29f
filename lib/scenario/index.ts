export * from './types';
export { normalizeScenario } from './normalizeScenario';
export { buildSimulation } from './buildSimulation';
export type { BuildSimulationOptions, BuiltScenario } from './buildSimulation';
export { loadScenarioFile } from './loadScenarioFile';
