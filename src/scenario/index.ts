export type { Scenario, Position } from './types.js';
export {
  TRUST_FLOW_EXAMPLE,
  listScenarios,
  getScenario,
  resolveScenario,
} from './scenarios.js';
export { parseScenario, loadScenarioFile } from './loader.js';
export { circularLayout } from './layout.js';
