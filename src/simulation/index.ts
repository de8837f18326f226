export { PopulationSimulator } from './PopulationSimulator';
export type { VariantScenario, SimulationScenario, SimulatedPopulation } from './PopulationSimulator';
