/**
 * Simulation Layer - Main Export
 *
 * Runs policies against sampled reviews and aggregates the results.
 */

export {
  runSimulation,
  runExperiment,
  runSynchronizedExperiment,
} from "./simulation_runner.js";

export type { SimulationConfig } from "./simulation_runner.js";

export {
  summarizeExperiment,
  rollingAverage,
  formatSummaryTable,
  buildExperimentResult,
} from "./results.js";

export type { SummaryOptions } from "./results.js";
