/**
 * Node failure experiment.
 *
 * @module experiment
 */

export {
  NodeFailureExperiment,
  type ExperimentEvents,
  type NodeFailureExperimentOptions,
} from './node-failure-experiment.js';
export { loadExperimentConfig, EXPERIMENT_DEFAULTS, type ExperimentConfig } from './config.js';
export { formatReport, formatAbort, exitCodeFor } from './report.js';
export type {
  AbortedExperiment,
  CompletedExperiment,
  ExperimentResult,
  ExperimentStep,
  ExperimentStore,
} from './types.js';
