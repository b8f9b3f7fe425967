/**
 * Load generation against the sensor-data table.
 *
 * @module load
 */

export { loadLoadConfig, type LoadConfig } from './config.js';
export {
  runLoadTest,
  summarize,
  formatSummary,
  randomDeviceId,
  type LoadTarget,
  type LoadTestOptions,
  type LoadStats,
  type LoadSummary,
  type ErrorSample,
  type OperationKind,
} from './load-test.js';
export { sensorTarget, type SensorStore } from './sensor-target.js';
