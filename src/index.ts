/**
 * ringfault - replica ownership resolution and single-node failure
 * experiments for Cassandra clusters running in containers.
 *
 * This module provides the public API of the library.
 */

export const VERSION = '0.1.0' as const;

// Core types
export type {
  PartitionToken,
  Address,
  InfrastructureUnit,
  NodeDescriptor,
  ReplicationMetadata,
  TokenMap,
  ClusterTopologySnapshot,
  CqlStatement,
  TokenRow,
  TokenQuery,
  TopologySource,
  InfrastructureControl,
} from './core/types.js';

// Logging and configuration
export {
  createLogger,
  silentLogger,
  type Logger,
  type LoggerOptions,
  type LogData,
  type LogLevel,
  type LogFormat,
} from './core/logger.js';
export { ConfigurationError, parseEnvironment, type Environment } from './core/config.js';

export * from './ownership/index.js';
export * from './store/index.js';
export * from './infrastructure/index.js';
export * from './experiment/index.js';
export * from './load/index.js';
