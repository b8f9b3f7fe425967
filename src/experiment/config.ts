/**
 * Node failure experiment configuration.
 *
 * @module experiment/config
 */

import { z } from 'zod';
import type { InfrastructureUnit } from '../core/types.js';
import type { LogFormat, LogLevel } from '../core/logger.js';
import type { ConnectionOptions } from '../store/cassandra-store.js';
import { commaList, connectionSchema, loggingSchema, parseEnvironment, type Environment } from '../core/config.js';

const experimentSchema = connectionSchema.merge(loggingSchema).extend({
  CASSANDRA_KEYSPACE: z.string().min(1).default('experiment_rf1'),
  CASSANDRA_TABLE: z.string().min(1).default('test_data'),
  REPLICATION_FACTOR: z.coerce.number().int().min(1).default(1),
  EXPERIMENT_KEY: z.string().min(1).default('experiment-key-001'),
  CONTAINER_NAMES: commaList('cassandra-node1,cassandra-node2,cassandra-node3'),
  EXPECTED_NODES: z.coerce.number().int().min(1).default(3),
  CLUSTER_MAX_WAIT_MS: z.coerce.number().int().min(0).default(120000),
  NODE_DOWN_WAIT_MS: z.coerce.number().int().min(0).default(10000),
  QUERY_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(3000),
  HEALTH_MAX_WAIT_MS: z.coerce.number().int().min(0).default(180000),
});

export interface ExperimentConfig {
  readonly connection: ConnectionOptions;
  readonly keyspace: string;
  readonly table: string;
  readonly replicationFactor: number;
  readonly key: string;
  readonly value: string;

  /** Candidate containers, in match priority order */
  readonly containers: readonly InfrastructureUnit[];

  readonly expectedNodes: number;
  readonly clusterMaxWaitMs: number;

  /** Pause after stopping the owner, for the cluster to notice */
  readonly nodeDownWaitMs: number;

  readonly queryRetryDelayMs: number;

  /** Read attempts while the owner is down */
  readonly retriesWhileDown: number;

  /** Read attempts after the owner restarted */
  readonly retriesAfterRestart: number;

  readonly healthMaxWaitMs: number;
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
}

export const EXPERIMENT_DEFAULTS = {
  RETRIES_WHILE_DOWN: 3,
  RETRIES_AFTER_RESTART: 5,
} as const;

/**
 * Loads the experiment configuration from environment variables.
 *
 * @throws {ConfigurationError} If any variable is invalid
 */
export function loadExperimentConfig(env: Environment = process.env): ExperimentConfig {
  const vars = parseEnvironment(experimentSchema, env);

  return {
    connection: {
      contactPoints: vars.CASSANDRA_CONTACT_POINTS,
      port: vars.CASSANDRA_PORT,
      localDataCenter: vars.CASSANDRA_LOCAL_DC,
      username: vars.CASSANDRA_USERNAME,
      password: vars.CASSANDRA_PASSWORD,
    },
    keyspace: vars.CASSANDRA_KEYSPACE,
    table: vars.CASSANDRA_TABLE,
    replicationFactor: vars.REPLICATION_FACTOR,
    key: vars.EXPERIMENT_KEY,
    value: `This is test data for the RF=${vars.REPLICATION_FACTOR} experiment`,
    containers: vars.CONTAINER_NAMES,
    expectedNodes: vars.EXPECTED_NODES,
    clusterMaxWaitMs: vars.CLUSTER_MAX_WAIT_MS,
    nodeDownWaitMs: vars.NODE_DOWN_WAIT_MS,
    queryRetryDelayMs: vars.QUERY_RETRY_DELAY_MS,
    retriesWhileDown: EXPERIMENT_DEFAULTS.RETRIES_WHILE_DOWN,
    retriesAfterRestart: EXPERIMENT_DEFAULTS.RETRIES_AFTER_RESTART,
    healthMaxWaitMs: vars.HEALTH_MAX_WAIT_MS,
    logLevel: vars.LOG_LEVEL,
    logFormat: vars.LOG_FORMAT,
  };
}
