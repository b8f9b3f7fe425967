/**
 * Load generator configuration.
 *
 * @module load/config
 */

import { z } from 'zod';
import type { LogFormat, LogLevel } from '../core/logger.js';
import { CONSISTENCY_NAMES, type ConnectionOptions, type ConsistencyName } from '../store/cassandra-store.js';
import { connectionSchema, loggingSchema, parseEnvironment, type Environment } from '../core/config.js';

const loadSchema = connectionSchema.merge(loggingSchema).extend({
  CASSANDRA_KEYSPACE: z.string().min(1).default('test_scaling'),
  NUM_THREADS: z.coerce.number().int().min(1).default(8),
  DURATION_SECONDS: z.coerce.number().int().min(1).default(60),
  WRITE_RATIO: z.coerce.number().min(0).max(1).default(0.5),
  CONSISTENCY: z
    .string()
    .default('ONE')
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(CONSISTENCY_NAMES)),
  ERROR_LOG_LIMIT: z.coerce.number().int().min(0).default(5),
});

export interface LoadConfig {
  readonly connection: ConnectionOptions;
  readonly keyspace: string;

  /** Concurrent workers */
  readonly concurrency: number;

  readonly durationMs: number;
  readonly writeRatio: number;
  readonly consistency: ConsistencyName;
  readonly errorSampleLimit: number;
  readonly logLevel: LogLevel;
  readonly logFormat: LogFormat;
}

/**
 * Loads the load generator configuration from environment variables.
 *
 * @throws {ConfigurationError} If any variable is invalid
 */
export function loadLoadConfig(env: Environment = process.env): LoadConfig {
  const vars = parseEnvironment(loadSchema, env);

  return {
    connection: {
      contactPoints: vars.CASSANDRA_CONTACT_POINTS,
      port: vars.CASSANDRA_PORT,
      localDataCenter: vars.CASSANDRA_LOCAL_DC,
      username: vars.CASSANDRA_USERNAME,
      password: vars.CASSANDRA_PASSWORD,
    },
    keyspace: vars.CASSANDRA_KEYSPACE,
    concurrency: vars.NUM_THREADS,
    durationMs: vars.DURATION_SECONDS * 1000,
    writeRatio: vars.WRITE_RATIO,
    consistency: vars.CONSISTENCY,
    errorSampleLimit: vars.ERROR_LOG_LIMIT,
    logLevel: vars.LOG_LEVEL,
    logFormat: vars.LOG_FORMAT,
  };
}
