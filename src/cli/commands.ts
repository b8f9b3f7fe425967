/**
 * The `ringfault` commands: wiring of configuration, logger, store,
 * container runtime and ownership resolution.
 *
 * @module cli/commands
 */

import { createLogger, type Logger, type LogFormat, type LogLevel } from '../core/logger.js';
import type { Environment } from '../core/config.js';
import { CassandraStore } from '../store/cassandra-store.js';
import { DockerCli } from '../infrastructure/docker-cli.js';
import { OwnershipResolver, type Ownership } from '../ownership/ownership-resolver.js';
import type { MappingResult } from '../ownership/infrastructure-mapper.js';
import { TokenResolutionFailedError, TopologyUnavailableError, UnknownKeyspaceError } from '../ownership/errors.js';
import { loadExperimentConfig } from '../experiment/config.js';
import { NodeFailureExperiment } from '../experiment/node-failure-experiment.js';
import { exitCodeFor } from '../experiment/report.js';
import { loadLoadConfig } from '../load/config.js';
import { formatSummary, runLoadTest } from '../load/load-test.js';
import { sensorTarget } from '../load/sensor-target.js';

function rootLogger(service: string, level: LogLevel, format: LogFormat): Logger {
  return createLogger(service, { level, pretty: format === 'pretty' });
}

/**
 * Report lines of a `locate` run.
 */
export function formatLocation(key: string, ownership: Ownership, mapping: MappingResult | null): string[] {
  const { resolution, replicaSet } = ownership;
  const lines = [
    `Key: ${key}`,
    `Token: ${resolution.token.toString()} (from ${resolution.source})`,
    `Replicas: ${replicaSet.addresses.length > 0 ? replicaSet.addresses.join(', ') : '(none)'}`,
  ];

  if (mapping === null) {
    return lines;
  }
  if (mapping.resolved) {
    lines.push(`Container: ${mapping.unit} (${mapping.unitAddress}, ${mapping.strategy}/${mapping.rule})`);
  } else {
    const probes = mapping.probes.map((probe) => `${probe.unit}=${probe.address ?? 'unknown'}`).join(', ');
    lines.push(`Container: not found for ${mapping.target} (probed ${probes || 'nothing'})`);
  }
  return lines;
}

// =============================================================================
// Commands
// =============================================================================

export async function runExperiment(env: Environment): Promise<number> {
  const config = loadExperimentConfig(env);
  const logger = rootLogger('experiment', config.logLevel, config.logFormat);
  const store = await CassandraStore.connect(config.connection, logger);
  const runtime = new DockerCli({ logger });

  try {
    const experiment = new NodeFailureExperiment({
      store,
      runtime,
      ownership: new OwnershipResolver({ store, topology: store, control: runtime, logger }),
      config,
      logger,
    });
    const result = await experiment.run();
    return exitCodeFor(result);
  } finally {
    await store.shutdown();
  }
}

export async function runLocate(env: Environment): Promise<number> {
  const config = loadExperimentConfig(env);
  const logger = rootLogger('locate', config.logLevel, config.logFormat);
  const store = await CassandraStore.connect(config.connection, logger);
  const runtime = new DockerCli({ logger });
  const ownership = new OwnershipResolver({ store, topology: store, control: runtime, logger });

  try {
    let owned: Ownership;
    try {
      owned = await ownership.resolve({ keyspace: config.keyspace, table: config.table, key: config.key });
    } catch (error) {
      if (
        error instanceof TokenResolutionFailedError ||
        error instanceof UnknownKeyspaceError ||
        error instanceof TopologyUnavailableError
      ) {
        logger.error(error.message);
        return 1;
      }
      throw error;
    }

    const owner = owned.replicaSet.addresses[0];
    const mapping = owner === undefined ? null : await ownership.locate(owner, config.containers);
    for (const line of formatLocation(config.key, owned, mapping)) {
      logger.info(line);
    }
    return mapping?.resolved ? 0 : 1;
  } finally {
    await store.shutdown();
  }
}

export async function runLoad(env: Environment): Promise<number> {
  const config = loadLoadConfig(env);
  const logger = rootLogger('load', config.logLevel, config.logFormat);
  const store = await CassandraStore.connect(config.connection, logger);

  try {
    await store.ensureSensorSchema(config.keyspace);
    const summary = await runLoadTest({
      target: sensorTarget(store, config.keyspace, config.consistency),
      logger,
      concurrency: config.concurrency,
      durationMs: config.durationMs,
      writeRatio: config.writeRatio,
      errorSampleLimit: config.errorSampleLimit,
    });
    for (const line of formatSummary(summary)) {
      logger.info(line);
    }
    return 0;
  } finally {
    await store.shutdown();
  }
}
