/**
 * Single-replica failure experiment.
 *
 * Writes a record at a reduced replication factor, resolves which node
 * owns it, stops that node's container, checks the record is unavailable,
 * restarts the container and checks the record is back.
 *
 * Any ownership failure aborts the run before a container is touched.
 *
 * @module experiment/node-failure-experiment
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { Address, InfrastructureUnit } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import type { ContainerRuntime } from '../infrastructure/types.js';
import type { MappingResult } from '../ownership/infrastructure-mapper.js';
import type { OwnershipResolver, Ownership } from '../ownership/ownership-resolver.js';
import {
  TokenResolutionFailedError,
  TopologyUnavailableError,
  UnknownKeyspaceError,
} from '../ownership/errors.js';
import type { ExperimentConfig } from './config.js';
import { exitCodeFor, formatAbort, formatReport } from './report.js';
import type {
  AbortedExperiment,
  CompletedExperiment,
  ExperimentResult,
  ExperimentStep,
  ExperimentStore,
} from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * Events emitted by NodeFailureExperiment.
 */
export interface ExperimentEvents {
  /** Emitted when a step begins. */
  step: [step: ExperimentStep];
  /** Emitted after the owner's container was stopped. */
  nodeStopped: [container: InfrastructureUnit, owner: Address];
  /** Emitted after the owner's container was started again. */
  nodeStarted: [container: InfrastructureUnit, owner: Address];
  /** Emitted once with the final result. */
  finished: [result: ExperimentResult];
}

type Listener<K extends keyof ExperimentEvents> = (...args: ExperimentEvents[K]) => void;

export interface NodeFailureExperimentOptions {
  readonly store: ExperimentStore;
  readonly runtime: ContainerRuntime;
  readonly ownership: OwnershipResolver;
  readonly config: ExperimentConfig;
  readonly logger: Logger;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// =============================================================================
// NodeFailureExperiment
// =============================================================================

export class NodeFailureExperiment {
  private readonly store: ExperimentStore;
  private readonly runtime: ContainerRuntime;
  private readonly ownership: OwnershipResolver;
  private readonly config: ExperimentConfig;
  private readonly logger: Logger;
  private readonly listeners: { [K in keyof ExperimentEvents]: Set<Listener<K>> } = {
    step: new Set(),
    nodeStopped: new Set(),
    nodeStarted: new Set(),
    finished: new Set(),
  };

  constructor(options: NodeFailureExperimentOptions) {
    this.store = options.store;
    this.runtime = options.runtime;
    this.ownership = options.ownership;
    this.config = options.config;
    this.logger = options.logger.child('experiment');
  }

  // ===========================================================================
  // Event Emitter Methods
  // ===========================================================================

  on<K extends keyof ExperimentEvents>(event: K, listener: Listener<K>): this {
    this.listeners[event].add(listener);
    return this;
  }

  off<K extends keyof ExperimentEvents>(event: K, listener: Listener<K>): this {
    this.listeners[event].delete(listener);
    return this;
  }

  private emit<K extends keyof ExperimentEvents>(event: K, ...args: ExperimentEvents[K]): void {
    for (const listener of this.listeners[event]) {
      listener(...args);
    }
  }

  // ===========================================================================
  // Run
  // ===========================================================================

  /**
   * Runs the experiment once and logs the report.
   */
  async run(): Promise<ExperimentResult> {
    const result = await this.execute();

    const lines = result.status === 'completed' ? formatReport(result) : formatAbort(result);
    for (const line of lines) {
      this.logger.info(line);
    }
    this.logger.info('Experiment finished', { status: result.status, exitCode: exitCodeFor(result) });

    this.emit('finished', result);
    return result;
  }

  private async execute(): Promise<ExperimentResult> {
    const { keyspace, table, key } = this.config;

    this.step('wait_for_cluster');
    if (!(await this.store.waitForNodes(this.config.expectedNodes, this.config.clusterMaxWaitMs))) {
      return this.abort('wait_for_cluster', `cluster did not reach ${this.config.expectedNodes} nodes`);
    }

    try {
      this.step('create_keyspace');
      await this.store.createKeyspace(keyspace, this.config.replicationFactor);
    } catch (error) {
      return this.abort('create_keyspace', errorMessage(error));
    }

    try {
      this.step('create_table');
      await this.store.createTable(keyspace, table);
    } catch (error) {
      return this.abort('create_table', errorMessage(error));
    }

    try {
      this.step('insert');
      await this.store.insertRecord(keyspace, table, {
        id: key,
        value: this.config.value,
        timestamp: new Date(),
      });
    } catch (error) {
      return this.abort('insert', errorMessage(error));
    }

    this.step('verify_before_removal');
    const before = await this.store.readRecord(keyspace, table, key, { maxRetries: 1 });
    if (before === null) {
      return this.abort('verify_before_removal', 'record not readable before node removal');
    }

    this.step('resolve_owner');
    let ownership: Ownership;
    try {
      ownership = await this.ownership.resolve({ keyspace, table, key });
    } catch (error) {
      if (
        error instanceof TokenResolutionFailedError ||
        error instanceof UnknownKeyspaceError ||
        error instanceof TopologyUnavailableError
      ) {
        return this.abort('resolve_owner', error.message);
      }
      throw error;
    }

    const { replicaSet, resolution } = ownership;
    const owner = replicaSet.addresses[0];
    if (owner === undefined) {
      return this.abort('resolve_owner', 'replica set is empty');
    }
    if (replicaSet.addresses.length > 1) {
      this.logger.warn('Replica set has more than one node; injecting failure on the first only', {
        replicas: replicaSet.addresses,
      });
    }
    this.logger.info('Data is stored on node', { owner });

    this.step('map_container');
    let mapping: MappingResult;
    try {
      mapping = await this.ownership.locate(owner, this.config.containers);
    } catch (error) {
      return this.abort('map_container', errorMessage(error));
    }
    if (!mapping.resolved) {
      await this.logKnownHosts(owner);
      return {
        ...this.abort('map_container', `no container matches node ${owner}`),
        probes: mapping.probes,
      };
    }
    const container = mapping.unit;
    this.logger.info('Will stop container', { container, strategy: mapping.strategy, rule: mapping.rule });

    this.step('stop_node');
    try {
      await this.runtime.stop(container);
    } catch (error) {
      return this.abort('stop_node', errorMessage(error));
    }
    this.emit('nodeStopped', container, owner);

    this.logger.info('Waiting for cluster to detect node unavailability', { ms: this.config.nodeDownWaitMs });
    await sleep(this.config.nodeDownWaitMs);
    await this.refresh();

    const whileDown = await this.store.readRecord(keyspace, table, key, {
      maxRetries: this.config.retriesWhileDown,
      retryDelayMs: this.config.queryRetryDelayMs,
    });

    this.step('start_node');
    try {
      await this.runtime.start(container);
    } catch (error) {
      return this.abort('start_node', errorMessage(error));
    }
    this.emit('nodeStarted', container, owner);

    const healthy = await this.runtime.waitForHealthy(container, { maxWaitMs: this.config.healthMaxWaitMs });
    if (!healthy) {
      this.logger.warn('Container did not become healthy, continuing with query test', { container });
    }

    await this.refresh();
    const recognized = await this.isOwnerUp(owner);

    const afterRestart = await this.store.readRecord(keyspace, table, key, {
      maxRetries: this.config.retriesAfterRestart,
      retryDelayMs: this.config.queryRetryDelayMs,
    });

    const availableWhileDown = whileDown !== null;
    const availableAfterRestart = afterRestart !== null;

    const result: CompletedExperiment = {
      status: 'completed',
      keyspace,
      replicationFactor: this.config.replicationFactor,
      key,
      token: resolution.token.toString(),
      tokenSource: resolution.source,
      replicas: replicaSet.addresses,
      owner,
      container,
      availableWhileDown,
      availableAfterRestart,
      healthyAfterRestart: healthy,
      ownerRecognizedAfterRestart: recognized,
      asExpected: !availableWhileDown && availableAfterRestart,
    };
    return result;
  }

  // ===========================================================================
  // Helpers
  // ===========================================================================

  private step(step: ExperimentStep): void {
    this.logger.info('Experiment step', { step });
    this.emit('step', step);
  }

  private abort(step: ExperimentStep, reason: string): AbortedExperiment {
    this.logger.error('Experiment aborted', { step, reason });
    return { status: 'aborted', step, reason };
  }

  private async refresh(): Promise<void> {
    try {
      await this.store.refresh(this.config.keyspace);
    } catch (error) {
      this.logger.warn('Could not refresh metadata', { error: errorMessage(error) });
    }
  }

  private async logKnownHosts(owner: Address): Promise<void> {
    try {
      const snapshot = await this.store.snapshot();
      this.logger.error('Could not determine which container to stop', {
        owner,
        hosts: snapshot.nodes.map((n) => ({
          address: n.primaryAddress,
          broadcast: n.broadcastAddress ?? null,
        })),
      });
    } catch (error) {
      this.logger.error('Could not determine which container to stop', { owner, error: errorMessage(error) });
    }
  }

  private async isOwnerUp(owner: Address): Promise<boolean> {
    try {
      const snapshot = await this.store.snapshot();
      const up = snapshot.nodes.filter((n) => n.isReachable);
      const recognized = up.some((n) => n.primaryAddress === owner);
      if (recognized) {
        this.logger.info('Node is back up and recognized by cluster', { owner });
      } else {
        this.logger.warn('Node not yet recognized by cluster', {
          owner,
          up: up.length,
          total: snapshot.nodes.length,
        });
      }
      return recognized;
    } catch (error) {
      this.logger.warn('Error checking cluster status', { error: errorMessage(error) });
      return false;
    }
  }
}
