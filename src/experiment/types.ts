/**
 * Node failure experiment types.
 *
 * @module experiment/types
 */

import type { Address, InfrastructureUnit, TopologySource } from '../core/types.js';
import type { TokenSource } from '../ownership/token-resolver.js';
import type { UnitProbe } from '../ownership/infrastructure-mapper.js';
import type { StoredRecord } from '../store/rows.js';
import type { ConsistencyName, ReadOptions } from '../store/cassandra-store.js';

/**
 * Store operations the experiment drives. `CassandraStore` implements it.
 */
export interface ExperimentStore extends TopologySource {
  waitForNodes(expected: number, maxWaitMs: number): Promise<boolean>;
  createKeyspace(keyspace: string, replicationFactor: number): Promise<void>;
  createTable(keyspace: string, table: string): Promise<void>;
  insertRecord(keyspace: string, table: string, record: StoredRecord, consistency?: ConsistencyName): Promise<void>;
  readRecord(keyspace: string, table: string, id: string, options?: ReadOptions): Promise<StoredRecord | null>;
}

export type ExperimentStep =
  | 'wait_for_cluster'
  | 'create_keyspace'
  | 'create_table'
  | 'insert'
  | 'verify_before_removal'
  | 'resolve_owner'
  | 'map_container'
  | 'stop_node'
  | 'start_node';

export interface AbortedExperiment {
  readonly status: 'aborted';
  readonly step: ExperimentStep;
  readonly reason: string;

  /** Probes of the failed container mapping, when that step aborted */
  readonly probes?: readonly UnitProbe[];
}

export interface CompletedExperiment {
  readonly status: 'completed';
  readonly keyspace: string;
  readonly replicationFactor: number;
  readonly key: string;
  readonly token: string;
  readonly tokenSource: TokenSource;
  readonly replicas: readonly Address[];

  /** Replica the failure was injected on (entry 0 of the replica set) */
  readonly owner: Address;

  readonly container: InfrastructureUnit;
  readonly availableWhileDown: boolean;
  readonly availableAfterRestart: boolean;
  readonly healthyAfterRestart: boolean;
  readonly ownerRecognizedAfterRestart: boolean;

  /** Unavailable while down and available again after restart */
  readonly asExpected: boolean;
}

export type ExperimentResult = AbortedExperiment | CompletedExperiment;
