/**
 * Cassandra access for the harness, built on the DataStax Node.js driver.
 *
 * Implements the token query and topology capabilities consumed by
 * ownership resolution, plus the routine DDL, writes and polling reads the
 * experiments perform. Every statement is logged with its bound values.
 *
 * @example
 * ```typescript
 * const store = await CassandraStore.connect(
 *   { contactPoints: ['localhost'], port: 9042, localDataCenter: 'datacenter1' },
 *   logger,
 * );
 * await store.createKeyspace('experiment_rf1', 1);
 * const snapshot = await store.snapshot();
 * await store.shutdown();
 * ```
 *
 * @module store/cassandra-store
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { Client, auth, types } from 'cassandra-driver';
import type {
  ClusterTopologySnapshot,
  CqlStatement,
  PartitionToken,
  ReplicationMetadata,
  TokenQuery,
  TokenRow,
  TopologySource,
} from '../core/types.js';
import type { Logger } from '../core/logger.js';
import { renderCql } from './cql.js';
import {
  decodeBroadcastAddresses,
  decodePartitioner,
  decodeRecordRow,
  decodeReplication,
  decodeTokenRow,
  toNodeDescriptor,
  type StoredRecord,
} from './rows.js';

// =============================================================================
// Types
// =============================================================================

export type ConsistencyName = 'ONE' | 'QUORUM' | 'LOCAL_QUORUM' | 'ALL';

export const CONSISTENCY_NAMES = ['ONE', 'QUORUM', 'LOCAL_QUORUM', 'ALL'] as const satisfies readonly ConsistencyName[];

const CONSISTENCY_LEVELS: Readonly<Record<ConsistencyName, types.consistencies>> = {
  ONE: types.consistencies.one,
  QUORUM: types.consistencies.quorum,
  LOCAL_QUORUM: types.consistencies.localQuorum,
  ALL: types.consistencies.all,
};

export interface ConnectionOptions {
  readonly contactPoints: readonly string[];
  readonly port: number;
  readonly localDataCenter: string;
  readonly username?: string;
  readonly password?: string;
}

export interface ReadOptions {
  /** @default 'ONE' */
  readonly consistency?: ConsistencyName;

  /** @default 1 */
  readonly maxRetries?: number;

  /** @default 3000 */
  readonly retryDelayMs?: number;
}

export interface CassandraStoreOptions {
  /**
   * Pause after dropping a keyspace, for the schema change to propagate.
   * @default 1000
   */
  readonly schemaSettleMs?: number;
}

export const STORE_DEFAULTS = {
  /** Default retry delay for polling reads in milliseconds */
  RETRY_DELAY_MS: 3000,

  /** Pause after DROP KEYSPACE in milliseconds */
  SCHEMA_SETTLE_MS: 1000,

  /** Poll interval while waiting for nodes in milliseconds */
  NODE_POLL_INTERVAL_MS: 2000,

  /** Rows returned by a sensor read */
  SENSOR_READ_LIMIT: 50,
} as const;

// =============================================================================
// CassandraStore
// =============================================================================

export class CassandraStore implements TokenQuery, TopologySource {
  private readonly client: Client;
  private readonly logger: Logger;
  private readonly schemaSettleMs: number;

  constructor(client: Client, logger: Logger, options: CassandraStoreOptions = {}) {
    this.client = client;
    this.logger = logger.child('cassandra-store');
    this.schemaSettleMs = options.schemaSettleMs ?? STORE_DEFAULTS.SCHEMA_SETTLE_MS;
  }

  /**
   * Connects to the cluster.
   *
   * @throws The driver's NoHostAvailableError when no contact point answers
   */
  static async connect(
    connection: ConnectionOptions,
    logger: Logger,
    options: CassandraStoreOptions = {},
  ): Promise<CassandraStore> {
    const log = logger.child('cassandra-store');
    log.info('Connecting to Cassandra cluster', {
      contactPoints: connection.contactPoints,
      port: connection.port,
      localDataCenter: connection.localDataCenter,
    });

    const client = new Client({
      contactPoints: [...connection.contactPoints],
      localDataCenter: connection.localDataCenter,
      protocolOptions: { port: connection.port },
      ...(connection.username
        ? { authProvider: new auth.PlainTextAuthProvider(connection.username, connection.password ?? '') }
        : {}),
    });

    try {
      await client.connect();
    } catch (error) {
      log.error('Unable to connect to Cassandra', {
        error: error instanceof Error ? error.message : String(error),
      });
      await client.shutdown();
      throw error;
    }

    log.info('Connected to cluster');
    return new CassandraStore(client, logger, options);
  }

  // ---------------------------------------------------------------------------
  // Capabilities consumed by ownership resolution
  // ---------------------------------------------------------------------------

  async fetchTokens(statement: CqlStatement): Promise<readonly TokenRow[]> {
    const result = await this.execute(statement.query, statement.params);
    this.logger.info('Token query returned rows', { rows: result.rowLength });
    return result.rows.map((row) => decodeTokenRow(row));
  }

  async snapshot(): Promise<ClusterTopologySnapshot> {
    const local = await this.execute('SELECT partitioner, rpc_address, broadcast_address FROM system.local');
    const peers = await this.execute('SELECT peer, rpc_address FROM system.peers');
    const broadcastByAddress = decodeBroadcastAddresses(local.first() ?? undefined, peers.rows);

    const metadata = this.client.metadata;
    const nodes = this.client.hosts.values().map((host) => toNodeDescriptor(host, broadcastByAddress));

    const keyspaceReplication = new Map<string, ReplicationMetadata>();
    for (const [name, keyspace] of Object.entries(metadata.keyspaces)) {
      const replication = decodeReplication(keyspace);
      if (replication !== null) {
        keyspaceReplication.set(name, replication);
      }
    }

    const tokenRanges: ReadonlySet<unknown> | undefined = metadata.getTokenRanges();
    const ringLoaded = tokenRanges !== undefined && tokenRanges.size > 0;

    return {
      partitionerName: decodePartitioner(local.first() ?? undefined),
      nodes,
      keyspaceReplication,
      ...(ringLoaded
        ? {
            tokenMap: {
              ringOwners: (keyspace: string, token: PartitionToken) => {
                const hosts = metadata.getReplicas(keyspace, metadata.newToken(token.toString())) ?? [];
                return hosts.map((host) => toNodeDescriptor(host, broadcastByAddress));
              },
            },
          }
        : {}),
    };
  }

  async refresh(keyspace?: string): Promise<void> {
    await this.client.metadata.refreshKeyspaces();
    if (keyspace !== undefined) {
      await this.client.metadata.refreshKeyspace(keyspace);
    }
    this.logger.info('Refreshed cluster metadata', { keyspace });
  }

  // ---------------------------------------------------------------------------
  // Cluster state
  // ---------------------------------------------------------------------------

  /**
   * Polls the driver's host map until `expected` hosts are up.
   *
   * @returns false when `maxWaitMs` elapses first
   */
  async waitForNodes(
    expected: number,
    maxWaitMs: number,
    pollIntervalMs: number = STORE_DEFAULTS.NODE_POLL_INTERVAL_MS,
  ): Promise<boolean> {
    this.logger.info('Waiting for cluster nodes', { expected });
    const deadline = Date.now() + maxWaitMs;

    while (Date.now() < deadline) {
      const hosts = this.client.hosts.values();
      const up = hosts.filter((host) => host.isUp());
      this.logger.info('Cluster status', { up: up.length, total: hosts.length });

      if (up.length >= expected) {
        for (const host of up) {
          this.logger.info('Node up', { address: host.address, rack: host.rack, datacenter: host.datacenter });
        }
        return true;
      }
      await sleep(pollIntervalMs);
    }

    this.logger.error('Cluster did not reach expected node count', { expected, maxWaitMs });
    return false;
  }

  // ---------------------------------------------------------------------------
  // Schema and data
  // ---------------------------------------------------------------------------

  /**
   * Drops and recreates a keyspace with SimpleStrategy.
   */
  async createKeyspace(keyspace: string, replicationFactor: number): Promise<void> {
    this.logger.info('Creating keyspace', { keyspace, replicationFactor });
    await this.execute(`DROP KEYSPACE IF EXISTS ${keyspace}`);
    await sleep(this.schemaSettleMs);
    await this.execute(
      `CREATE KEYSPACE ${keyspace} WITH replication = {'class': 'SimpleStrategy', 'replication_factor': '${replicationFactor}'}`,
    );
  }

  async createTable(keyspace: string, table: string): Promise<void> {
    this.logger.info('Creating table', { keyspace, table });
    await this.execute(
      `CREATE TABLE IF NOT EXISTS ${keyspace}.${table} (id text, value text, timestamp timestamp, PRIMARY KEY (id))`,
    );
  }

  async insertRecord(
    keyspace: string,
    table: string,
    record: StoredRecord,
    consistency: ConsistencyName = 'ONE',
  ): Promise<void> {
    await this.execute(
      `INSERT INTO ${keyspace}.${table} (id, value, timestamp) VALUES (?, ?, ?)`,
      [record.id, record.value, record.timestamp],
      consistency,
    );
    this.logger.info('Inserted record', { id: record.id, value: record.value });
  }

  /**
   * Reads a record by id, retrying while it is missing or the read fails.
   *
   * @returns null when no attempt found the record
   */
  async readRecord(
    keyspace: string,
    table: string,
    id: string,
    options: ReadOptions = {},
  ): Promise<StoredRecord | null> {
    const maxRetries = options.maxRetries ?? 1;
    const retryDelayMs = options.retryDelayMs ?? STORE_DEFAULTS.RETRY_DELAY_MS;
    const query = `SELECT * FROM ${keyspace}.${table} WHERE id = ?`;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        const result = await this.execute(query, [id], options.consistency ?? 'ONE');
        const row = result.first();
        if (row) {
          const record = decodeRecordRow(row);
          this.logger.info('Data retrieved', {
            attempt,
            id: record.id,
            value: record.value,
            timestamp: record.timestamp.toISOString(),
          });
          return record;
        }
        this.logger.warn('No data returned', { attempt, maxRetries, id });
      } catch (error) {
        this.logger.warn('Error reading data', {
          attempt,
          maxRetries,
          error: error instanceof Error ? error.message : String(error),
        });
      }

      if (attempt < maxRetries) {
        await sleep(retryDelayMs);
      }
    }

    return null;
  }

  // ---------------------------------------------------------------------------
  // Sensor data (load generation)
  // ---------------------------------------------------------------------------

  /**
   * Creates the sensor keyspace (RF=1) and table if missing.
   */
  async ensureSensorSchema(keyspace: string): Promise<void> {
    await this.execute(
      `CREATE KEYSPACE IF NOT EXISTS ${keyspace} WITH replication = {'class': 'SimpleStrategy', 'replication_factor': '1'}`,
    );
    await this.execute(
      `CREATE TABLE IF NOT EXISTS ${keyspace}.sensor_data (device_id text, ts timestamp, value double, PRIMARY KEY (device_id, ts)) WITH CLUSTERING ORDER BY (ts DESC)`,
    );
  }

  async writeReading(
    keyspace: string,
    deviceId: string,
    ts: Date,
    value: number,
    consistency: ConsistencyName,
  ): Promise<void> {
    await this.execute(
      `INSERT INTO ${keyspace}.sensor_data (device_id, ts, value) VALUES (?, ?, ?)`,
      [deviceId, ts, value],
      consistency,
      'debug',
    );
  }

  async readReadings(keyspace: string, deviceId: string, consistency: ConsistencyName): Promise<number> {
    const result = await this.execute(
      `SELECT * FROM ${keyspace}.sensor_data WHERE device_id = ? LIMIT ${STORE_DEFAULTS.SENSOR_READ_LIMIT}`,
      [deviceId],
      consistency,
      'debug',
    );
    return result.rowLength;
  }

  async shutdown(): Promise<void> {
    await this.client.shutdown();
    this.logger.info('Disconnected from cluster');
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async execute(
    query: string,
    params: readonly unknown[] = [],
    consistency?: ConsistencyName,
    logLevel: 'info' | 'debug' = 'info',
  ): Promise<types.ResultSet> {
    this.logger[logLevel]('CQL query', { cql: renderCql(query, params) });
    return this.client.execute(query, [...params], {
      prepare: params.length > 0,
      ...(consistency !== undefined ? { consistency: CONSISTENCY_LEVELS[consistency] } : {}),
    });
  }
}
