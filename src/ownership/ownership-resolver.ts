/**
 * Replica ownership resolution end to end.
 *
 * Turns {keyspace, table, key} into the ordered replica set owning the key,
 * and a node address into the infrastructure unit hosting it. Choosing
 * which replica to act on is left to the caller.
 *
 * @example
 * ```typescript
 * const ownership = new OwnershipResolver({ store, topology, control, logger });
 *
 * const { replicaSet } = await ownership.resolve({ keyspace: 'ks', table: 'test_data', key: 'k1' });
 * const owner = replicaSet.addresses[0];
 * if (owner !== undefined) {
 *   const mapping = await ownership.locate(owner, ['cassandra-node1', 'cassandra-node2']);
 * }
 * ```
 *
 * @module ownership/ownership-resolver
 */

import type {
  Address,
  InfrastructureControl,
  InfrastructureUnit,
  TokenQuery,
  TopologySource,
} from '../core/types.js';
import type { Logger } from '../core/logger.js';
import type { TokenComputer } from './token-codec.js';
import { TokenResolver, type TokenResolution } from './token-resolver.js';
import { ReplicaSetResolver, type ReplicaSet } from './replica-set-resolver.js';
import { InfrastructureMapper, type MappingResult } from './infrastructure-mapper.js';

export interface OwnershipRequest {
  readonly keyspace: string;
  readonly table: string;
  readonly key: string;
}

export interface Ownership {
  readonly resolution: TokenResolution;
  readonly replicaSet: ReplicaSet;
}

export interface OwnershipResolverOptions {
  readonly store: TokenQuery;
  readonly topology: TopologySource;
  readonly control: InfrastructureControl;
  readonly logger: Logger;
  readonly codec?: TokenComputer;
  readonly partitionKeyColumn?: string;
}

export class OwnershipResolver {
  private readonly topology: TopologySource;
  private readonly tokens: TokenResolver;
  private readonly replicas: ReplicaSetResolver;
  private readonly mapper: InfrastructureMapper;

  constructor(options: OwnershipResolverOptions) {
    const logger = options.logger.child('ownership');
    this.topology = options.topology;
    this.tokens = new TokenResolver({
      store: options.store,
      logger,
      codec: options.codec,
      partitionKeyColumn: options.partitionKeyColumn,
    });
    this.replicas = new ReplicaSetResolver(logger);
    this.mapper = new InfrastructureMapper(options.control, logger);
  }

  /**
   * Resolves the replica set owning a key from a single topology snapshot.
   *
   * @throws {TokenResolutionFailedError} If no token could be determined
   * @throws {UnknownKeyspaceError} If the keyspace is not in cluster metadata
   * @throws {TopologyUnavailableError} If the ring is not loaded
   */
  async resolve(request: OwnershipRequest): Promise<Ownership> {
    const snapshot = await this.topology.snapshot();
    const resolution = await this.tokens.resolve({
      ...request,
      partitionerName: snapshot.partitionerName,
    });
    const replicaSet = this.replicas.resolve(snapshot, request.keyspace, resolution.token);
    return { resolution, replicaSet };
  }

  /**
   * Finds the unit hosting the node at `address`, using a fresh snapshot
   * for the topology fallback.
   */
  async locate(address: Address, units: readonly InfrastructureUnit[]): Promise<MappingResult> {
    const snapshot = await this.topology.snapshot();
    return this.mapper.map(address, units, snapshot);
  }
}
