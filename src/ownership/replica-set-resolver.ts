/**
 * Resolves the ordered replica set owning a token.
 *
 * The ring walk itself belongs to the store client; this layer checks its
 * preconditions, makes one call, and hands back addresses. It never
 * guesses a replication factor and never refreshes metadata.
 *
 * @module ownership/replica-set-resolver
 */

import type {
  Address,
  ClusterTopologySnapshot,
  NodeDescriptor,
  PartitionToken,
} from '../core/types.js';
import type { Logger } from '../core/logger.js';
import { TopologyUnavailableError, UnknownKeyspaceError } from './errors.js';

/**
 * Nodes responsible for a token, in ring-walk order.
 *
 * Entry 0 is the natural owner. Any length is valid, including zero.
 */
export interface ReplicaSet {
  readonly keyspace: string;
  readonly token: PartitionToken;
  readonly replicas: readonly NodeDescriptor[];
  readonly addresses: readonly Address[];
}

export class ReplicaSetResolver {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child('replica-set-resolver');
  }

  /**
   * @throws {UnknownKeyspaceError} If the keyspace has no replication metadata
   * @throws {TopologyUnavailableError} If the snapshot has no token map
   */
  resolve(snapshot: ClusterTopologySnapshot, keyspace: string, token: PartitionToken): ReplicaSet {
    if (!snapshot.keyspaceReplication.has(keyspace)) {
      this.logger.error('Keyspace not found in cluster metadata', { keyspace });
      throw new UnknownKeyspaceError(keyspace);
    }

    const tokenMap = snapshot.tokenMap;
    if (tokenMap === undefined) {
      this.logger.error('Token map not available', { keyspace });
      throw new TopologyUnavailableError(keyspace);
    }

    const replicas = tokenMap.ringOwners(keyspace, token);
    const addresses = replicas.map((node) => node.primaryAddress);

    this.logger.info('Resolved replica set', {
      keyspace,
      token: token.toString(),
      replicas: addresses,
    });

    return { keyspace, token, replicas, addresses };
  }
}
