/**
 * Shared types for replica ownership resolution and the collaborators it
 * talks to.
 *
 * Everything here is a transient view recomputed per call. Topology in
 * particular mirrors cluster gossip and may already be stale when read.
 *
 * @module core/types
 */

// =============================================================================
// Ring and Topology
// =============================================================================

/**
 * A position on the hash ring.
 *
 * Locally computed tokens are unsigned 32-bit values; tokens reported by a
 * Murmur3-partitioned store are signed 64-bit values. Both fit a bigint.
 */
export type PartitionToken = bigint;

/**
 * Network address of a node as the cluster reports it (host without port).
 */
export type Address = string;

/**
 * Opaque handle of something the harness can stop and start,
 * e.g. a container name.
 */
export type InfrastructureUnit = string;

/**
 * One cluster member as seen through the store's gossip metadata.
 */
export interface NodeDescriptor {
  /** Address the store considers canonical for this node */
  readonly primaryAddress: Address;

  /** Second address some stores report, e.g. under NAT */
  readonly broadcastAddress?: Address;

  readonly isReachable: boolean;

  /** Informational only */
  readonly rackId?: string;

  /** Informational only */
  readonly datacenterId?: string;
}

/**
 * Replication strategy of one keyspace.
 */
export interface ReplicationMetadata {
  /** Strategy class, e.g. `org.apache.cassandra.locator.SimpleStrategy` */
  readonly strategy: string;

  /** Strategy options such as `replication_factor` or per-datacenter counts */
  readonly options: Readonly<Record<string, string>>;
}

/**
 * The store client's ring walk.
 */
export interface TokenMap {
  /**
   * Returns the nodes owning `token` under the keyspace's replication
   * strategy, in ring-walk order (first entry is the natural owner).
   */
  ringOwners(keyspace: string, token: PartitionToken): readonly NodeDescriptor[];
}

/**
 * Read-only view of cluster membership and partitioning.
 */
export interface ClusterTopologySnapshot {
  /** Partitioner class name; not always reported */
  readonly partitionerName?: string;

  /** All known members, reachable or not */
  readonly nodes: readonly NodeDescriptor[];

  /** Missing entry means the keyspace is unknown */
  readonly keyspaceReplication: ReadonlyMap<string, ReplicationMetadata>;

  /** Absent until the store client has loaded the ring */
  readonly tokenMap?: TokenMap;
}

// =============================================================================
// Collaborator Capabilities
// =============================================================================

/**
 * A parameterised CQL statement.
 */
export interface CqlStatement {
  readonly query: string;
  readonly params: readonly unknown[];
}

/**
 * Row of a token query, decoded by the store adapter.
 */
export interface TokenRow {
  readonly tokenValue: PartitionToken;
}

/**
 * Runs token-producing queries against the live store.
 */
export interface TokenQuery {
  fetchTokens(statement: CqlStatement): Promise<readonly TokenRow[]>;
}

/**
 * Source of topology snapshots.
 */
export interface TopologySource {
  snapshot(): Promise<ClusterTopologySnapshot>;

  /**
   * Reloads cluster metadata. Invoked by the orchestrating caller only;
   * resolution never refreshes on its own.
   */
  refresh(keyspace?: string): Promise<void>;
}

/**
 * Address lookup of infrastructure units.
 */
export interface InfrastructureControl {
  /**
   * Returns the unit's current network address, or null when it has none.
   * Rejects when the runtime cannot be queried.
   */
  currentAddress(unit: InfrastructureUnit): Promise<Address | null>;
}
