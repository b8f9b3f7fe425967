/**
 * Decoding of driver rows and metadata into typed records.
 *
 * Driver rows expose columns by name with untyped values; everything the
 * harness reads goes through a decoder here so the rest of the code works
 * with plain typed records.
 *
 * @module store/rows
 */

import { types } from 'cassandra-driver';
import { z } from 'zod';
import type { NodeDescriptor, PartitionToken, ReplicationMetadata, TokenRow } from '../core/types.js';
import { Endpoint } from './endpoint.js';

/**
 * Minimal row shape; `types.Row` satisfies it.
 */
export interface RowLike {
  get(columnName: string): unknown;
}

/**
 * Minimal host shape; the driver's `Host` satisfies it.
 */
export interface HostLike {
  readonly address: string;
  readonly datacenter?: string;
  readonly rack?: string;
  isUp(): boolean;
}

/**
 * A record of the experiment table.
 */
export interface StoredRecord {
  readonly id: string;
  readonly value: string;
  readonly timestamp: Date;
}

/**
 * Thrown when a row does not have the expected shape.
 */
export class RowDecodeError extends Error {
  override readonly name = 'RowDecodeError' as const;

  constructor(
    readonly column: string,
    reason: string,
  ) {
    super(`Cannot decode column '${column}': ${reason}`);
  }
}

// =============================================================================
// Scalars
// =============================================================================

/**
 * Converts a driver token value (a `Long` for Murmur3) into a bigint.
 */
export function toPartitionToken(value: unknown, column = 'token_value'): PartitionToken {
  if (value instanceof types.Long) {
    return BigInt(value.toString());
  }
  if (typeof value === 'bigint') {
    return value;
  }
  if (typeof value === 'number' && Number.isInteger(value)) {
    return BigInt(value);
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value)) {
    return BigInt(value);
  }
  throw new RowDecodeError(column, `unsupported token value ${String(value)}`);
}

/**
 * Reads an `inet` column as a string, or undefined when it is null.
 */
export function readInet(row: RowLike, column: string): string | undefined {
  const value = row.get(column);
  if (value instanceof types.InetAddress) {
    return value.toString();
  }
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }
  return undefined;
}

function readString(row: RowLike, column: string): string | undefined {
  const value = row.get(column);
  return typeof value === 'string' ? value : undefined;
}

// =============================================================================
// Rows
// =============================================================================

export function decodeTokenRow(row: RowLike): TokenRow {
  return { tokenValue: toPartitionToken(row.get('token_value')) };
}

export function decodeRecordRow(row: RowLike): StoredRecord {
  const id = readString(row, 'id');
  if (id === undefined) {
    throw new RowDecodeError('id', 'expected text');
  }
  const timestamp = row.get('timestamp');
  return {
    id,
    value: readString(row, 'value') ?? '',
    timestamp: timestamp instanceof Date ? timestamp : new Date(0),
  };
}

export function decodePartitioner(row: RowLike | undefined): string | undefined {
  return row === undefined ? undefined : readString(row, 'partitioner');
}

/**
 * Builds the map from a node's client-facing address to its broadcast
 * address out of `system.local` and `system.peers` rows.
 */
export function decodeBroadcastAddresses(
  local: RowLike | undefined,
  peers: readonly RowLike[],
): Map<string, string> {
  const byRpcAddress = new Map<string, string>();

  if (local !== undefined) {
    const rpc = readInet(local, 'rpc_address');
    const broadcast = readInet(local, 'broadcast_address');
    if (rpc !== undefined && broadcast !== undefined) {
      byRpcAddress.set(rpc, broadcast);
    }
  }

  for (const row of peers) {
    const rpc = readInet(row, 'rpc_address');
    const peer = readInet(row, 'peer');
    if (rpc !== undefined && peer !== undefined) {
      byRpcAddress.set(rpc, peer);
    }
  }

  return byRpcAddress;
}

// =============================================================================
// Metadata
// =============================================================================

const keyspaceMetadataSchema = z.object({
  strategy: z.string(),
  strategyOptions: z.record(z.coerce.string()).optional(),
});

/**
 * Decodes a driver keyspace metadata object, or null when it lacks a
 * replication strategy.
 */
export function decodeReplication(keyspace: unknown): ReplicationMetadata | null {
  const parsed = keyspaceMetadataSchema.safeParse(keyspace);
  if (!parsed.success) {
    return null;
  }
  return { strategy: parsed.data.strategy, options: parsed.data.strategyOptions ?? {} };
}

/**
 * Converts a driver host into a node descriptor.
 */
export function toNodeDescriptor(host: HostLike, broadcastByAddress: ReadonlyMap<string, string>): NodeDescriptor {
  const primaryAddress = Endpoint.hostOfHostPort(host.address);
  const broadcastAddress = broadcastByAddress.get(primaryAddress);

  return {
    primaryAddress,
    isReachable: host.isUp(),
    ...(broadcastAddress !== undefined ? { broadcastAddress } : {}),
    ...(host.rack ? { rackId: host.rack } : {}),
    ...(host.datacenter ? { datacenterId: host.datacenter } : {}),
  };
}
