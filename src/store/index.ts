/**
 * Cassandra store adapter.
 *
 * @module store
 */

export {
  CassandraStore,
  CONSISTENCY_NAMES,
  STORE_DEFAULTS,
  type ConsistencyName,
  type ConnectionOptions,
  type ReadOptions,
  type CassandraStoreOptions,
} from './cassandra-store.js';
export { renderCql, formatCqlLiteral } from './cql.js';
export { Endpoint, InvalidEndpointError, type EndpointComponents } from './endpoint.js';
export {
  RowDecodeError,
  decodeBroadcastAddresses,
  decodePartitioner,
  decodeRecordRow,
  decodeReplication,
  decodeTokenRow,
  readInet,
  toNodeDescriptor,
  toPartitionToken,
  type HostLike,
  type RowLike,
  type StoredRecord,
} from './rows.js';
