import { describe, it, expect, vi } from 'vitest';
import { OwnershipResolver, TokenResolutionFailedError } from '../../src/index.js';
import type {
  ClusterTopologySnapshot,
  InfrastructureControl,
  NodeDescriptor,
  TokenQuery,
  TopologySource,
} from '../../src/index.js';
import { createRecordingLogger } from '../helpers/recording-logger.js';

const MURMUR3 = 'org.apache.cassandra.dht.Murmur3Partitioner';

const node1: NodeDescriptor = { primaryAddress: '10.0.0.1', isReachable: true };
const node2: NodeDescriptor = { primaryAddress: '10.0.0.2', isReachable: true };
const node3: NodeDescriptor = { primaryAddress: '10.0.0.3', isReachable: true };

function topology(partitionerName: string | undefined = MURMUR3) {
  const snapshot: ClusterTopologySnapshot = {
    ...(partitionerName !== undefined ? { partitionerName } : {}),
    nodes: [node1, node2, node3],
    keyspaceReplication: new Map([
      ['ks', { strategy: 'org.apache.cassandra.locator.SimpleStrategy', options: { replication_factor: '1' } }],
    ]),
    tokenMap: {
      ringOwners: (_keyspace, token) => (token === 123456789n ? [node2] : [node1]),
    },
  };
  const source = { snapshot: vi.fn(async () => snapshot), refresh: vi.fn(async () => {}) };
  return source satisfies TopologySource;
}

const containerAddresses: Record<string, string> = {
  'cassandra-node1': '10.0.0.1',
  'cassandra-node2': '10.0.0.2',
  'cassandra-node3': '10.0.0.3',
};

const units: InfrastructureControl = {
  currentAddress: async (unit) => containerAddresses[unit] ?? null,
};

describe('OwnershipResolver', () => {
  it('resolves key to replica and replica to container', async () => {
    const store: TokenQuery = { fetchTokens: async () => [{ tokenValue: 123456789n }] };
    const codec = vi.fn(() => 123456789n);
    const ownership = new OwnershipResolver({
      store,
      topology: topology(),
      control: units,
      logger: createRecordingLogger().logger,
      codec,
    });

    const { resolution, replicaSet } = await ownership.resolve({ keyspace: 'ks', table: 'test_data', key: 'k1' });

    expect(resolution.source).toBe('query');
    expect(resolution.comparison).toEqual({ outcome: 'match' });
    expect(replicaSet.addresses).toEqual(['10.0.0.2']);
    expect(codec).toHaveBeenCalledWith('k1', MURMUR3);

    const mapping = await ownership.locate('10.0.0.2', ['cassandra-node1', 'cassandra-node2', 'cassandra-node3']);
    expect(mapping).toMatchObject({ resolved: true, unit: 'cassandra-node2', rule: 'exact' });
  });

  it('takes one snapshot per resolve and a fresh one per locate', async () => {
    const source = topology();
    const ownership = new OwnershipResolver({
      store: { fetchTokens: async () => [{ tokenValue: 1n }] },
      topology: source,
      control: units,
      logger: createRecordingLogger().logger,
    });

    await ownership.resolve({ keyspace: 'ks', table: 'test_data', key: 'k1' });
    await ownership.locate('10.0.0.1', ['cassandra-node1']);

    expect(source.snapshot).toHaveBeenCalledTimes(2);
    expect(source.refresh).not.toHaveBeenCalled();
  });

  it('fails when the store has no row and the partitioner is unsupported', async () => {
    const ownership = new OwnershipResolver({
      store: { fetchTokens: async () => [] },
      topology: topology('org.apache.cassandra.dht.RandomPartitioner'),
      control: units,
      logger: createRecordingLogger().logger,
    });

    await expect(ownership.resolve({ keyspace: 'ks', table: 'test_data', key: 'k1' })).rejects.toThrow(
      TokenResolutionFailedError,
    );
  });

  it('builds the token query on a custom partition key column', async () => {
    const fetchTokens = vi.fn(async () => [{ tokenValue: 5n }]);
    const ownership = new OwnershipResolver({
      store: { fetchTokens },
      topology: topology(),
      control: units,
      logger: createRecordingLogger().logger,
      partitionKeyColumn: 'device_id',
    });

    await ownership.resolve({ keyspace: 'ks', table: 'sensor_data', key: 'device-1' });

    expect(fetchTokens).toHaveBeenCalledWith({
      query: 'SELECT token(device_id) AS token_value FROM ks.sensor_data WHERE device_id = ?',
      params: ['device-1'],
    });
  });
});
