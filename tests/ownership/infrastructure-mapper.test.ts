import { describe, it, expect, vi } from 'vitest';
import { InfrastructureMapper, matchAddress } from '../../src/index.js';
import type { ClusterTopologySnapshot, InfrastructureControl } from '../../src/index.js';
import { createRecordingLogger } from '../helpers/recording-logger.js';

function control(addresses: Record<string, string | null | Error>): InfrastructureControl {
  return {
    currentAddress: vi.fn(async (unit: string) => {
      const address = addresses[unit];
      if (address instanceof Error) {
        throw address;
      }
      return address ?? null;
    }),
  };
}

describe('matchAddress', () => {
  it('applies exact, then target-in-unit, then unit-in-target', () => {
    expect(matchAddress('10.0.0.2', '10.0.0.2')).toBe('exact');
    expect(matchAddress('10.0.0.2', '10.0.0.25')).toBe('target_in_unit');
    expect(matchAddress('10.0.0.25', '10.0.0.2')).toBe('unit_in_target');
    expect(matchAddress('10.0.0.2', '10.0.0.3')).toBeNull();
  });
});

describe('InfrastructureMapper', () => {
  const units = ['cassandra-node1', 'cassandra-node2', 'cassandra-node3'];

  it('maps by exact probe', async () => {
    const mapper = new InfrastructureMapper(
      control({ 'cassandra-node1': '10.0.0.1', 'cassandra-node2': '10.0.0.2', 'cassandra-node3': '10.0.0.3' }),
      createRecordingLogger().logger,
    );

    const result = await mapper.map('10.0.0.2', units);

    expect(result).toEqual({
      resolved: true,
      unit: 'cassandra-node2',
      unitAddress: '10.0.0.2',
      strategy: 'direct',
      rule: 'exact',
    });
  });

  it('lets the first unit in list order win, even on a looser rule', async () => {
    const addresses = { A: '10.0.0.25', B: '10.0.0.2' };
    const mapper = new InfrastructureMapper(control(addresses), createRecordingLogger().logger);

    const forward = await mapper.map('10.0.0.2', ['A', 'B']);
    const reverse = await mapper.map('10.0.0.2', ['B', 'A']);

    expect(forward).toMatchObject({ resolved: true, unit: 'A', rule: 'target_in_unit' });
    expect(reverse).toMatchObject({ resolved: true, unit: 'B', rule: 'exact' });
  });

  it('stops probing once a unit matches', async () => {
    const lookup = control({ 'cassandra-node1': '10.0.0.1', 'cassandra-node2': '10.0.0.2' });
    const mapper = new InfrastructureMapper(lookup, createRecordingLogger().logger);

    await mapper.map('10.0.0.1', units);

    expect(lookup.currentAddress).toHaveBeenCalledTimes(1);
  });

  it('skips units with no address and units whose probe fails', async () => {
    const recorder = createRecordingLogger();
    const mapper = new InfrastructureMapper(
      control({ 'cassandra-node1': new Error('No such object'), 'cassandra-node2': '', 'cassandra-node3': '10.0.0.3' }),
      recorder.logger,
    );

    const result = await mapper.map('10.0.0.3', units);

    expect(result).toMatchObject({ resolved: true, unit: 'cassandra-node3' });
    expect(recorder.find('Could not determine unit address, skipping')[0]?.data).toEqual({
      unit: 'cassandra-node1',
      error: 'No such object',
    });
  });

  it('falls back to the topology cross-reference through the broadcast address', async () => {
    const lookup = control({ 'cassandra-node1': '172.18.0.5', 'cassandra-node2': '172.18.0.6' });
    const snapshot: ClusterTopologySnapshot = {
      nodes: [
        { primaryAddress: '192.168.1.10', broadcastAddress: '172.18.0.5', isReachable: true },
        { primaryAddress: '192.168.1.11', broadcastAddress: '172.18.0.6', isReachable: true },
      ],
      keyspaceReplication: new Map(),
    };
    const mapper = new InfrastructureMapper(lookup, createRecordingLogger().logger);

    const result = await mapper.map('192.168.1.11', ['cassandra-node1', 'cassandra-node2'], snapshot);

    expect(result).toEqual({
      resolved: true,
      unit: 'cassandra-node2',
      unitAddress: '172.18.0.6',
      strategy: 'topology',
      rule: 'exact',
    });
    expect(lookup.currentAddress).toHaveBeenCalledTimes(2);
  });

  it('reports every probe when nothing matches', async () => {
    const mapper = new InfrastructureMapper(
      control({ 'cassandra-node1': '172.18.0.5', 'cassandra-node2': null }),
      createRecordingLogger().logger,
    );

    const result = await mapper.map('192.168.1.99', ['cassandra-node1', 'cassandra-node2'], {
      nodes: [{ primaryAddress: '192.168.1.10', isReachable: true }],
      keyspaceReplication: new Map(),
    });

    expect(result).toEqual({
      resolved: false,
      target: '192.168.1.99',
      probes: [
        { unit: 'cassandra-node1', address: '172.18.0.5' },
        { unit: 'cassandra-node2', address: null },
      ],
    });
  });

  it('returns unresolved for an empty unit list without probing', async () => {
    const lookup = control({});
    const mapper = new InfrastructureMapper(lookup, createRecordingLogger().logger);

    const result = await mapper.map('10.0.0.1', []);

    expect(result).toEqual({ resolved: false, target: '10.0.0.1', probes: [] });
    expect(lookup.currentAddress).not.toHaveBeenCalled();
  });

  it('probes again on every call', async () => {
    const addresses: Record<string, string> = { 'cassandra-node1': '10.0.0.1' };
    const mapper = new InfrastructureMapper(control(addresses), createRecordingLogger().logger);

    expect(await mapper.map('10.0.0.1', ['cassandra-node1'])).toMatchObject({ resolved: true });
    addresses['cassandra-node1'] = '10.0.0.9';
    expect(await mapper.map('10.0.0.1', ['cassandra-node1'])).toMatchObject({ resolved: false });
  });
});
