import { describe, it, expect } from 'vitest';
import { loadLoadConfig, sensorTarget, ConfigurationError } from '../../src/index.js';
import type { SensorStore } from '../../src/index.js';

describe('loadLoadConfig', () => {
  it('applies defaults', () => {
    const config = loadLoadConfig({});

    expect(config).toMatchObject({
      keyspace: 'test_scaling',
      concurrency: 8,
      durationMs: 60000,
      writeRatio: 0.5,
      consistency: 'ONE',
      errorSampleLimit: 5,
    });
  });

  it('reads overrides and normalizes the consistency name', () => {
    const config = loadLoadConfig({
      NUM_THREADS: '16',
      DURATION_SECONDS: '5',
      WRITE_RATIO: '0.8',
      CONSISTENCY: 'local_quorum',
    });

    expect(config.concurrency).toBe(16);
    expect(config.durationMs).toBe(5000);
    expect(config.writeRatio).toBe(0.8);
    expect(config.consistency).toBe('LOCAL_QUORUM');
  });

  it('rejects a write ratio outside [0, 1] and unknown consistency levels', () => {
    expect(() => loadLoadConfig({ WRITE_RATIO: '1.5' })).toThrow(ConfigurationError);
    expect(() => loadLoadConfig({ CONSISTENCY: 'TWO' })).toThrow(ConfigurationError);
    expect(() => loadLoadConfig({ NUM_THREADS: '0' })).toThrow(ConfigurationError);
  });
});

describe('sensorTarget', () => {
  it('forwards operations with keyspace and consistency', async () => {
    const calls: string[] = [];
    const store: SensorStore = {
      writeReading: async (keyspace, deviceId, ts, value, consistency) => {
        calls.push(`write ${keyspace} ${deviceId} ${ts.toISOString()} ${value} ${consistency}`);
      },
      readReadings: async (keyspace, deviceId, consistency) => {
        calls.push(`read ${keyspace} ${deviceId} ${consistency}`);
        return 7;
      },
    };
    const target = sensorTarget(store, 'test_scaling', 'QUORUM');

    await target.write('device-a', new Date('2024-03-01T00:00:00.000Z'), 21.5);
    const rows = await target.read('device-a');

    expect(rows).toBe(7);
    expect(calls).toEqual([
      'write test_scaling device-a 2024-03-01T00:00:00.000Z 21.5 QUORUM',
      'read test_scaling device-a QUORUM',
    ]);
  });
});
