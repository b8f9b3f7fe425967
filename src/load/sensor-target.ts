/**
 * Adapts a CassandraStore to the load generator.
 *
 * @module load/sensor-target
 */

import type { ConsistencyName } from '../store/cassandra-store.js';
import type { LoadTarget } from './load-test.js';

/**
 * The sensor-data subset of `CassandraStore` the target needs.
 */
export interface SensorStore {
  writeReading(keyspace: string, deviceId: string, ts: Date, value: number, consistency: ConsistencyName): Promise<void>;
  readReadings(keyspace: string, deviceId: string, consistency: ConsistencyName): Promise<number>;
}

export function sensorTarget(store: SensorStore, keyspace: string, consistency: ConsistencyName): LoadTarget {
  return {
    write: (deviceId, ts, value) => store.writeReading(keyspace, deviceId, ts, value, consistency),
    read: (deviceId) => store.readReadings(keyspace, deviceId, consistency),
  };
}
