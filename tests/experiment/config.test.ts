import { describe, it, expect } from 'vitest';
import { loadExperimentConfig, ConfigurationError, EXPERIMENT_DEFAULTS } from '../../src/index.js';

describe('loadExperimentConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadExperimentConfig({});

    expect(config).toEqual({
      connection: {
        contactPoints: ['localhost'],
        port: 9042,
        localDataCenter: 'datacenter1',
        username: '',
        password: '',
      },
      keyspace: 'experiment_rf1',
      table: 'test_data',
      replicationFactor: 1,
      key: 'experiment-key-001',
      value: 'This is test data for the RF=1 experiment',
      containers: ['cassandra-node1', 'cassandra-node2', 'cassandra-node3'],
      expectedNodes: 3,
      clusterMaxWaitMs: 120000,
      nodeDownWaitMs: 10000,
      queryRetryDelayMs: 3000,
      retriesWhileDown: EXPERIMENT_DEFAULTS.RETRIES_WHILE_DOWN,
      retriesAfterRestart: EXPERIMENT_DEFAULTS.RETRIES_AFTER_RESTART,
      healthMaxWaitMs: 180000,
      logLevel: 'info',
      logFormat: 'pretty',
    });
  });

  it('reads and coerces variables', () => {
    const config = loadExperimentConfig({
      CASSANDRA_CONTACT_POINTS: ' 10.0.0.1 , 10.0.0.2,, ',
      CASSANDRA_PORT: '19042',
      CASSANDRA_USERNAME: 'cassandra',
      CASSANDRA_PASSWORD: 'test-secret',
      REPLICATION_FACTOR: '2',
      CONTAINER_NAMES: 'a,b',
      NODE_DOWN_WAIT_MS: '0',
      LOG_LEVEL: 'DEBUG',
      LOG_FORMAT: 'json',
    });

    expect(config.connection).toEqual({
      contactPoints: ['10.0.0.1', '10.0.0.2'],
      port: 19042,
      localDataCenter: 'datacenter1',
      username: 'cassandra',
      password: 'test-secret',
    });
    expect(config.replicationFactor).toBe(2);
    expect(config.value).toBe('This is test data for the RF=2 experiment');
    expect(config.containers).toEqual(['a', 'b']);
    expect(config.nodeDownWaitMs).toBe(0);
    expect(config.logLevel).toBe('debug');
    expect(config.logFormat).toBe('json');
  });

  it('treats empty values as unset', () => {
    expect(loadExperimentConfig({ EXPERIMENT_KEY: '', CASSANDRA_PORT: '' }).key).toBe('experiment-key-001');
  });

  it('reports every invalid variable at once', () => {
    let error: unknown;
    try {
      loadExperimentConfig({ CASSANDRA_PORT: '70000', REPLICATION_FACTOR: '0', CONTAINER_NAMES: ' , ' });
    } catch (e) {
      error = e;
    }

    expect(error).toBeInstanceOf(ConfigurationError);
    const issues = error instanceof ConfigurationError ? error.issues : [];
    expect(issues).toHaveLength(3);
    expect(issues.map((issue) => issue.split(':')[0])).toEqual([
      'CASSANDRA_PORT',
      'REPLICATION_FACTOR',
      'CONTAINER_NAMES',
    ]);
  });

  it('rejects unknown log levels', () => {
    expect(() => loadExperimentConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
  });
});
