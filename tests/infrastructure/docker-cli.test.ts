import { describe, it, expect, vi } from 'vitest';
import { DockerCli, ContainerRuntimeError, addressFromInspect, healthFromInspect } from '../../src/index.js';
import type { CommandRunner } from '../../src/index.js';
import { createRecordingLogger } from '../helpers/recording-logger.js';

function inspectOutput(state: object, networks: Record<string, { IPAddress: string } | null> = {}): string {
  return JSON.stringify([{ State: state, NetworkSettings: { Networks: networks } }]);
}

function runnerReturning(...outputs: string[]) {
  const queue = [...outputs];
  return vi.fn<CommandRunner>(async () => ({ stdout: queue.shift() ?? '' }));
}

describe('addressFromInspect', () => {
  it('returns the first non-empty network address', () => {
    expect(
      addressFromInspect({
        NetworkSettings: { Networks: { bridge: { IPAddress: '' }, cassandra: { IPAddress: '172.18.0.3' } } },
      }),
    ).toBe('172.18.0.3');
  });

  it('returns null without networks', () => {
    expect(addressFromInspect({})).toBeNull();
    expect(addressFromInspect({ NetworkSettings: { Networks: null } })).toBeNull();
  });
});

describe('healthFromInspect', () => {
  it('reads known health states and ignores others', () => {
    expect(healthFromInspect({ State: { Health: { Status: 'healthy' } } })).toBe('healthy');
    expect(healthFromInspect({ State: { Health: { Status: 'weird' } } })).toBeNull();
    expect(healthFromInspect({ State: { Running: true } })).toBeNull();
  });
});

describe('DockerCli', () => {
  it('inspects the container for its address', async () => {
    const run = runnerReturning(inspectOutput({ Running: true }, { cassandra: { IPAddress: '172.18.0.3' } }));
    const docker = new DockerCli({ logger: createRecordingLogger().logger, run });

    await expect(docker.currentAddress('cassandra-node2')).resolves.toBe('172.18.0.3');
    expect(run).toHaveBeenCalledWith('docker', ['inspect', 'cassandra-node2'], { timeoutMs: 60000 });
  });

  it('reports no address for a stopped container', async () => {
    const run = runnerReturning(inspectOutput({ Running: false }, { cassandra: { IPAddress: '' } }));
    const docker = new DockerCli({ logger: createRecordingLogger().logger, run });

    await expect(docker.currentAddress('cassandra-node2')).resolves.toBeNull();
  });

  it('reads running state and health', async () => {
    const run = runnerReturning(
      inspectOutput({ Running: true, Health: { Status: 'starting' } }),
      inspectOutput({ Running: true, Health: { Status: 'starting' } }),
    );
    const docker = new DockerCli({ logger: createRecordingLogger().logger, run });

    await expect(docker.isRunning('n1')).resolves.toBe(true);
    await expect(docker.healthStatus('n1')).resolves.toBe('starting');
  });

  it('stops with a grace period and starts', async () => {
    const run = runnerReturning('n1', 'n1');
    const docker = new DockerCli({ logger: createRecordingLogger().logger, run, binary: 'podman', commandTimeoutMs: 5000 });

    await docker.stop('n1', 10);
    await docker.start('n1');

    expect(run.mock.calls.map(([file, args]) => [file, ...args])).toEqual([
      ['podman', 'stop', '-t', '10', 'n1'],
      ['podman', 'start', 'n1'],
    ]);
    expect(run.mock.calls[0]?.[2]).toEqual({ timeoutMs: 5000 });
  });

  it('uses a 30 second grace period by default', async () => {
    const run = runnerReturning('n1');
    const docker = new DockerCli({ logger: createRecordingLogger().logger, run });

    await docker.stop('n1');

    expect(run).toHaveBeenCalledWith('docker', ['stop', '-t', '30', 'n1'], { timeoutMs: 60000 });
  });

  it('wraps command failures', async () => {
    const recorder = createRecordingLogger();
    const run = vi.fn<CommandRunner>(async () => {
      throw new Error('Error response from daemon: No such container: n9');
    });
    const docker = new DockerCli({ logger: recorder.logger, run });

    const error = await docker.stop('n9').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ContainerRuntimeError);
    expect(error).toMatchObject({
      operation: 'stop',
      container: 'n9',
      message: 'Container stop failed for n9: Error response from daemon: No such container: n9',
    });
    expect(recorder.find('Docker command failed')).toHaveLength(1);
  });

  it('rejects output that is not JSON or not an inspect array', async () => {
    const docker = new DockerCli({ logger: createRecordingLogger().logger, run: runnerReturning('oops', '[]') });

    await expect(docker.inspect('n1')).rejects.toThrow('Container inspect failed for n1: output is not JSON');
    await expect(docker.inspect('n1')).rejects.toThrow(ContainerRuntimeError);
  });

  describe('waitForHealthy', () => {
    it('returns true once the healthcheck passes', async () => {
      const run = runnerReturning(
        inspectOutput({ Running: true, Health: { Status: 'starting' } }),
        inspectOutput({ Running: true, Health: { Status: 'unhealthy' } }),
        inspectOutput({ Running: true, Health: { Status: 'healthy' } }),
      );
      const docker = new DockerCli({ logger: createRecordingLogger().logger, run });

      await expect(docker.waitForHealthy('n1', { maxWaitMs: 5000, pollIntervalMs: 1 })).resolves.toBe(true);
      expect(run).toHaveBeenCalledTimes(3);
    });

    it('accepts a running container without a healthcheck after settling', async () => {
      const recorder = createRecordingLogger();
      const docker = new DockerCli({ logger: recorder.logger, run: runnerReturning(inspectOutput({ Running: true })) });

      await expect(docker.waitForHealthy('n1', { maxWaitMs: 5000, pollIntervalMs: 1, settleMs: 1 })).resolves.toBe(
        true,
      );
      expect(recorder.find('Container is running (no healthcheck configured)')).toHaveLength(1);
    });

    it('keeps polling through inspect failures and gives up at the deadline', async () => {
      const run = vi.fn<CommandRunner>(async () => {
        throw new Error('daemon not reachable');
      });
      const docker = new DockerCli({ logger: createRecordingLogger().logger, run });

      await expect(docker.waitForHealthy('n1', { maxWaitMs: 30, pollIntervalMs: 5 })).resolves.toBe(false);
      expect(run.mock.calls.length).toBeGreaterThan(1);
    });
  });
});
