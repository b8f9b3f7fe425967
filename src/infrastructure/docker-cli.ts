/**
 * Container runtime over the `docker` command line.
 *
 * `docker inspect` output is validated before use; addresses come from the
 * first attached network that has an IP.
 *
 * @example
 * ```typescript
 * const docker = new DockerCli({ logger });
 * const ip = await docker.currentAddress('cassandra-node1');
 * await docker.stop('cassandra-node1');
 * await docker.start('cassandra-node1');
 * const healthy = await docker.waitForHealthy('cassandra-node1', { maxWaitMs: 180000 });
 * ```
 *
 * @module infrastructure/docker-cli
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { execa } from 'execa';
import { z } from 'zod';
import type { Address, InfrastructureUnit } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import {
  ContainerRuntimeError,
  RUNTIME_DEFAULTS,
  type ContainerOperation,
  type ContainerRuntime,
  type HealthStatus,
  type WaitForHealthyOptions,
} from './types.js';

// =============================================================================
// Command Runner
// =============================================================================

export interface CommandResult {
  readonly stdout: string;
}

/**
 * Runs an executable and resolves with its output, rejecting on a non-zero
 * exit.
 */
export type CommandRunner = (
  file: string,
  args: readonly string[],
  options: { readonly timeoutMs: number },
) => Promise<CommandResult>;

const execaRunner: CommandRunner = async (file, args, options) => {
  const result = await execa(file, args, { timeout: options.timeoutMs });
  return { stdout: result.stdout };
};

// =============================================================================
// Inspect Output
// =============================================================================

const inspectSchema = z
  .array(
    z.object({
      State: z
        .object({
          Running: z.boolean().optional(),
          Health: z.object({ Status: z.string().optional() }).nullish(),
        })
        .optional(),
      NetworkSettings: z
        .object({
          Networks: z.record(z.object({ IPAddress: z.string().optional() }).nullable()).nullish(),
        })
        .optional(),
    }),
  )
  .min(1);

export type ContainerInspect = z.infer<typeof inspectSchema>[number];

const HEALTH_STATUSES: readonly HealthStatus[] = ['healthy', 'unhealthy', 'starting'];

function isHealthStatus(value: string): value is HealthStatus {
  return HEALTH_STATUSES.some((status) => status === value);
}

/**
 * First non-empty IP across the container's networks.
 */
export function addressFromInspect(inspect: ContainerInspect): Address | null {
  const networks = inspect.NetworkSettings?.Networks ?? {};
  for (const network of Object.values(networks)) {
    const ip = network?.IPAddress;
    if (ip) {
      return ip;
    }
  }
  return null;
}

export function healthFromInspect(inspect: ContainerInspect): HealthStatus | null {
  const status = inspect.State?.Health?.Status;
  return status !== undefined && isHealthStatus(status) ? status : null;
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// =============================================================================
// DockerCli
// =============================================================================

export interface DockerCliOptions {
  readonly logger: Logger;

  /** @default 'docker' */
  readonly binary?: string;

  /**
   * Timeout for a single docker command in milliseconds.
   * @default 60000
   */
  readonly commandTimeoutMs?: number;

  /** Replaces process execution, e.g. in tests */
  readonly run?: CommandRunner;
}

export class DockerCli implements ContainerRuntime {
  private readonly logger: Logger;
  private readonly binary: string;
  private readonly commandTimeoutMs: number;
  private readonly run: CommandRunner;

  constructor(options: DockerCliOptions) {
    this.logger = options.logger.child('docker');
    this.binary = options.binary ?? 'docker';
    this.commandTimeoutMs = options.commandTimeoutMs ?? 60000;
    this.run = options.run ?? execaRunner;
  }

  async inspect(unit: InfrastructureUnit): Promise<ContainerInspect> {
    const { stdout } = await this.docker('inspect', unit, ['inspect', unit]);

    let json: unknown;
    try {
      json = JSON.parse(stdout);
    } catch (error) {
      throw new ContainerRuntimeError('inspect', unit, 'output is not JSON', toError(error));
    }

    const parsed = inspectSchema.safeParse(json);
    if (!parsed.success) {
      throw new ContainerRuntimeError('inspect', unit, `unexpected output: ${parsed.error.message}`);
    }
    const [first] = parsed.data;
    if (first === undefined) {
      throw new ContainerRuntimeError('inspect', unit, 'no such container');
    }
    return first;
  }

  async currentAddress(unit: InfrastructureUnit): Promise<Address | null> {
    const address = addressFromInspect(await this.inspect(unit));
    this.logger.debug('Container address', { container: unit, address });
    return address;
  }

  async healthStatus(unit: InfrastructureUnit): Promise<HealthStatus | null> {
    return healthFromInspect(await this.inspect(unit));
  }

  async isRunning(unit: InfrastructureUnit): Promise<boolean> {
    const inspect = await this.inspect(unit);
    return inspect.State?.Running ?? false;
  }

  async stop(unit: InfrastructureUnit, timeoutSeconds: number = RUNTIME_DEFAULTS.STOP_TIMEOUT_SECONDS): Promise<void> {
    this.logger.info('Stopping container', { container: unit, timeoutSeconds });
    await this.docker('stop', unit, ['stop', '-t', String(timeoutSeconds), unit]);
    this.logger.info('Stopped container', { container: unit });
  }

  async start(unit: InfrastructureUnit): Promise<void> {
    this.logger.info('Starting container', { container: unit });
    await this.docker('start', unit, ['start', unit]);
    this.logger.info('Started container', { container: unit });
  }

  async waitForHealthy(unit: InfrastructureUnit, options: WaitForHealthyOptions = {}): Promise<boolean> {
    const maxWaitMs = options.maxWaitMs ?? RUNTIME_DEFAULTS.HEALTH_MAX_WAIT_MS;
    const pollIntervalMs = options.pollIntervalMs ?? RUNTIME_DEFAULTS.HEALTH_POLL_INTERVAL_MS;
    const settleMs = options.settleMs ?? RUNTIME_DEFAULTS.NO_HEALTHCHECK_SETTLE_MS;
    const deadline = Date.now() + maxWaitMs;

    this.logger.info('Waiting for container to become healthy', { container: unit, maxWaitMs });

    while (Date.now() < deadline) {
      let inspect: ContainerInspect | null = null;
      try {
        inspect = await this.inspect(unit);
      } catch (error) {
        this.logger.debug('Could not inspect container', { container: unit, error: toError(error).message });
      }

      if (inspect !== null) {
        const health = healthFromInspect(inspect);
        if (health === 'healthy') {
          this.logger.info('Container is healthy', { container: unit });
          return true;
        }
        if (health === 'unhealthy') {
          this.logger.warn('Container is unhealthy, still waiting', { container: unit });
        } else if (health === 'starting') {
          this.logger.info('Container healthcheck is starting', { container: unit });
        } else if (inspect.State?.Running) {
          this.logger.info('Container is running (no healthcheck configured)', { container: unit });
          await sleep(settleMs);
          return true;
        }
      }

      await sleep(pollIntervalMs);
    }

    this.logger.warn('Container did not become healthy in time', { container: unit, maxWaitMs });
    return false;
  }

  private async docker(
    operation: ContainerOperation,
    unit: InfrastructureUnit,
    args: readonly string[],
  ): Promise<CommandResult> {
    try {
      return await this.run(this.binary, args, { timeoutMs: this.commandTimeoutMs });
    } catch (error) {
      const cause = toError(error);
      this.logger.error('Docker command failed', { operation, container: unit, error: cause.message });
      throw new ContainerRuntimeError(operation, unit, cause.message, cause);
    }
  }
}
