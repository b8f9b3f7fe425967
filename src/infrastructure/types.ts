/**
 * Container runtime types.
 *
 * @module infrastructure/types
 */

import type { InfrastructureControl, InfrastructureUnit } from '../core/types.js';

/**
 * Health reported by a container's healthcheck; null when none is configured.
 */
export type HealthStatus = 'healthy' | 'unhealthy' | 'starting';

export interface WaitForHealthyOptions {
  /** @default 180000 */
  readonly maxWaitMs?: number;

  /** @default 2000 */
  readonly pollIntervalMs?: number;

  /**
   * Extra wait for a running container without a healthcheck.
   * @default 5000
   */
  readonly settleMs?: number;
}

/**
 * Lifecycle control over the containers hosting cluster nodes.
 */
export interface ContainerRuntime extends InfrastructureControl {
  stop(unit: InfrastructureUnit, timeoutSeconds?: number): Promise<void>;
  start(unit: InfrastructureUnit): Promise<void>;
  healthStatus(unit: InfrastructureUnit): Promise<HealthStatus | null>;
  isRunning(unit: InfrastructureUnit): Promise<boolean>;

  /**
   * Waits until the container is healthy, or running when it has no
   * healthcheck.
   *
   * @returns false when the wait times out
   */
  waitForHealthy(unit: InfrastructureUnit, options?: WaitForHealthyOptions): Promise<boolean>;
}

export type ContainerOperation = 'inspect' | 'stop' | 'start';

/**
 * Thrown when the container runtime rejects an operation.
 */
export class ContainerRuntimeError extends Error {
  override readonly name = 'ContainerRuntimeError' as const;
  override readonly cause: Error | undefined;

  constructor(
    readonly operation: ContainerOperation,
    readonly container: InfrastructureUnit,
    message: string,
    cause?: Error,
  ) {
    super(`Container ${operation} failed for ${container}: ${message}`);
    this.cause = cause;
  }
}

export const RUNTIME_DEFAULTS = {
  /** Grace period passed to `docker stop` in seconds */
  STOP_TIMEOUT_SECONDS: 30,

  /** Maximum wait for a healthy container in milliseconds */
  HEALTH_MAX_WAIT_MS: 180000,

  /** Poll interval while waiting for health in milliseconds */
  HEALTH_POLL_INTERVAL_MS: 2000,

  /** Extra wait for running containers without a healthcheck in milliseconds */
  NO_HEALTHCHECK_SETTLE_MS: 5000,
} as const;
