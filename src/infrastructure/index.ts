/**
 * Container runtime.
 *
 * @module infrastructure
 */

export {
  DockerCli,
  addressFromInspect,
  healthFromInspect,
  type CommandResult,
  type CommandRunner,
  type ContainerInspect,
  type DockerCliOptions,
} from './docker-cli.js';
export {
  ContainerRuntimeError,
  RUNTIME_DEFAULTS,
  type ContainerOperation,
  type ContainerRuntime,
  type HealthStatus,
  type WaitForHealthyOptions,
} from './types.js';
