/**
 * Replica ownership resolution.
 *
 * @module ownership
 */

export { TokenCodec, murmur3Hash32, MURMUR3_PARTITIONER_MARKER, type TokenComputer } from './token-codec.js';
export {
  TokenResolver,
  buildTokenStatement,
  compareTokens,
  type TokenRequest,
  type TokenResolution,
  type TokenComparison,
  type TokenSource,
  type TokenResolverOptions,
} from './token-resolver.js';
export { ReplicaSetResolver, type ReplicaSet } from './replica-set-resolver.js';
export {
  InfrastructureMapper,
  matchAddress,
  type MappingResult,
  type ResolvedMapping,
  type UnresolvedMapping,
  type UnitProbe,
  type MatchRule,
  type MappingStrategy,
} from './infrastructure-mapper.js';
export {
  OwnershipResolver,
  type Ownership,
  type OwnershipRequest,
  type OwnershipResolverOptions,
} from './ownership-resolver.js';
export {
  QueryMethodUnavailableError,
  TokenResolutionFailedError,
  UnknownKeyspaceError,
  TopologyUnavailableError,
} from './errors.js';
