/**
 * Ownership resolution error classes.
 *
 * All errors extend the base Error class directly. An unresolved
 * infrastructure mapping is not an error; see {@link MappingResult}.
 *
 * @module ownership/errors
 */

/**
 * The store could not report a token for the key.
 *
 * Covers a missing row, a missing table or keyspace, and any query failure.
 * Always recovered inside the token resolver by falling back to the codec.
 */
export class QueryMethodUnavailableError extends Error {
  override readonly name = 'QueryMethodUnavailableError' as const;
  override readonly cause: Error | undefined;

  constructor(
    readonly keyspace: string,
    readonly table: string,
    readonly key: string,
    reason: string,
    cause?: Error,
  ) {
    super(`Token query unavailable for key '${key}' in ${keyspace}.${table}: ${reason}`);
    this.cause = cause;
  }
}

/**
 * Neither the store query nor the local codec produced a token.
 */
export class TokenResolutionFailedError extends Error {
  override readonly name = 'TokenResolutionFailedError' as const;

  constructor(
    readonly keyspace: string,
    readonly table: string,
    readonly key: string,
  ) {
    super(`Cannot determine token for key '${key}' in ${keyspace}.${table}: both methods unavailable`);
  }
}

/**
 * The keyspace has no replication metadata in the topology snapshot.
 */
export class UnknownKeyspaceError extends Error {
  override readonly name = 'UnknownKeyspaceError' as const;

  constructor(readonly keyspace: string) {
    super(`Keyspace '${keyspace}' not found in cluster metadata`);
  }
}

/**
 * The topology snapshot exposes no token map yet.
 */
export class TopologyUnavailableError extends Error {
  override readonly name = 'TopologyUnavailableError' as const;

  constructor(readonly keyspace: string) {
    super(`Token map not available; cannot resolve replicas for keyspace '${keyspace}'`);
  }
}
