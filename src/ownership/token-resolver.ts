/**
 * Dual-method token resolution.
 *
 * Asks the live store for a key's token through its native `token()`
 * function and independently computes one with the local codec. The store
 * value is authoritative; the codec value is a fallback and a self-check.
 * Both candidates and the comparison are always logged so real ring
 * placement can be audited after an experiment.
 *
 * @module ownership/token-resolver
 */

import type { CqlStatement, PartitionToken, TokenQuery, TokenRow } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import { QueryMethodUnavailableError, TokenResolutionFailedError } from './errors.js';
import { TokenCodec, type TokenComputer } from './token-codec.js';

// =============================================================================
// Types
// =============================================================================

export interface TokenRequest {
  readonly keyspace: string;
  readonly table: string;
  readonly key: string;

  /** Partitioner declared by the cluster; decides whether the codec applies */
  readonly partitionerName: string | undefined;
}

/**
 * Outcome of comparing the two candidate tokens.
 *
 * - `match`: both present and equal
 * - `mismatch`: both present and different
 * - `incomplete`: at least one method produced nothing
 */
export type TokenComparison =
  | { readonly outcome: 'match' }
  | { readonly outcome: 'mismatch'; readonly difference: bigint }
  | { readonly outcome: 'incomplete' };

export type TokenSource = 'query' | 'codec';

export interface TokenResolution {
  /** The trusted token */
  readonly token: PartitionToken;

  /** Which method produced {@link token} */
  readonly source: TokenSource;

  readonly queryToken: PartitionToken | null;
  readonly codecToken: PartitionToken | null;
  readonly comparison: TokenComparison;
}

export interface TokenResolverOptions {
  readonly store: TokenQuery;
  readonly logger: Logger;

  /** @default TokenCodec.compute */
  readonly codec?: TokenComputer;

  /**
   * Partition key column the `token()` query is built on.
   * @default 'id'
   */
  readonly partitionKeyColumn?: string;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Builds the store-side token query for a key.
 */
export function buildTokenStatement(
  keyspace: string,
  table: string,
  key: string,
  partitionKeyColumn = 'id',
): CqlStatement {
  return {
    query: `SELECT token(${partitionKeyColumn}) AS token_value FROM ${keyspace}.${table} WHERE ${partitionKeyColumn} = ?`,
    params: [key],
  };
}

/**
 * Compares two optional candidate tokens.
 */
export function compareTokens(
  queryToken: PartitionToken | null,
  codecToken: PartitionToken | null,
): TokenComparison {
  if (queryToken === null || codecToken === null) {
    return { outcome: 'incomplete' };
  }
  if (queryToken === codecToken) {
    return { outcome: 'match' };
  }
  const difference = queryToken > codecToken ? queryToken - codecToken : codecToken - queryToken;
  return { outcome: 'mismatch', difference };
}

function formatToken(token: PartitionToken | null): string | null {
  return token === null ? null : token.toString();
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

// =============================================================================
// TokenResolver
// =============================================================================

export class TokenResolver {
  private readonly store: TokenQuery;
  private readonly logger: Logger;
  private readonly codec: TokenComputer;
  private readonly partitionKeyColumn: string;

  constructor(options: TokenResolverOptions) {
    this.store = options.store;
    this.logger = options.logger.child('token-resolver');
    this.codec = options.codec ?? TokenCodec.compute;
    this.partitionKeyColumn = options.partitionKeyColumn ?? 'id';
  }

  /**
   * Resolves one trusted token for the key.
   *
   * @throws {TokenResolutionFailedError} If neither method yields a token
   */
  async resolve(request: TokenRequest): Promise<TokenResolution> {
    const { keyspace, table, key } = request;

    let queryToken: PartitionToken | null = null;
    try {
      queryToken = await this.queryToken(request);
    } catch (error) {
      if (!(error instanceof QueryMethodUnavailableError)) {
        throw error;
      }
      this.logger.warn('Could not get token via query', {
        key,
        reason: error.message,
        cause: error.cause?.message,
      });
    }

    const codecToken = this.computeToken(request);
    const comparison = compareTokens(queryToken, codecToken);
    this.logComparison(key, queryToken, codecToken, comparison);

    if (queryToken !== null) {
      this.logger.info('Using token from query method', { key, token: queryToken.toString() });
      return { token: queryToken, source: 'query', queryToken, codecToken, comparison };
    }

    if (codecToken !== null) {
      this.logger.info('Using token from local codec (fallback)', { key, token: codecToken.toString() });
      return { token: codecToken, source: 'codec', queryToken, codecToken, comparison };
    }

    this.logger.error('Both token calculation methods failed', { key, keyspace, table });
    throw new TokenResolutionFailedError(keyspace, table, key);
  }

  /**
   * Asks the store for the key's token.
   *
   * @throws {QueryMethodUnavailableError} If the store gives no answer for any reason
   */
  async queryToken(request: TokenRequest): Promise<PartitionToken> {
    const { keyspace, table, key } = request;
    const statement = buildTokenStatement(keyspace, table, key, this.partitionKeyColumn);

    let rows: readonly TokenRow[];
    try {
      rows = await this.store.fetchTokens(statement);
    } catch (error) {
      const cause = toError(error);
      throw new QueryMethodUnavailableError(keyspace, table, key, cause.message, cause);
    }

    const first = rows[0];
    if (first === undefined) {
      throw new QueryMethodUnavailableError(keyspace, table, key, 'no row with this key');
    }

    this.logger.info('Token value from query', {
      key,
      rows: rows.length,
      token: first.tokenValue.toString(),
    });
    return first.tokenValue;
  }

  private computeToken(request: TokenRequest): PartitionToken | null {
    const token = this.codec(request.key, request.partitionerName);
    if (token === null) {
      this.logger.warn('Partitioner is not Murmur3, skipping local token computation', {
        partitioner: request.partitionerName ?? null,
      });
      return null;
    }
    this.logger.info('Token value from local codec', { key: request.key, token: token.toString() });
    return token;
  }

  private logComparison(
    key: string,
    queryToken: PartitionToken | null,
    codecToken: PartitionToken | null,
    comparison: TokenComparison,
  ): void {
    const data = {
      key,
      queryToken: formatToken(queryToken),
      codecToken: formatToken(codecToken),
      outcome: comparison.outcome,
    };

    if (comparison.outcome === 'mismatch') {
      this.logger.warn('Token comparison', { ...data, difference: comparison.difference.toString() });
    } else {
      this.logger.info('Token comparison', data);
    }
  }
}
