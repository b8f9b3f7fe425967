/**
 * Local token computation for Murmur3-partitioned clusters.
 *
 * Hashes the raw UTF-8 bytes of a key with MurmurHash3 (x86, 32-bit,
 * seed 0) and returns the unsigned result. This is a corroborating value:
 * the store's own Murmur3 partitioner produces a signed 64-bit token from
 * the serialized partition key, so the two agree only when a caller
 * supplies matching semantics through a custom codec.
 *
 * @module ownership/token-codec
 */

import type { PartitionToken } from '../core/types.js';

/**
 * Computes a token for a key under the given partitioner,
 * or null when the partitioner is not supported.
 */
export type TokenComputer = (key: string, partitionerName: string | undefined) => PartitionToken | null;

/**
 * Marker looked for (case-sensitively) in the partitioner class name.
 */
export const MURMUR3_PARTITIONER_MARKER = 'Murmur3';

const C1 = 0xcc9e2d51;
const C2 = 0x1b873593;

function rotl32(x: number, r: number): number {
  return (x << r) | (x >>> (32 - r));
}

function mixK(k: number): number {
  k = Math.imul(k, C1);
  k = rotl32(k, 15);
  return Math.imul(k, C2);
}

/**
 * MurmurHash3 x86 32-bit over a byte sequence. Returns an unsigned value.
 */
export function murmur3Hash32(data: Uint8Array, seed = 0): number {
  const length = data.length;
  const blockEnd = length - (length % 4);
  let h = seed | 0;

  for (let i = 0; i < blockEnd; i += 4) {
    const k =
      (data[i] ?? 0) |
      ((data[i + 1] ?? 0) << 8) |
      ((data[i + 2] ?? 0) << 16) |
      ((data[i + 3] ?? 0) << 24);

    h ^= mixK(k);
    h = rotl32(h, 13);
    h = (Math.imul(h, 5) + 0xe6546b64) | 0;
  }

  let tail = 0;
  switch (length & 3) {
    case 3:
      tail ^= (data[blockEnd + 2] ?? 0) << 16;
    // falls through
    case 2:
      tail ^= (data[blockEnd + 1] ?? 0) << 8;
    // falls through
    case 1:
      tail ^= data[blockEnd] ?? 0;
      h ^= mixK(tail);
  }

  h ^= length;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;

  return h >>> 0;
}

export const TokenCodec = {
  /**
   * Checks whether the partitioner name identifies a Murmur3 partitioner.
   *
   * @example
   * ```typescript
   * TokenCodec.isMurmur3Partitioner('org.apache.cassandra.dht.Murmur3Partitioner'); // true
   * TokenCodec.isMurmur3Partitioner('org.apache.cassandra.dht.RandomPartitioner'); // false
   * ```
   */
  isMurmur3Partitioner(partitionerName: string | undefined): boolean {
    return partitionerName !== undefined && partitionerName.includes(MURMUR3_PARTITIONER_MARKER);
  },

  /**
   * Hashes the UTF-8 encoding of a key.
   */
  hash(key: string): PartitionToken {
    return BigInt(murmur3Hash32(Buffer.from(key, 'utf8')));
  },

  /**
   * Computes the token for a key, or null when the partitioner is not
   * Murmur3. An unsupported partitioner is never defaulted.
   *
   * @example
   * ```typescript
   * TokenCodec.compute('test-key', 'org.apache.cassandra.dht.Murmur3Partitioner'); // 3348866371n
   * ```
   */
  compute(key: string, partitionerName: string | undefined): PartitionToken | null {
    if (!TokenCodec.isMurmur3Partitioner(partitionerName)) {
      return null;
    }
    return TokenCodec.hash(key);
  },
} as const;
