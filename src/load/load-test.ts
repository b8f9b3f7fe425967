/**
 * Mixed read/write load generator.
 *
 * Runs a fixed number of concurrent workers against a sensor-data target
 * until the duration elapses. Each operation is a write with probability
 * `writeRatio`, otherwise a read, against a random device from a fixed
 * pool. Failures are counted and the first few are kept as samples.
 *
 * @module load/load-test
 */

import type { Logger } from '../core/logger.js';

// =============================================================================
// Types
// =============================================================================

/**
 * What the load is applied to. `CassandraStore` is adapted to it by the CLI.
 */
export interface LoadTarget {
  write(deviceId: string, ts: Date, value: number): Promise<void>;

  /** Returns the number of rows read */
  read(deviceId: string): Promise<number>;
}

export type OperationKind = 'WRITE' | 'READ';

export interface ErrorSample {
  readonly kind: OperationKind;
  readonly message: string;
}

export interface LoadStats {
  writes: number;
  reads: number;
  writeLatencyMs: number;
  readLatencyMs: number;
  writeErrors: number;
  readErrors: number;
}

export interface LoadSummary {
  readonly durationMs: number;
  readonly totalOperations: number;
  readonly writes: number;
  readonly reads: number;
  readonly writeErrors: number;
  readonly readErrors: number;
  readonly throughputPerSecond: number;
  readonly avgWriteLatencyMs: number | null;
  readonly avgReadLatencyMs: number | null;
  readonly errorSamples: readonly ErrorSample[];
}

export interface LoadTestOptions {
  readonly target: LoadTarget;
  readonly logger: Logger;
  readonly concurrency: number;
  readonly durationMs: number;

  /** Probability in [0, 1] that an operation is a write */
  readonly writeRatio: number;

  /** @default 5 */
  readonly errorSampleLimit?: number;

  /** @default 100 */
  readonly deviceCount?: number;

  /** @default Math.random */
  readonly random?: () => number;
}

const DEVICE_ID_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';

// =============================================================================
// Helpers
// =============================================================================

/**
 * Returns `device-` followed by eight random lowercase letters or digits.
 */
export function randomDeviceId(random: () => number = Math.random): string {
  let suffix = '';
  for (let i = 0; i < 8; i++) {
    suffix += DEVICE_ID_ALPHABET.charAt(Math.floor(random() * DEVICE_ID_ALPHABET.length));
  }
  return `device-${suffix}`;
}

export function summarize(stats: LoadStats, errorSamples: readonly ErrorSample[], durationMs: number): LoadSummary {
  const totalOperations = stats.writes + stats.reads;
  return {
    durationMs,
    totalOperations,
    writes: stats.writes,
    reads: stats.reads,
    writeErrors: stats.writeErrors,
    readErrors: stats.readErrors,
    throughputPerSecond: durationMs > 0 ? totalOperations / (durationMs / 1000) : 0,
    avgWriteLatencyMs: stats.writes > 0 ? stats.writeLatencyMs / stats.writes : null,
    avgReadLatencyMs: stats.reads > 0 ? stats.readLatencyMs / stats.reads : null,
    errorSamples,
  };
}

export function formatSummary(summary: LoadSummary): string[] {
  const lines = [
    '=== Load Test Summary ===',
    `Total operations: ${summary.totalOperations}`,
    `  Writes: ${summary.writes} (errors=${summary.writeErrors})`,
    `  Reads : ${summary.reads} (errors=${summary.readErrors})`,
  ];

  if (summary.durationMs > 0) {
    lines.push(`Throughput: ${summary.throughputPerSecond.toFixed(1)} ops/sec`);
  }
  if (summary.avgWriteLatencyMs !== null) {
    lines.push(`Avg write latency: ${summary.avgWriteLatencyMs.toFixed(2)} ms`);
  }
  if (summary.avgReadLatencyMs !== null) {
    lines.push(`Avg read latency : ${summary.avgReadLatencyMs.toFixed(2)} ms`);
  }
  if (summary.errorSamples.length > 0) {
    lines.push('', 'Sample errors:');
    for (const sample of summary.errorSamples) {
      lines.push(`  [${sample.kind}] ${sample.message}`);
    }
  }

  return lines;
}

// =============================================================================
// Runner
// =============================================================================

/**
 * Applies load until `durationMs` elapses and summarizes it.
 *
 * Only successful operations count towards writes, reads and latency;
 * failed ones count as errors.
 */
export async function runLoadTest(options: LoadTestOptions): Promise<LoadSummary> {
  const { target, concurrency, durationMs, writeRatio } = options;
  const random = options.random ?? Math.random;
  const errorSampleLimit = options.errorSampleLimit ?? 5;
  const logger = options.logger.child('load');

  const devices = Array.from({ length: options.deviceCount ?? 100 }, () => randomDeviceId(random));
  const stats: LoadStats = { writes: 0, reads: 0, writeLatencyMs: 0, readLatencyMs: 0, writeErrors: 0, readErrors: 0 };
  const errorSamples: ErrorSample[] = [];
  const stopAt = Date.now() + durationMs;

  const pickDevice = (): string => devices[Math.floor(random() * devices.length)] ?? 'device-unknown';

  const worker = async (): Promise<void> => {
    while (Date.now() < stopAt) {
      const kind: OperationKind = random() < writeRatio ? 'WRITE' : 'READ';
      const deviceId = pickDevice();
      const started = performance.now();

      try {
        if (kind === 'WRITE') {
          await target.write(deviceId, new Date(), random() * 100);
          stats.writes += 1;
          stats.writeLatencyMs += performance.now() - started;
        } else {
          await target.read(deviceId);
          stats.reads += 1;
          stats.readLatencyMs += performance.now() - started;
        }
      } catch (error) {
        if (kind === 'WRITE') {
          stats.writeErrors += 1;
        } else {
          stats.readErrors += 1;
        }
        if (errorSamples.length < errorSampleLimit) {
          errorSamples.push({ kind, message: error instanceof Error ? error.message : String(error) });
        }
      }
    }
  };

  logger.info('Starting load', { concurrency, durationMs, writeRatio });
  await Promise.all(Array.from({ length: concurrency }, () => worker()));

  const summary = summarize(stats, errorSamples, durationMs);
  logger.info('Load finished', {
    totalOperations: summary.totalOperations,
    writeErrors: summary.writeErrors,
    readErrors: summary.readErrors,
  });
  return summary;
}
