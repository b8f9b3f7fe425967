/**
 * Environment configuration shared by the experiment programs.
 *
 * Each program declares a zod schema over `process.env`; values are
 * coerced, defaulted and validated in one place, and every problem is
 * reported at once.
 *
 * @module core/config
 */

import { z } from 'zod';

/**
 * Thrown when the environment fails validation.
 */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError' as const;

  constructor(readonly issues: readonly string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
  }
}

/**
 * Comma-separated list; blank entries are dropped.
 */
export const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0),
    )
    .pipe(z.array(z.string()).min(1, 'must list at least one entry'));

export const connectionSchema = z.object({
  CASSANDRA_CONTACT_POINTS: commaList('localhost'),
  CASSANDRA_PORT: z.coerce.number().int().min(1).max(65535).default(9042),
  CASSANDRA_USERNAME: z.string().default(''),
  CASSANDRA_PASSWORD: z.string().default(''),
  CASSANDRA_LOCAL_DC: z.string().min(1).default('datacenter1'),
});

export const loggingSchema = z.object({
  LOG_LEVEL: z
    .string()
    .default('info')
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(['debug', 'info', 'warn', 'error', 'silent'])),
  LOG_FORMAT: z.enum(['json', 'pretty']).default('pretty'),
});

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Parses the environment against a schema.
 *
 * Empty strings count as unset so defaults apply.
 *
 * @throws {ConfigurationError} Listing every invalid variable
 */
export function parseEnvironment<S extends z.ZodTypeAny>(schema: S, env: Environment): z.output<S> {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      present[key] = value;
    }
  }

  const result = schema.safeParse(present);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}
