/**
 * Command line parsing for the `ringfault` binary.
 *
 * Flags are turned into environment overrides, so a flag and its variable
 * go through the same validation.
 *
 * @module cli/args
 */

import { parseArgs } from 'node:util';
import type { Environment } from '../core/config.js';

// =============================================================================
// Types
// =============================================================================

export type CommandName = 'experiment' | 'locate' | 'load';

export type ParsedCommandLine =
  | { readonly kind: 'help' }
  | { readonly kind: 'version' }
  | { readonly kind: 'run'; readonly command: CommandName; readonly overrides: Environment };

/**
 * Thrown for arguments the binary does not understand.
 */
export class UsageError extends Error {
  override readonly name = 'UsageError' as const;
}

const COMMANDS: readonly CommandName[] = ['experiment', 'locate', 'load'];

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

// =============================================================================
// Parsing
// =============================================================================

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        key: { type: 'string', short: 'k' },
        containers: { type: 'string', short: 'c' },
        keyspace: { type: 'string' },
        table: { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false },
        version: { type: 'boolean', short: 'v', default: false },
      },
      strict: true,
      allowPositionals: true,
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parses arguments (without the node and script entries).
 *
 * @throws {UsageError} On unknown options, unknown commands or missing arguments
 */
export function parseCommandLine(argv: readonly string[]): ParsedCommandLine {
  const parsed = readArgs(argv);
  const { values, positionals } = parsed;
  if (values.help) {
    return { kind: 'help' };
  }
  if (values.version) {
    return { kind: 'version' };
  }

  const [command, ...rest] = positionals;
  if (command === undefined) {
    throw new UsageError('Missing command');
  }
  if (!isCommandName(command)) {
    throw new UsageError(`Unknown command '${command}'`);
  }

  const overrides: Record<string, string> = {};
  if (values.containers !== undefined) overrides['CONTAINER_NAMES'] = values.containers;
  if (values.keyspace !== undefined) overrides['CASSANDRA_KEYSPACE'] = values.keyspace;
  if (values.table !== undefined) overrides['CASSANDRA_TABLE'] = values.table;

  let key = values.key;
  if (command === 'locate') {
    const [positionalKey, ...extra] = rest;
    if (positionalKey === undefined && key === undefined) {
      throw new UsageError("'locate' needs a partition key");
    }
    if (extra.length > 0) {
      throw new UsageError(`Unexpected arguments: ${extra.join(' ')}`);
    }
    key = positionalKey ?? key;
  } else if (rest.length > 0) {
    throw new UsageError(`Unexpected arguments: ${rest.join(' ')}`);
  }
  if (key !== undefined) overrides['EXPERIMENT_KEY'] = key;

  return { kind: 'run', command, overrides };
}

export const USAGE = `
ringfault - replica ownership and single-node failure experiments for Cassandra

USAGE:
  ringfault experiment [OPTIONS]
  ringfault locate <key> [OPTIONS]
  ringfault load

COMMANDS:
  experiment            Write a record at RF=1, stop the node owning it,
                        check it is unavailable, restart the node and
                        check it is back
  locate <key>          Print the token, replicas and container of a key
  load                  Run the mixed read/write load test

OPTIONS:
  -k, --key <key>           Partition key (EXPERIMENT_KEY)
  -c, --containers <list>   Comma-separated container names (CONTAINER_NAMES)
      --keyspace <name>     Keyspace (CASSANDRA_KEYSPACE)
      --table <name>        Table (CASSANDRA_TABLE)
  -h, --help                Show this help message
  -v, --version             Show version number

Every other setting is read from the environment; see README.md.
`.trim();
