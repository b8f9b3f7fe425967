#!/usr/bin/env node
/**
 * ringfault - replica ownership and node failure experiments.
 *
 * @example
 * ```bash
 * # Run the RF=1 node failure experiment
 * ringfault experiment
 *
 * # Where does a key live?
 * ringfault locate sensor-42 --keyspace experiment_rf1
 *
 * # Mixed read/write load for 30 seconds
 * DURATION_SECONDS=30 ringfault load
 * ```
 */

import { ConfigurationError, type Environment } from '../core/config.js';
import { USAGE, UsageError, parseCommandLine, type CommandName, type ParsedCommandLine } from '../cli/args.js';
import { runExperiment, runLoad, runLocate } from '../cli/commands.js';
import { VERSION } from '../index.js';

const COMMANDS: Readonly<Record<CommandName, (env: Environment) => Promise<number>>> = {
  experiment: runExperiment,
  locate: runLocate,
  load: runLoad,
};

// =============================================================================
// Main Entry Point
// =============================================================================

async function main(): Promise<number> {
  let parsed: ParsedCommandLine;
  try {
    parsed = parseCommandLine(process.argv.slice(2));
  } catch (error) {
    if (error instanceof UsageError) {
      console.error(`Error: ${error.message}`);
      console.error('Run "ringfault --help" for usage information.');
      return 2;
    }
    throw error;
  }

  if (parsed.kind === 'help') {
    console.log(USAGE);
    return 0;
  }
  if (parsed.kind === 'version') {
    console.log(`ringfault v${VERSION}`);
    return 0;
  }

  try {
    return await COMMANDS[parsed.command]({ ...process.env, ...parsed.overrides });
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      return 2;
    }
    throw error;
  }
}

// =============================================================================
// Execute
// =============================================================================

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Unexpected error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
