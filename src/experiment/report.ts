/**
 * Text report of a node failure experiment.
 *
 * @module experiment/report
 */

import type { AbortedExperiment, CompletedExperiment, ExperimentResult } from './types.js';

const RULE = '='.repeat(80);

function yesNo(value: boolean): string {
  return value ? 'YES' : 'NO';
}

export function formatReport(result: CompletedExperiment): string[] {
  const lines = [
    RULE,
    'EXPERIMENT RESULTS',
    RULE,
    `Keyspace: ${result.keyspace} (RF=${result.replicationFactor})`,
    `Test data ID: ${result.key}`,
    `Token: ${result.token} (from ${result.tokenSource})`,
    `Replicas: ${result.replicas.join(', ')}`,
    `Node that held data: ${result.owner} (container: ${result.container})`,
    `Node healthy after restart: ${yesNo(result.healthyAfterRestart)}`,
    `Node recognized by cluster after restart: ${yesNo(result.ownerRecognizedAfterRestart)}`,
    `Data accessible after node removal: ${yesNo(result.availableWhileDown)}`,
    `Data accessible after node restart: ${yesNo(result.availableAfterRestart)}`,
    '',
  ];

  if (result.availableWhileDown) {
    lines.push(
      'UNEXPECTED: Data is still accessible even though the node holding it is down.',
      '  Possible causes: another replica served the read, or the cluster topology changed.',
    );
  } else {
    lines.push('EXPECTED: Data is not accessible after removing the node holding it.');
  }

  if (result.availableAfterRestart) {
    lines.push('EXPECTED: Data is accessible again after restarting the node; it persisted on disk.');
  } else {
    lines.push(
      'UNEXPECTED: Data is still not accessible after restarting the node.',
      '  Possible causes: the node has not fully rejoined, or its data was lost.',
    );
  }

  lines.push(RULE);
  return lines;
}

export function formatAbort(result: AbortedExperiment): string[] {
  return [`Experiment aborted at step '${result.step}': ${result.reason}`];
}

/**
 * Process exit status: 0 only when the experiment completed as expected.
 */
export function exitCodeFor(result: ExperimentResult): number {
  return result.status === 'completed' && result.asExpected ? 0 : 1;
}
