import { getDefaultPolicy } from '@netsettle/settlement';
import type { Command } from 'commander';

import { exitCodeForError, parseCommandOptions } from '../shared/command-execution.js';
import { createOutput } from '../shared/output.js';
import { UseCasesCommandOptionsSchema } from '../shared/schemas.js';

import { formatUseCaseLines, listUseCases } from './use-cases-utils.js';

/**
 * Register the use-cases command.
 */
export function registerUseCasesCommand(program: Command): void {
  program
    .command('use-cases')
    .description('List use cases, or print the default policy of one as a starting point for --policy')
    .argument('[id]', 'Use case id, e.g. mieterstrom')
    .option('--json', 'Output results in JSON format')
    .action((id: string | undefined, rawOptions: unknown) => {
      executeUseCasesCommand(id, rawOptions);
    });
}

function executeUseCasesCommand(id: string | undefined, rawOptions: unknown): void {
  const options = parseCommandOptions('use-cases', UseCasesCommandOptionsSchema, rawOptions);
  const output = createOutput(options.json);

  if (id === undefined) {
    const useCases = listUseCases();
    if (output.isJsonMode()) {
      output.json('use-cases', { useCases });
      return;
    }
    console.log(formatUseCaseLines(useCases).join('\n'));
    return;
  }

  const policy = getDefaultPolicy(id);
  if (policy.isErr()) {
    return output.error('use-cases', policy.error, exitCodeForError(policy.error));
  }
  if (output.isJsonMode()) {
    output.json('use-cases', { policy: policy.value });
    return;
  }
  // Plain JSON on stdout so it can be redirected into a policy file
  console.log(JSON.stringify(policy.value, undefined, 2));
}
