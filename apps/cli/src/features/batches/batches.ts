import { toSettlementError } from '@netsettle/core';
import type { Command } from 'commander';

import { exitCodeForError, parseCommandOptions, withDataContext } from '../shared/command-execution.js';
import { createOutput, type OutputManager } from '../shared/output.js';
import { BatchesCommandOptionsSchema } from '../shared/schemas.js';

import { buildBatchViews, formatBatchLines, type BatchView } from './batches-utils.js';

/**
 * Register the batches command.
 */
export function registerBatchesCommand(program: Command): void {
  program
    .command('batches')
    .description('List committed settlement batches, most recent first')
    .option('--use-case <id>', 'Only batches of this use case')
    .option('--limit <n>', 'Maximum number of batches to list')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeBatchesCommand(rawOptions);
    });
}

async function executeBatchesCommand(rawOptions: unknown): Promise<void> {
  const options = parseCommandOptions('batches', BatchesCommandOptionsSchema, rawOptions);
  const output = createOutput(options.json);

  try {
    const result = await withDataContext((ctx) =>
      ctx.settlements.listBatches({ useCase: options.useCase, limit: options.limit })
    );
    if (result.isErr()) {
      const error = toSettlementError(result.error);
      return output.error('batches', error, exitCodeForError(error));
    }
    handleBatchesSuccess(output, buildBatchViews(result.value));
  } catch (error) {
    const normalized = error instanceof Error ? error : new Error(String(error));
    output.error('batches', normalized, exitCodeForError(normalized));
  }
}

function handleBatchesSuccess(output: OutputManager, batches: BatchView[]): void {
  if (output.isJsonMode()) {
    output.json('batches', { batches }, { count: batches.length });
    return;
  }

  output.intro('netsettle batches');
  output.note(formatBatchLines(batches).join('\n') || 'No settlement batches yet', 'Batches');
  output.outro(`${batches.length} batch${batches.length === 1 ? '' : 'es'}`);
}
