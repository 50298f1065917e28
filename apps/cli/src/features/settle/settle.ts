import { SettlementService } from '@netsettle/settlement';
import type { Command } from 'commander';

import { exitCodeForError, parseCommandOptions, unwrapResult, withDataContext } from '../shared/command-execution.js';
import { readJsonFile } from '../shared/file-utils.js';
import { createOutput } from '../shared/output.js';
import { SettleCommandOptionsSchema } from '../shared/schemas.js';
import { resolveWindow } from '../shared/window-utils.js';

import { displaySettlementView } from './settlement-output.js';
import { buildExecutionView } from './settle-view-utils.js';

/**
 * Register the settle command.
 */
export function registerSettleCommand(program: Command): void {
  program
    .command('settle')
    .description('Execute a settlement and commit an append-only batch with proof hashes')
    .option('--policy <file>', 'Policy JSON file: { "use_case": ..., "parameters": { ... } }')
    .option('--start <date>', 'Window start, inclusive (default: two days before --end)')
    .option('--end <date>', 'Window end, exclusive (default: now)')
    .option('--allow-overlap', 'Settle even if a batch of the same use case covers part of the window')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executeSettleCommand(rawOptions);
    });
}

async function executeSettleCommand(rawOptions: unknown): Promise<void> {
  const options = parseCommandOptions('settle', SettleCommandOptionsSchema, rawOptions);
  const output = createOutput(options.json);

  try {
    const policy = unwrapResult(await readJsonFile(options.policy));
    const window = resolveWindow(options);

    const result = await withDataContext((ctx) =>
      new SettlementService(ctx).execute({ policy, window, allowOverlap: options.allowOverlap })
    );
    if (result.isErr()) {
      return output.error('settle', result.error, exitCodeForError(result.error));
    }

    const view = buildExecutionView(result.value);
    if (output.isJsonMode()) {
      output.json('settle', view);
      return;
    }
    output.intro('netsettle settle');
    displaySettlementView(output, view);
    output.outro(`Batch ${view.batchId} committed with ${view.lines.length} lines`);
  } catch (error) {
    const normalized = error instanceof Error ? error : new Error(String(error));
    output.error('settle', normalized, exitCodeForError(normalized));
  }
}
