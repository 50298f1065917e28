import { SettlementService } from '@netsettle/settlement';
import type { Command } from 'commander';

import { exitCodeForError, parseCommandOptions, unwrapResult, withDataContext } from '../shared/command-execution.js';
import { readJsonFile } from '../shared/file-utils.js';
import { createOutput } from '../shared/output.js';
import { PreviewCommandOptionsSchema } from '../shared/schemas.js';
import { resolveWindow } from '../shared/window-utils.js';

import { displaySettlementView } from './settlement-output.js';
import { buildSettlementView } from './settle-view-utils.js';

/**
 * Register the preview command.
 */
export function registerPreviewCommand(program: Command): void {
  program
    .command('preview')
    .description('Compute net positions and transfers for a window without committing a batch')
    .option('--policy <file>', 'Policy JSON file: { "use_case": ..., "parameters": { ... } }')
    .option('--start <date>', 'Window start, inclusive (default: two days before --end)')
    .option('--end <date>', 'Window end, exclusive (default: now)')
    .option('--json', 'Output results in JSON format')
    .action(async (rawOptions: unknown) => {
      await executePreviewCommand(rawOptions);
    });
}

async function executePreviewCommand(rawOptions: unknown): Promise<void> {
  const options = parseCommandOptions('preview', PreviewCommandOptionsSchema, rawOptions);
  const output = createOutput(options.json);

  try {
    const policy = unwrapResult(await readJsonFile(options.policy));
    const window = resolveWindow(options);

    const result = await withDataContext((ctx) => new SettlementService(ctx).preview({ policy, window }));
    if (result.isErr()) {
      return output.error('preview', result.error, exitCodeForError(result.error));
    }

    const view = buildSettlementView(result.value);
    if (output.isJsonMode()) {
      output.json('preview', view);
      return;
    }
    output.intro('netsettle preview');
    displaySettlementView(output, view);
    output.outro('Preview only, nothing was stored');
  } catch (error) {
    const normalized = error instanceof Error ? error : new Error(String(error));
    output.error('preview', normalized, exitCodeForError(normalized));
  }
}
