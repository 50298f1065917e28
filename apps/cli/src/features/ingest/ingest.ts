import { IngestionService, type IngestionSummary } from '@netsettle/settlement';
import type { Command } from 'commander';

import { exitCodeForError, parseCommandOptions, unwrapResult, withDataContext } from '../shared/command-execution.js';
import { readJsonFile } from '../shared/file-utils.js';
import { createOutput, type OutputManager } from '../shared/output.js';
import { IngestCommandOptionsSchema } from '../shared/schemas.js';

/**
 * Register the ingest command.
 */
export function registerIngestCommand(program: Command): void {
  program
    .command('ingest')
    .description('Import a JSON array of usage events; participants are created on first reference')
    .argument('<file>', 'JSON file with usage event records')
    .option('--json', 'Output results in JSON format')
    .action(async (file: string, rawOptions: unknown) => {
      await executeIngestCommand(file, rawOptions);
    });
}

async function executeIngestCommand(file: string, rawOptions: unknown): Promise<void> {
  const options = parseCommandOptions('ingest', IngestCommandOptionsSchema, rawOptions);
  const output = createOutput(options.json);

  try {
    const records = unwrapResult(await readJsonFile(file));
    const result = await withDataContext((ctx) => new IngestionService(ctx).ingest(records));
    if (result.isErr()) {
      return output.error('ingest', result.error, exitCodeForError(result.error));
    }
    handleIngestSuccess(output, result.value);
  } catch (error) {
    const normalized = error instanceof Error ? error : new Error(String(error));
    output.error('ingest', normalized, exitCodeForError(normalized));
  }
}

function handleIngestSuccess(output: OutputManager, summary: IngestionSummary): void {
  if (output.isJsonMode()) {
    output.json('ingest', summary);
    return;
  }
  output.outro(
    `Ingested ${summary.eventCount} events for ${summary.participantCount} participants (${summary.participantsCreated} new)`
  );
}
