import { AuditService, type AuditPayload } from '@netsettle/settlement';
import type { Command } from 'commander';

import { exitCodeForError, parseCommandOptions, withDataContext } from '../shared/command-execution.js';
import { createOutput, type OutputManager } from '../shared/output.js';
import { AuditCommandOptionsSchema } from '../shared/schemas.js';

import { formatAuditLines, formatAuditSummary } from './audit-utils.js';

/**
 * Register the audit command.
 */
export function registerAuditCommand(program: Command): void {
  program
    .command('audit')
    .description('Recompute and check the proof hash of every line in a settlement batch')
    .argument('<batchId>', 'Settlement batch id')
    .option('--explain', 'Add a plain-English explanation to every line')
    .option('--json', 'Output results in JSON format')
    .action(async (batchId: string, rawOptions: unknown) => {
      await executeAuditCommand(batchId, rawOptions);
    });
}

async function executeAuditCommand(batchId: string, rawOptions: unknown): Promise<void> {
  const options = parseCommandOptions('audit', AuditCommandOptionsSchema, rawOptions);
  const output = createOutput(options.json);

  try {
    const result = await withDataContext((ctx) =>
      new AuditService(ctx).getAuditPayload(batchId, { explain: options.explain })
    );
    if (result.isErr()) {
      return output.error('audit', result.error, exitCodeForError(result.error));
    }
    handleAuditSuccess(output, result.value);
  } catch (error) {
    const normalized = error instanceof Error ? error : new Error(String(error));
    output.error('audit', normalized, exitCodeForError(normalized));
  }
}

function handleAuditSuccess(output: OutputManager, payload: AuditPayload): void {
  if (output.isJsonMode()) {
    output.json('audit', payload);
    return;
  }

  output.intro(`netsettle audit ${payload.batchId}`);
  output.log(`${payload.useCase} ${payload.start} / ${payload.end}, committed ${payload.createdAt}`);
  output.note(formatAuditLines(payload).join('\n') || 'Batch has no lines', 'Lines');
  if (payload.summary.failedLineIds.length > 0) {
    output.warn(formatAuditSummary(payload));
  } else {
    output.outro(formatAuditSummary(payload));
  }
}
