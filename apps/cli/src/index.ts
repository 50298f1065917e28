#!/usr/bin/env node
import './env-setup.js';

import { getLogger } from '@netsettle/logger';
import { Command } from 'commander';

import { registerAuditCommand } from './features/audit/audit.js';
import { registerBatchesCommand } from './features/batches/batches.js';
import { registerIngestCommand } from './features/ingest/ingest.js';
import { registerPreviewCommand } from './features/settle/preview.js';
import { registerSettleCommand } from './features/settle/settle.js';
import { registerUseCasesCommand } from './features/use-cases/use-cases.js';

const logger = getLogger('CLI');
const program = new Command();

async function main() {
  program
    .name('netsettle')
    .description('Settlement engine for energy communities and tenant power (Mieterstrom)')
    .version('0.1.0');

  registerUseCasesCommand(program);
  registerIngestCommand(program);
  registerPreviewCommand(program);
  registerSettleCommand(program);
  registerAuditCommand(program);
  registerBatchesCommand(program);

  await program.parseAsync();
}

process.on('unhandledRejection', (reason) => {
  logger.error(`Unhandled Rejection: ${String(reason)}`);
  process.exit(1);
});

process.on('uncaughtException', (error) => {
  logger.error(`Uncaught Exception: ${error.message}`);
  logger.error(`Stack: ${error.stack}`);
  process.exit(1);
});

main().catch((error: unknown) => {
  logger.error(`CLI failed: ${String(error)}`);
  process.exit(1);
});
