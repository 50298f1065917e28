import { isSettlementError } from '@netsettle/core';
import { DataContext } from '@netsettle/data';
import { getLogger } from '@netsettle/logger';
import type { Result } from 'neverthrow';
import type { z } from 'zod';

import { ExitCodes, type ExitCode } from './exit-codes.js';
import { OutputManager } from './output.js';

const logger = getLogger('command-execution');

/**
 * Convert Result to value or throw error.
 */
export function unwrapResult<T>(result: Result<T, Error>): T {
  if (result.isErr()) {
    throw result.error;
  }
  return result.value;
}

/**
 * Exit code for an error coming out of the engine.
 */
export function exitCodeForError(error: Error): ExitCode {
  if (!isSettlementError(error)) {
    return ExitCodes.GENERAL_ERROR;
  }
  switch (error.kind) {
    case 'validation':
      return ExitCodes.VALIDATION_ERROR;
    case 'not-found':
      return ExitCodes.NOT_FOUND;
    case 'consistency':
      return ExitCodes.CONSISTENCY_ERROR;
    case 'persistence':
      return ExitCodes.DATABASE_ERROR;
  }
}

/**
 * Validate raw commander options at the CLI boundary. Invalid options exit with INVALID_ARGS.
 */
export function parseCommandOptions<TSchema extends z.ZodTypeAny>(
  command: string,
  schema: TSchema,
  rawOptions: unknown
): z.infer<TSchema> {
  const validationResult = schema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager(isJsonRequested(rawOptions) ? 'json' : 'text');
    const firstError = validationResult.error.issues[0];
    return output.error(command, new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
  }
  return validationResult.data;
}

function isJsonRequested(rawOptions: unknown): boolean {
  return typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;
}

/**
 * Execute a function with an initialized data context, closing it afterwards.
 *
 * Opens the settlement database in the data directory (NETSETTLE_DATA_DIR, default ./data)
 * and runs pending migrations first.
 */
export async function withDataContext<T>(fn: (ctx: DataContext) => Promise<T>): Promise<T> {
  const ctx = unwrapResult(await DataContext.initialize());
  try {
    return await fn(ctx);
  } finally {
    const closeResult = await ctx.close();
    if (closeResult.isErr()) {
      logger.warn({ error: closeResult.error }, 'Failed to close database');
    }
  }
}
