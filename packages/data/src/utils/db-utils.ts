import { wrapError } from '@netsettle/core';
import type { Logger } from '@netsettle/logger';
import type { ControlledTransaction, Kysely } from '@netsettle/sqlite';
import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';
import type { z } from 'zod';

/**
 * Serialize data to JSON, converting Decimal values to fixed-point strings.
 */
export function serializeToJson(data: unknown): Result<string, Error> {
  try {
    const serialized = JSON.stringify(data, (_key, value: unknown) => {
      if (value instanceof Decimal) return value.toFixed();
      return value;
    });
    if (serialized === undefined) {
      return err(new Error('Failed to serialize JSON: value is not serializable'));
    }
    return ok(serialized);
  } catch (error) {
    return err(new Error(`Failed to serialize JSON: ${error instanceof Error ? error.message : String(error)}`));
  }
}

/**
 * Parse a JSON string and validate it against a Zod schema.
 */
export function parseWithSchema<T>(value: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Result<T, Error> {
  try {
    const parsed: unknown = JSON.parse(value);
    const result = schema.safeParse(parsed);

    if (!result.success) {
      return err(new Error(`Schema validation failed: ${result.error.message}`));
    }

    return ok(result.data);
  } catch (error) {
    return err(new Error(`Failed to parse JSON: ${error instanceof Error ? error.message : String(error)}`));
  }
}

/**
 * Execute a Result-returning function within a manually controlled transaction.
 * Rolls back on Result.isErr() or thrown exceptions; commits on Result.isOk().
 */
export async function withControlledTransaction<T, TDB>(
  db: Kysely<TDB>,
  logger: Logger,
  fn: (trx: ControlledTransaction<TDB>) => Promise<Result<T, Error>>,
  errorContext: string
): Promise<Result<T, Error>> {
  let trx: ControlledTransaction<TDB> | undefined;

  try {
    trx = await db.startTransaction().execute();
    const result = await fn(trx);

    if (result.isErr()) {
      await trx.rollback().execute();
      return result;
    }

    await trx.commit().execute();
    return result;
  } catch (error) {
    if (trx) {
      try {
        await trx.rollback().execute();
      } catch (rollbackError) {
        logger.error({ rollbackError }, 'Failed to rollback controlled transaction');
      }
    }
    return wrapError(error, errorContext);
  }
}
