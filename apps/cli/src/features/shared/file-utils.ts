import { promises as fs } from 'node:fs';

import { NotFoundError, ValidationError } from '@netsettle/core';
import { err, ok, type Result } from 'neverthrow';

/**
 * Read and parse a JSON file. A missing file is a NotFoundError, malformed JSON a ValidationError.
 */
export async function readJsonFile(filePath: string): Promise<Result<unknown, Error>> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return err(new NotFoundError(`File not found: ${filePath}`, { path: filePath }));
    }
    return err(error instanceof Error ? error : new Error(String(error)));
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return ok(parsed);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(new ValidationError(`Invalid JSON in ${filePath}: ${reason}`, { path: filePath }));
  }
}
