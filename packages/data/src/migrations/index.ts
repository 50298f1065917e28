import type { Migration } from '@netsettle/sqlite';

import * as initialSchema from './001_initial_schema.js';

export const migrations: Record<string, Migration> = {
  '001_initial_schema': initialSchema,
};
