import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createTestDatabase } from '../../__tests__/test-utils.js';
import type { KyselyDB } from '../../storage/database.js';
import { PolicyRepository } from '../policy-repository.js';

describe('PolicyRepository', () => {
  let db: KyselyDB;
  let repo: PolicyRepository;

  beforeEach(async () => {
    db = await createTestDatabase();
    repo = new PolicyRepository(db);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('stores parameters as JSON and reads them back', async () => {
    const parameters = {
      minimum_payout_by_role: { tenant: 1 },
      rounding_mode: 'half-even',
      tenant_price_per_kwh: 0.18,
    };

    const created = (await repo.create('mieterstrom', parameters))._unsafeUnwrap();
    expect(created.useCase).toBe('mieterstrom');
    expect(created.parameters).toEqual(parameters);

    const stored = await db.selectFrom('policies').select('parameters_json').executeTakeFirstOrThrow();
    expect(stored.parameters_json).toBe(
      '{"minimum_payout_by_role":{"tenant":1},"rounding_mode":"half-even","tenant_price_per_kwh":0.18}'
    );
  });
});
