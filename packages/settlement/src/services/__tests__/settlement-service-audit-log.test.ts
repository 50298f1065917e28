import { createTestDatabase, DataContext, type KyselyDB } from '@netsettle/data';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { WINDOW } from '../../__tests__/test-utils.js';
import { SettlementService } from '../settlement-service.js';

import { seedWorkedExample, WORKED_EXAMPLE_POLICY } from './service-test-utils.js';

const { mockAudit } = vi.hoisted(() => ({ mockAudit: vi.fn() }));

vi.mock('@netsettle/logger', () => ({
  getLogger: () => ({
    audit: mockAudit,
    debug: vi.fn(),
    error: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
  }),
}));

describe('SettlementService audit log', () => {
  let db: KyselyDB;
  let ctx: DataContext;

  beforeEach(async () => {
    db = await createTestDatabase();
    ctx = new DataContext(db);
    mockAudit.mockClear();
  });

  afterEach(async () => {
    await db.destroy();
  });

  it('records netting statistics with the committed batch', async () => {
    await seedWorkedExample(ctx);

    const execution = (
      await new SettlementService(ctx).execute({ policy: WORKED_EXAMPLE_POLICY, window: WINDOW })
    )._unsafeUnwrap();

    expect(mockAudit).toHaveBeenCalledTimes(1);
    expect(mockAudit).toHaveBeenCalledWith(
      {
        batchId: execution.batch.id,
        end: '2024-05-02T00:00:00.000Z',
        lineCount: 3,
        nettingEfficiency: '0.0000',
        policyId: execution.batch.policyId,
        roundingResidual: '0',
        start: '2024-05-01T00:00:00.000Z',
        suppressedVolume: '0.00',
        transferCount: 2,
        useCase: 'mieterstrom',
      },
      'Settlement batch committed'
    );
  });

  it('does not record a batch that was rolled back', async () => {
    const result = await new SettlementService(ctx).execute({ policy: WORKED_EXAMPLE_POLICY, window: WINDOW });

    expect(result.isErr()).toBe(true);
    expect(mockAudit).not.toHaveBeenCalled();
  });
});
