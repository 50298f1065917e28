import { createTestDatabase, DataContext, type KyselyDB } from '@netsettle/data';
import { Decimal } from 'decimal.js';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { WINDOW } from '../../__tests__/test-utils.js';
import { computeProofHash } from '../../proof/proof-hash.js';
import { SettlementService } from '../settlement-service.js';

import { seedWorkedExample, WORKED_EXAMPLE_POLICY } from './service-test-utils.js';

const PAYMENT_DESCRIPTION =
  'Payment due: Tenant power (Mieterstrom) 2024-05-01T00:00:00.000Z/2024-05-02T00:00:00.000Z';
const PAYOUT_DESCRIPTION =
  'Payout due: Tenant power (Mieterstrom) 2024-05-01T00:00:00.000Z/2024-05-02T00:00:00.000Z';

describe('SettlementService', () => {
  let db: KyselyDB;
  let ctx: DataContext;
  let service: SettlementService;

  beforeEach(async () => {
    db = await createTestDatabase();
    ctx = new DataContext(db);
    service = new SettlementService(ctx);
  });

  afterEach(async () => {
    await db.destroy();
  });

  describe('execute', () => {
    it('settles tenants against the landlord', async () => {
      await seedWorkedExample(ctx);

      const execution = (await service.execute({ policy: WORKED_EXAMPLE_POLICY, window: WINDOW }))._unsafeUnwrap();

      expect(execution.eventCount).toBe(2);
      expect(execution.postingCount).toBe(2);
      expect(execution.positions.map((p) => [p.externalId, p.amount.toFixed(2)])).toEqual([
        ['tenant-a', '2.00'],
        ['tenant-b', '0.80'],
        ['landlord', '-2.80'],
      ]);
      expect(execution.netting.transfers.map((t) => [t.debtorId, t.creditorId, t.amount.toFixed(2)])).toEqual([
        [1, 3, '2.00'],
        [2, 3, '0.80'],
      ]);
      expect(execution.batch.useCase).toBe('mieterstrom');
      expect(execution.lines.map((l) => l.description)).toEqual([
        PAYMENT_DESCRIPTION,
        PAYMENT_DESCRIPTION,
        PAYOUT_DESCRIPTION,
      ]);
    });

    it('persists the batch, its lines and the policy used', async () => {
      await seedWorkedExample(ctx);

      const execution = (await service.execute({ policy: WORKED_EXAMPLE_POLICY, window: WINDOW }))._unsafeUnwrap();

      const lines = (await ctx.settlements.findLinesByBatchId(execution.batch.id))._unsafeUnwrap();
      expect(lines.map((l) => [l.participantId, l.amount.toFixed(2)])).toEqual([
        [1, '2.00'],
        [2, '0.80'],
        [3, '-2.80'],
      ]);
      for (const line of lines) {
        expect(line.proofHash).toBe(
          computeProofHash({
            batchId: execution.batch.id,
            participantId: line.participantId,
            amount: line.amount,
            description: line.description,
          })
        );
      }

      const policy = await db
        .selectFrom('policies')
        .select(['use_case', 'parameters_json'])
        .where('id', '=', execution.batch.policyId)
        .executeTakeFirstOrThrow();
      expect(policy.use_case).toBe('mieterstrom');
      expect(JSON.parse(policy.parameters_json)).toMatchObject({
        tenant_price_per_kwh: 0.2,
        landlord_revenue_share: 0.6,
      });
    });

    it('creates the synthetic counterparties once', async () => {
      await seedWorkedExample(ctx);

      (await service.execute({ policy: WORKED_EXAMPLE_POLICY, window: WINDOW }))._unsafeUnwrap();
      (await service.execute({ policy: WORKED_EXAMPLE_POLICY, window: WINDOW, allowOverlap: true }))._unsafeUnwrap();

      const participants = (await ctx.participants.findAll())._unsafeUnwrap();
      const synthetic = participants.filter((p) => p.role === 'external-market' || p.role === 'fee-collector');
      expect(synthetic.map((p) => [p.id, p.name, p.role])).toEqual([
        [4, 'External market', 'external-market'],
        [5, 'Community pool', 'fee-collector'],
      ]);
    });

    it('rejects a window overlapping a settled batch', async () => {
      await seedWorkedExample(ctx);
      const first = (await service.execute({ policy: WORKED_EXAMPLE_POLICY, window: WINDOW }))._unsafeUnwrap();

      const overlapping = await service.execute({
        policy: WORKED_EXAMPLE_POLICY,
        window: { start: new Date('2024-05-01T12:00:00.000Z'), end: new Date('2024-05-03T00:00:00.000Z') },
      });

      expect(overlapping.isErr()).toBe(true);
      if (overlapping.isErr()) {
        expect(overlapping.error.kind).toBe('validation');
        expect(overlapping.error.message).toBe(
          `Window overlaps settled batch ${first.batch.id} (2024-05-01T00:00:00.000Z/2024-05-02T00:00:00.000Z)`
        );
      }
    });

    it('settles an overlapping window when allowed', async () => {
      await seedWorkedExample(ctx);
      const first = (await service.execute({ policy: WORKED_EXAMPLE_POLICY, window: WINDOW }))._unsafeUnwrap();

      const second = (
        await service.execute({ policy: WORKED_EXAMPLE_POLICY, window: WINDOW, allowOverlap: true })
      )._unsafeUnwrap();

      expect(second.batch.id).not.toBe(first.batch.id);
      expect((await ctx.settlements.listBatches())._unsafeUnwrap()).toHaveLength(2);
    });

    it('accepts an adjacent window', async () => {
      await seedWorkedExample(ctx);
      (await service.execute({ policy: WORKED_EXAMPLE_POLICY, window: WINDOW }))._unsafeUnwrap();

      const next = await service.execute({
        policy: WORKED_EXAMPLE_POLICY,
        window: { start: WINDOW.end, end: new Date('2024-05-03T00:00:00.000Z') },
      });

      // Adjacent windows do not overlap; this one is simply empty
      expect(next.isErr()).toBe(true);
      if (next.isErr()) {
        expect(next.error.message).toBe('No usage events in the settlement window');
      }
    });

    it('rolls back everything when evaluation fails', async () => {
      await seedWorkedExample(ctx);
      (await ctx.participants.ensure({ externalId: 'landlord-2', name: 'Second landlord', role: 'landlord' }))._unsafeUnwrap();

      const result = await service.execute({ policy: WORKED_EXAMPLE_POLICY, window: WINDOW });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.kind).toBe('validation');
        expect(result.error.message).toBe('Counterparty role landlord is ambiguous: landlord, landlord-2 (event 1)');
      }
      expect((await ctx.participants.findByExternalId('external-market'))._unsafeUnwrap()).toBeUndefined();
      expect((await ctx.settlements.listBatches())._unsafeUnwrap()).toEqual([]);
      const policies = await db.selectFrom('policies').select('id').execute();
      expect(policies).toEqual([]);
    });

    it('refuses to settle an empty window', async () => {
      const result = await service.execute({ policy: WORKED_EXAMPLE_POLICY, window: WINDOW });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.message).toBe('No usage events in the settlement window');
      }
      expect((await ctx.settlements.listBatches())._unsafeUnwrap()).toEqual([]);
    });

    it('rejects an invalid policy before touching the database', async () => {
      const result = await service.execute({ policy: { use_case: 'carsharing' }, window: WINDOW });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.kind).toBe('validation');
        expect(result.error.category).toBe('caller-error');
      }
      expect((await ctx.participants.findAll())._unsafeUnwrap()).toEqual([]);
    });

    it('rejects an inverted window', async () => {
      const result = await service.execute({
        policy: WORKED_EXAMPLE_POLICY,
        window: { start: WINDOW.end, end: WINDOW.start },
      });

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.kind).toBe('validation');
      }
    });
  });

  describe('preview', () => {
    it('computes the same positions without storing a batch', async () => {
      await seedWorkedExample(ctx);

      const preview = (await service.preview({ policy: WORKED_EXAMPLE_POLICY, window: WINDOW }))._unsafeUnwrap();

      expect(preview.positions.map((p) => [p.participantId, p.amount.toFixed(2)])).toEqual([
        [1, '2.00'],
        [2, '0.80'],
        [3, '-2.80'],
      ]);
      expect(preview.netting.stats.grossVolume.toFixed(2)).toBe('5.60');
      expect((await ctx.settlements.listBatches())._unsafeUnwrap()).toEqual([]);
      expect(await db.selectFrom('policies').select('id').execute()).toEqual([]);
    });

    it('returns an empty result for a window without events', async () => {
      const preview = (await service.preview({ policy: WORKED_EXAMPLE_POLICY, window: WINDOW }))._unsafeUnwrap();

      expect(preview.eventCount).toBe(0);
      expect(preview.positions).toEqual([]);
      expect(preview.netting.transfers).toEqual([]);
    });

    it('reports zero-priced unclassified consumption', async () => {
      const { tenantA } = await seedWorkedExample(ctx);
      (
        await ctx.usageEvents.createBulk([
          {
            participantId: tenantA.id,
            kind: 'consumption',
            quantity: new Decimal(3),
            unit: 'kWh',
            timestamp: new Date('2024-05-01T10:00:00.000Z'),
            source: 'neighbour',
          },
        ])
      )._unsafeUnwrap();

      const preview = (await service.preview({ policy: WORKED_EXAMPLE_POLICY, window: WINDOW }))._unsafeUnwrap();

      expect(preview.unclassified.map((u) => [u.eventId, u.source, u.treatment])).toEqual([[3, 'neighbour', 'zero-priced']]);
      expect(preview.unpriced.map((u) => u.reason)).toEqual(['zero-priced-source']);
      expect(preview.positions.map((p) => p.amount.toFixed(2))).toEqual(['2.00', '0.80', '-2.80']);
    });
  });
});
