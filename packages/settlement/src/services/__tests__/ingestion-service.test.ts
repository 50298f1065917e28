import { createTestDataContext, type DataContext } from '@netsettle/data';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { WINDOW } from '../../__tests__/test-utils.js';
import { IngestionService } from '../ingestion-service.js';

describe('IngestionService', () => {
  let ctx: DataContext;
  let service: IngestionService;

  beforeEach(async () => {
    ctx = await createTestDataContext();
    service = new IngestionService(ctx);
  });

  afterEach(async () => {
    await ctx.close();
  });

  it('stores events and creates participants on first reference', async () => {
    const summary = (
      await service.ingest([
        {
          participant_id: 'tenant-a',
          participant_name: 'Tenant A',
          role: 'tenant',
          event_kind: 'consumption',
          quantity: '10',
          unit: 'kWh',
          timestamp: '2024-05-01T08:00:00Z',
          source: 'local_pv',
        },
        {
          participant_id: 'tenant-a',
          event_kind: 'base_fee',
          quantity: 5,
          unit: 'EUR',
          timestamp: '2024-05-01T09:00:00Z',
        },
        {
          participant_id: 42,
          event_kind: 'Generation',
          quantity: 3.5,
          unit: 'kWh',
          timestamp: '2024-05-01T10:00:00Z',
          source: 'PV',
          price_per_unit: '0.11',
        },
      ])
    )._unsafeUnwrap();

    expect(summary).toEqual({ eventCount: 3, participantCount: 2, participantsCreated: 2 });

    const participants = (await ctx.participants.findAll())._unsafeUnwrap();
    expect(participants.map((p) => [p.externalId, p.name, p.role])).toEqual([
      ['tenant-a', 'Tenant A', 'tenant'],
      ['42', '42', 'prosumer'],
    ]);

    const events = (await ctx.usageEvents.findInWindow(WINDOW))._unsafeUnwrap();
    expect(events.map((e) => [e.kind, e.quantity.toString(), e.unit, e.source, e.pricePerUnit?.toString()])).toEqual([
      ['consumption', '10', 'kWh', 'local_pv', undefined],
      ['base-fee', '5', 'EUR', '', undefined],
      ['generation', '3.5', 'kWh', 'PV', '0.11'],
    ]);
  });

  it('keeps the role of an existing participant when the record omits it', async () => {
    (await ctx.participants.ensure({ externalId: 'landlord', name: 'Landlord', role: 'landlord' }))._unsafeUnwrap();

    const summary = (
      await service.ingest([
        { participant_id: 'landlord', event_kind: 'grid-feed', quantity: 4, unit: 'kWh', timestamp: '2024-05-01T12:00:00Z' },
      ])
    )._unsafeUnwrap();

    expect(summary.participantsCreated).toBe(0);
    const landlord = (await ctx.participants.findByExternalId('landlord'))._unsafeUnwrap();
    expect(landlord?.role).toBe('landlord');
  });

  it('rejects a conflicting role and stores nothing', async () => {
    (await ctx.participants.ensure({ externalId: 'landlord', role: 'landlord' }))._unsafeUnwrap();

    const result = await service.ingest([
      { participant_id: 'tenant-a', role: 'tenant', event_kind: 'consumption', quantity: 1, unit: 'kWh', timestamp: '2024-05-01T08:00:00Z' },
      { participant_id: 'landlord', role: 'tenant', event_kind: 'consumption', quantity: 1, unit: 'kWh', timestamp: '2024-05-01T08:00:00Z' },
    ]);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe('validation');
      expect(result.error.message).toBe(
        'Participant landlord already exists with role landlord, cannot reference it as tenant'
      );
    }
    expect((await ctx.participants.findByExternalId('tenant-a'))._unsafeUnwrap()).toBeUndefined();
    const stored = await ctx.usageEvents.findInWindow({
      start: new Date('2024-01-01T00:00:00Z'),
      end: new Date('2025-01-01T00:00:00Z'),
    });
    expect(stored._unsafeUnwrap()).toEqual([]);
  });

  it('rejects unknown event kinds with the record index', async () => {
    const result = await service.ingest([
      { participant_id: 'a', event_kind: 'consumption', quantity: 1, unit: 'kWh', timestamp: '2024-05-01T08:00:00Z' },
      { participant_id: 'a', event_kind: 'heat', quantity: 1, unit: 'kWh', timestamp: '2024-05-01T08:00:00Z' },
    ]);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toMatch(/^Record 1: Unknown event kind "heat"/);
      expect(result.error.context).toMatchObject({ field: 'event_kind', index: 1, value: 'heat' });
    }
    expect((await ctx.participants.findAll())._unsafeUnwrap()).toEqual([]);
  });

  it('rejects malformed records with the failing path', async () => {
    const result = await service.ingest([
      { participant_id: 'a', event_kind: 'consumption', quantity: 1, unit: 'MWh', timestamp: '2024-05-01T08:00:00Z' },
    ]);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toMatch(/^Invalid usage event at 0\.unit: /);
      expect(result.error.context).toEqual({ field: '0.unit' });
    }
  });

  it('rejects negative kWh quantities and stores nothing', async () => {
    const result = await service.ingest([
      { participant_id: 'a', event_kind: 'consumption', quantity: 2, unit: 'kWh', timestamp: '2024-05-01T08:00:00Z' },
      { participant_id: 'a', event_kind: 'consumption', quantity: -3, unit: 'kWh', timestamp: '2024-05-01T09:00:00Z' },
    ]);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Invalid usage event at 1.quantity: kWh quantities must not be negative');
      expect(result.error.context).toEqual({ field: '1.quantity' });
    }
    expect((await ctx.participants.findAll())._unsafeUnwrap()).toEqual([]);
  });

  it('accepts negative EUR amounts', async () => {
    const result = await service.ingest([
      { participant_id: 'a', event_kind: 'base-fee', quantity: '-5', unit: 'EUR', timestamp: '2024-05-01T08:00:00Z' },
    ]);

    expect(result._unsafeUnwrap().eventCount).toBe(1);
  });

  it('rejects input that is not an array', async () => {
    const result = await service.ingest({ participant_id: 'a' });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toMatch(/^Invalid usage event at \(root\): /);
    }
  });
});
