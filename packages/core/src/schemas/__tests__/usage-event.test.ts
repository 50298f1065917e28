import { describe, expect, it } from 'vitest';

import { ParticipantRoleSchema } from '../participant.js';
import { DecimalSchema } from '../primitives.js';
import { UsageEventSchema } from '../usage-event.js';

describe('UsageEventSchema', () => {
  it('parses stored rows into domain values', () => {
    const result = UsageEventSchema.safeParse({
      id: 1,
      participantId: 3,
      kind: 'consumption',
      quantity: '10.5',
      unit: 'kWh',
      timestamp: '2024-05-01T10:00:00.000Z',
      source: 'local_pv',
      pricePerUnit: 0.2,
      createdAt: '2024-05-01T10:00:01.000Z',
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.quantity.toFixed()).toBe('10.5');
      expect(result.data.pricePerUnit?.toFixed()).toBe('0.2');
      expect(result.data.timestamp.toISOString()).toBe('2024-05-01T10:00:00.000Z');
    }
  });

  it('rejects kinds outside the closed set', () => {
    const result = UsageEventSchema.safeParse({
      id: 1,
      participantId: 3,
      kind: 'teleportation',
      quantity: '1',
      unit: 'kWh',
      timestamp: '2024-05-01T10:00:00.000Z',
      source: 'grid',
      createdAt: '2024-05-01T10:00:00.000Z',
    });

    expect(result.success).toBe(false);
  });
});

describe('DecimalSchema', () => {
  it('rejects non-numeric strings', () => {
    expect(DecimalSchema.safeParse('twelve').success).toBe(false);
  });
});

describe('ParticipantRoleSchema', () => {
  it('accepts every role of the closed set', () => {
    for (const role of ParticipantRoleSchema.options) {
      expect(ParticipantRoleSchema.safeParse(role).success).toBe(true);
    }
    expect(ParticipantRoleSchema.safeParse('auditor').success).toBe(false);
  });
});
