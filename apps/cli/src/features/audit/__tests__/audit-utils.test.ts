import type { AuditPayload } from '@netsettle/settlement';
import { describe, expect, it } from 'vitest';

import { formatAuditLines, formatAuditSummary } from '../audit-utils.js';

function payload(overrides: Partial<AuditPayload> = {}): AuditPayload {
  return {
    batchId: '3f1c9a52-8b7e-4d21-9c1a-5e2f7b6d4a10',
    useCase: 'mieterstrom',
    createdAt: '2024-05-03T00:00:00.000Z',
    start: '2024-05-01T00:00:00.000Z',
    end: '2024-05-02T00:00:00.000Z',
    lines: [
      {
        lineId: 'line-1',
        participantId: 1,
        participantName: 'Tenant A',
        participantRole: 'tenant',
        amount: '2.00',
        description: 'Payment due',
        proofHash: 'a'.repeat(64),
        isVerified: true,
        explanation: 'Tenant A (Tenant): 10.0 kWh local power. Pays 2.00 EUR.',
      },
      {
        lineId: 'line-2',
        participantId: 3,
        participantName: 'Landlord',
        participantRole: 'landlord',
        amount: '-2.80',
        description: 'Payout due',
        proofHash: 'b'.repeat(64),
        isVerified: false,
      },
    ],
    summary: { lineCount: 2, verifiedCount: 1, failedLineIds: ['line-2'] },
    ...overrides,
  };
}

describe('formatAuditLines', () => {
  it('marks each line and indents explanations', () => {
    expect(formatAuditLines(payload())).toEqual([
      '[ok] Tenant A (tenant) 2.00 EUR: Payment due',
      '    Tenant A (Tenant): 10.0 kWh local power. Pays 2.00 EUR.',
      '[MISMATCH] Landlord (landlord) -2.80 EUR: Payout due',
    ]);
  });
});

describe('formatAuditSummary', () => {
  it('lists altered lines', () => {
    expect(formatAuditSummary(payload())).toBe('1/2 lines verified; altered: line-2');
  });

  it('reports a clean batch', () => {
    const clean = payload({ summary: { lineCount: 2, verifiedCount: 2, failedLineIds: [] } });

    expect(formatAuditSummary(clean)).toBe('2/2 lines verified');
  });
});
