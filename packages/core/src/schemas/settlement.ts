import { z } from 'zod';

import { DateSchema, DecimalSchema } from './primitives.js';

export const SettlementBatchSchema = z.object({
  id: z.string().uuid(),
  useCase: z.string().min(1),
  policyId: z.number().int().positive(),
  start: DateSchema,
  end: DateSchema,
  createdAt: DateSchema,
});

export const SettlementLineSchema = z.object({
  id: z.string().uuid(),
  batchId: z.string().uuid(),
  participantId: z.number().int().positive(),
  amount: DecimalSchema,
  description: z.string(),
  proofHash: z.string().regex(/^[0-9a-f]{64}$/, 'Proof hash must be a hex SHA-256 digest'),
});

export const PolicyRecordSchema = z.object({
  id: z.number().int().positive(),
  useCase: z.string().min(1),
  parameters: z.record(z.string(), z.unknown()),
  createdAt: DateSchema,
});

/**
 * Settlement batch. Created once, never mutated.
 */
export type SettlementBatch = z.infer<typeof SettlementBatchSchema>;

/**
 * One participant's signed amount within a batch.
 * Positive amount: the participant owes. Negative amount: the participant is owed.
 */
export type SettlementLine = z.infer<typeof SettlementLineSchema>;

export type PolicyRecord = z.infer<typeof PolicyRecordSchema>;

/**
 * Half-open settlement window `[start, end)`.
 */
export interface SettlementWindow {
  start: Date;
  end: Date;
}
