import { z } from 'zod';

import { DateSchema, DecimalSchema } from './primitives.js';

export const EVENT_KINDS = [
  'generation',
  'consumption',
  'grid-feed',
  'base-fee',
  'battery-charge',
  'battery-discharge',
  'production',
  'vpp-sale',
] as const;

export const EventKindSchema = z.enum(EVENT_KINDS);

export const EnergyUnitSchema = z.enum(['kWh', 'EUR']);

export const UsageEventSchema = z.object({
  id: z.number().int().positive(),
  participantId: z.number().int().positive(),
  kind: EventKindSchema,
  quantity: DecimalSchema,
  unit: EnergyUnitSchema,
  timestamp: DateSchema,
  source: z.string(),
  pricePerUnit: DecimalSchema.optional(),
  createdAt: DateSchema,
});

export type EventKind = z.infer<typeof EventKindSchema>;
export type EnergyUnit = z.infer<typeof EnergyUnitSchema>;
export type UsageEvent = z.infer<typeof UsageEventSchema>;

/**
 * Event as handed to the repository, before an id is assigned.
 */
export type NewUsageEvent = Omit<UsageEvent, 'id' | 'createdAt'>;
