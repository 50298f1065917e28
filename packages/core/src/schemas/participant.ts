import { z } from 'zod';

import { DateSchema } from './primitives.js';

export const PARTICIPANT_ROLES = [
  'consumer',
  'tenant',
  'commercial-tenant',
  'landlord',
  'operator',
  'prosumer',
  'external-market',
  'fee-collector',
] as const;

export const ParticipantRoleSchema = z.enum(PARTICIPANT_ROLES);

export const ParticipantSchema = z.object({
  id: z.number().int().positive(),
  externalId: z.string().min(1),
  name: z.string().min(1),
  role: ParticipantRoleSchema,
  createdAt: DateSchema,
});

export type ParticipantRole = z.infer<typeof ParticipantRoleSchema>;
export type Participant = z.infer<typeof ParticipantSchema>;

/**
 * Input for idempotent participant creation, keyed by external id.
 */
export interface ParticipantReference {
  externalId: string;
  name?: string | undefined;
  role: ParticipantRole;
}
