import type { Participant, ParticipantReference, ParticipantRole } from '@netsettle/core';
import { ValidationError } from '@netsettle/core';
import { err, ok, type Result } from 'neverthrow';

/**
 * Participants the engine creates on demand to act as counterparties
 */
export const SYNTHETIC_PARTICIPANTS: readonly ParticipantReference[] = [
  { externalId: 'external-market', name: 'External market', role: 'external-market' },
  { externalId: 'fee-collector', name: 'Community pool', role: 'fee-collector' },
];

export interface CounterpartyResolver {
  resolve(role: ParticipantRole): Result<Participant, ValidationError>;
}

/**
 * Resolve counterparty roles against a participant set. A role must map to exactly
 * one participant; none or several is a validation error.
 */
export function createCounterpartyResolver(participants: Iterable<Participant>): CounterpartyResolver {
  const byRole = new Map<ParticipantRole, Participant[]>();
  for (const participant of participants) {
    const existing = byRole.get(participant.role);
    if (existing) {
      existing.push(participant);
    } else {
      byRole.set(participant.role, [participant]);
    }
  }

  return {
    resolve(role) {
      const candidates = byRole.get(role) ?? [];
      const [only, ...rest] = candidates;
      if (!only) {
        return err(new ValidationError(`No participant with role ${role} to act as counterparty`, { role }));
      }
      if (rest.length > 0) {
        return err(
          new ValidationError(
            `Counterparty role ${role} is ambiguous: ${candidates.map((p) => p.externalId).join(', ')}`,
            { participantIds: candidates.map((p) => p.id), role }
          )
        );
      }
      return ok(only);
    },
  };
}
