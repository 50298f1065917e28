import type { EventKind, ParticipantRole } from '@netsettle/core';
import { EventKindSchema, ParticipantRoleSchema, ValidationError } from '@netsettle/core';
import { err, ok, type Result } from 'neverthrow';

function normalizeTag(raw: string): string {
  return raw.trim().toLowerCase().replace(/_/g, '-');
}

/**
 * Decode an event kind. `grid_feed`, `Grid-Feed` and `grid-feed` are the same kind.
 */
export function decodeEventKind(raw: string): Result<EventKind, ValidationError> {
  const parsed = EventKindSchema.safeParse(normalizeTag(raw));
  if (!parsed.success) {
    return err(
      new ValidationError(`Unknown event kind "${raw}". Expected one of: ${EventKindSchema.options.join(', ')}`, {
        field: 'event_kind',
        value: raw,
      })
    );
  }
  return ok(parsed.data);
}

export function decodeParticipantRole(raw: string): Result<ParticipantRole, ValidationError> {
  const parsed = ParticipantRoleSchema.safeParse(normalizeTag(raw));
  if (!parsed.success) {
    return err(
      new ValidationError(
        `Unknown participant role "${raw}". Expected one of: ${ParticipantRoleSchema.options.join(', ')}`,
        { field: 'role', value: raw }
      )
    );
  }
  return ok(parsed.data);
}
