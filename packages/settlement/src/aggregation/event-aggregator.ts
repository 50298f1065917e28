import type { Participant, SettlementWindow, UsageEvent } from '@netsettle/core';
import { ValidationError } from '@netsettle/core';
import { err, ok, type Result } from 'neverthrow';

import type { AggregateTotal, AggregationResult, ClassifiedEvent } from '../domain/types.js';

import { classifySource } from './source-classifier.js';

/**
 * Check that a window is a non-empty half-open interval `[start, end)`.
 */
export function validateWindow(window: SettlementWindow): Result<SettlementWindow, ValidationError> {
  const start = window.start.getTime();
  const end = window.end.getTime();

  if (Number.isNaN(start) || Number.isNaN(end)) {
    return err(new ValidationError('Settlement window bounds must be valid dates', { field: 'window' }));
  }
  if (start >= end) {
    return err(
      new ValidationError('Settlement window start must be before its end', {
        end: window.end.toISOString(),
        field: 'window',
        start: window.start.toISOString(),
      })
    );
  }
  return ok(window);
}

export function isInWindow(timestamp: Date, window: SettlementWindow): boolean {
  const time = timestamp.getTime();
  return time >= window.start.getTime() && time < window.end.getTime();
}

/**
 * Accumulation order: ascending timestamp, then ascending event id.
 */
export function compareEvents(a: UsageEvent, b: UsageEvent): number {
  const byTime = a.timestamp.getTime() - b.timestamp.getTime();
  return byTime !== 0 ? byTime : a.id - b.id;
}

/**
 * Classify the window's events and total them per participant.
 *
 * Fails on the first event whose participant is unknown; nothing is skipped.
 */
export function aggregateEvents(
  events: readonly UsageEvent[],
  participants: ReadonlyMap<number, Participant>,
  window: SettlementWindow
): Result<AggregationResult, ValidationError> {
  const windowResult = validateWindow(window);
  if (windowResult.isErr()) {
    return err(windowResult.error);
  }

  const inWindow = events.filter((event) => isInWindow(event.timestamp, window)).sort(compareEvents);

  const classified: ClassifiedEvent[] = [];
  const totals = new Map<number, AggregateTotal[]>();
  const index = new Map<string, AggregateTotal>();

  for (const event of inWindow) {
    if (!participants.has(event.participantId)) {
      return err(
        new ValidationError(`Event ${event.id} references unknown participant ${event.participantId}`, {
          eventId: event.id,
          participantId: event.participantId,
        })
      );
    }

    const classification = { kind: event.kind, sourceBucket: classifySource(event.source) };
    classified.push({ event, classification });

    const key = `${classification.kind}:${classification.sourceBucket}`;
    const indexKey = `${event.participantId}|${key}|${event.unit}`;
    const existing = index.get(indexKey);
    if (existing) {
      existing.quantity = existing.quantity.plus(event.quantity);
      existing.eventCount += 1;
      continue;
    }

    const total: AggregateTotal = {
      key,
      kind: classification.kind,
      sourceBucket: classification.sourceBucket,
      unit: event.unit,
      quantity: event.quantity,
      eventCount: 1,
    };
    index.set(indexKey, total);
    const participantTotals = totals.get(event.participantId);
    if (participantTotals) {
      participantTotals.push(total);
    } else {
      totals.set(event.participantId, [total]);
    }
  }

  return ok({
    events: classified,
    totals,
    excludedCount: events.length - inWindow.length,
  });
}
