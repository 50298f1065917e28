import type { Participant, ParticipantRole, UsageEvent } from '@netsettle/core';
import { Decimal } from 'decimal.js';

import { classifySource } from '../aggregation/source-classifier.js';

export const UNKNOWN_PARTICIPANT_NAME = 'Unknown participant';

const ROLE_LABELS: Record<ParticipantRole, string> = {
  consumer: 'Consumer',
  tenant: 'Tenant',
  'commercial-tenant': 'Commercial tenant',
  landlord: 'Landlord',
  operator: 'Operator',
  prosumer: 'Prosumer',
  'external-market': 'External market',
  'fee-collector': 'Community pool',
};

interface ActivitySummary {
  localConsumption: Decimal;
  gridConsumption: Decimal;
  unclassifiedConsumption: Decimal;
  generation: Decimal;
  baseFees: Decimal;
  baseFeeUnits: Decimal;
}

function summarize(events: readonly UsageEvent[]): ActivitySummary {
  const summary: ActivitySummary = {
    localConsumption: new Decimal(0),
    gridConsumption: new Decimal(0),
    unclassifiedConsumption: new Decimal(0),
    generation: new Decimal(0),
    baseFees: new Decimal(0),
    baseFeeUnits: new Decimal(0),
  };

  for (const event of events) {
    switch (event.kind) {
      case 'consumption':
        switch (classifySource(event.source)) {
          case 'local-pv':
          case 'battery':
            summary.localConsumption = summary.localConsumption.plus(event.quantity);
            break;
          case 'grid':
            summary.gridConsumption = summary.gridConsumption.plus(event.quantity);
            break;
          case 'unclassified':
            summary.unclassifiedConsumption = summary.unclassifiedConsumption.plus(event.quantity);
            break;
        }
        break;
      case 'generation':
      case 'grid-feed':
        summary.generation = summary.generation.plus(event.quantity);
        break;
      case 'base-fee':
        if (event.unit === 'EUR') {
          summary.baseFees = summary.baseFees.plus(event.quantity);
        } else {
          summary.baseFeeUnits = summary.baseFeeUnits.plus(event.quantity);
        }
        break;
      default:
        break;
    }
  }
  return summary;
}

function describeAmount(amount: Decimal): string {
  if (amount.isPositive() && !amount.isZero()) return `Pays ${amount.toFixed(2)} EUR.`;
  if (amount.isNegative() && !amount.isZero()) return `Receives ${amount.abs().toFixed(2)} EUR.`;
  return 'Balanced (0.00 EUR).';
}

/**
 * Plain-English account of a participant's window activity and final amount.
 * Derived from the events only; it is never used to compute anything.
 */
export function buildExplanation(
  participant: Participant | undefined,
  events: readonly UsageEvent[],
  amount: Decimal
): string {
  const name = participant?.name ?? UNKNOWN_PARTICIPANT_NAME;
  const role = participant ? ROLE_LABELS[participant.role] : 'unknown';

  if (events.length === 0) {
    return `${name} (${role}) has no events in this window. ${describeAmount(amount)}`;
  }

  const summary = summarize(events);
  const parts: string[] = [];
  if (summary.localConsumption.greaterThan(0)) parts.push(`${summary.localConsumption.toFixed(1)} kWh local power`);
  if (summary.gridConsumption.greaterThan(0)) parts.push(`${summary.gridConsumption.toFixed(1)} kWh grid power`);
  if (summary.unclassifiedConsumption.greaterThan(0)) {
    parts.push(`${summary.unclassifiedConsumption.toFixed(1)} kWh from unclassified sources`);
  }
  if (summary.generation.greaterThan(0)) parts.push(`${summary.generation.toFixed(1)} kWh generated or fed in`);
  if (summary.baseFees.greaterThan(0)) parts.push(`${summary.baseFees.toFixed(2)} EUR base fees`);
  if (summary.baseFeeUnits.greaterThan(0)) parts.push(`${summary.baseFeeUnits.toFixed()} base fee units`);

  const activity = parts.length > 0 ? `${parts.join(', ')}.` : 'No priced activity.';
  return `${name} (${role}): ${activity} ${describeAmount(amount)}`;
}
