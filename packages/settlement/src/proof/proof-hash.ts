import { createHash } from 'node:crypto';

import { formatMoney } from '@netsettle/core';
import type { Decimal } from 'decimal.js';

/**
 * The four fields a settlement line's proof hash covers
 */
export interface ProofHashInput {
  batchId: string;
  participantId: number;
  amount: Decimal;
  description: string;
}

/**
 * JSON with object keys sorted at every level and no whitespace.
 */
export function canonicalJson(value: unknown): string {
  if (value === null) return 'null';

  if (Array.isArray(value)) {
    return `[${value.map((entry: unknown) => canonicalJson(entry)).join(',')}]`;
  }

  switch (typeof value) {
    case 'string':
      return JSON.stringify(value);
    case 'number':
      if (!Number.isFinite(value)) throw new Error('Non-finite number in canonical JSON');
      return JSON.stringify(value);
    case 'boolean':
      return value ? 'true' : 'false';
    case 'object': {
      const entries: [string, unknown][] = Object.entries(value);
      entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      return `{${entries.map(([key, entry]) => `${JSON.stringify(key)}:${canonicalJson(entry)}`).join(',')}}`;
    }
    default:
      return 'null';
  }
}

/**
 * Canonical payload of a line. The amount is the fixed two-decimal string that is stored.
 */
export function canonicalLinePayload(input: ProofHashInput): string {
  return canonicalJson({
    amount: formatMoney(input.amount),
    batch_id: input.batchId,
    description: input.description,
    participant_id: input.participantId,
  });
}

/**
 * SHA-256 over the UTF-8 canonical payload, lower-case hex.
 */
export function computeProofHash(input: ProofHashInput): string {
  return createHash('sha256').update(canonicalLinePayload(input), 'utf8').digest('hex');
}

export function verifyProofHash(input: ProofHashInput, proofHash: string): boolean {
  return computeProofHash(input) === proofHash;
}
