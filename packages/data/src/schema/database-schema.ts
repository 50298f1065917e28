import type { EnergyUnit, EventKind, ParticipantRole } from '@netsettle/core';
import type { ColumnType, Generated } from '@netsettle/sqlite';

/**
 * Database schema definitions
 */

// Decimal amounts stay TEXT so no precision is lost to SQLite's REAL affinity
export type DecimalString = ColumnType<string, string, string>;
// ISO 8601 strings: '2024-03-15T10:30:00.000Z'. Dates are written through the type adapter plugin.
export type DateTime = ColumnType<string, string | Date, string>;
export type JSONString = ColumnType<string, string, string>;

/**
 * Participants - keyed by external id, role fixed on creation
 */
export interface ParticipantsTable {
  id: Generated<number>;
  external_id: string;
  name: string;
  role: ParticipantRole;
  created_at: DateTime;
}

/**
 * Usage events - immutable metered quantities
 */
export interface UsageEventsTable {
  id: Generated<number>;
  participant_id: number; // FK to participants.id
  event_kind: EventKind;
  quantity: DecimalString;
  unit: EnergyUnit;
  timestamp: DateTime;
  source: string;
  price_per_unit: DecimalString | null;
  created_at: DateTime;
}

/**
 * Policies - validated parameter sets, one per settlement run
 */
export interface PoliciesTable {
  id: Generated<number>;
  use_case: string;
  parameters_json: JSONString;
  created_at: DateTime;
}

/**
 * Settlement batches - append-only, window is [start_time, end_time)
 */
export interface SettlementBatchesTable {
  id: string;
  use_case: string;
  policy_id: number; // FK to policies.id
  start_time: DateTime;
  end_time: DateTime;
  created_at: DateTime;
}

/**
 * Settlement lines - append-only, written with their batch
 *
 * participant_id carries no foreign key: audits must still load lines whose
 * participant was removed from the reference data.
 */
export interface SettlementLinesTable {
  id: string;
  batch_id: string; // FK to settlement_batches.id
  participant_id: number;
  amount: DecimalString; // positive: participant owes, negative: participant is owed
  description: string;
  proof_hash: string;
}

export interface DatabaseSchema {
  participants: ParticipantsTable;
  usage_events: UsageEventsTable;
  policies: PoliciesTable;
  settlement_batches: SettlementBatchesTable;
  settlement_lines: SettlementLinesTable;
}
