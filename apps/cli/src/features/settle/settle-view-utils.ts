import { formatMoney } from '@netsettle/core';
import type {
  NetPosition,
  SettlementExecution,
  SettlementPreview,
  UnclassifiedEvent,
  UnpricedEvent,
} from '@netsettle/settlement';

export interface PositionView {
  participantId: number;
  externalId: string;
  name: string;
  role: string;
  amount: string;
}

export interface TransferView {
  debtorId: number;
  creditorId: number;
  amount: string;
}

export interface SettlementView {
  useCase: string;
  window: { start: string; end: string };
  eventCount: number;
  postingCount: number;
  positions: PositionView[];
  transfers: TransferView[];
  suppressed: { participantId: number; amount: string }[];
  unmatched: { participantId: number; amount: string }[];
  stats: {
    transferCount: number;
    grossVolume: string;
    netVolume: string;
    nettingEfficiency: string;
    roundingResidual: string;
    suppressedVolume: string;
  };
  unpriced: UnpricedEvent[];
  unclassified: UnclassifiedEvent[];
}

export interface ExecutionView extends SettlementView {
  batchId: string;
  policyId: number;
  lines: { lineId: string; participantId: number; amount: string; description: string; proofHash: string }[];
}

const toAmountView = (position: NetPosition) => ({
  participantId: position.participantId,
  amount: formatMoney(position.amount),
});

/**
 * Serializable form of a preview: Decimals become fixed-point strings, dates ISO strings.
 */
export function buildSettlementView(preview: SettlementPreview): SettlementView {
  const { stats } = preview.netting;
  return {
    useCase: preview.useCase,
    window: { start: preview.window.start.toISOString(), end: preview.window.end.toISOString() },
    eventCount: preview.eventCount,
    postingCount: preview.postingCount,
    positions: preview.positions.map((position) => ({
      participantId: position.participantId,
      externalId: position.externalId,
      name: position.name,
      role: position.role,
      amount: formatMoney(position.amount),
    })),
    transfers: preview.netting.transfers.map((transfer) => ({
      debtorId: transfer.debtorId,
      creditorId: transfer.creditorId,
      amount: formatMoney(transfer.amount),
    })),
    suppressed: preview.netting.suppressed.map(toAmountView),
    unmatched: preview.netting.unmatched.map(toAmountView),
    stats: {
      transferCount: stats.transferCount,
      grossVolume: formatMoney(stats.grossVolume),
      netVolume: formatMoney(stats.netVolume),
      nettingEfficiency: stats.nettingEfficiency.toFixed(4),
      roundingResidual: formatMoney(stats.roundingResidual),
      suppressedVolume: formatMoney(stats.suppressedVolume),
    },
    unpriced: preview.unpriced,
    unclassified: preview.unclassified,
  };
}

export function buildExecutionView(execution: SettlementExecution): ExecutionView {
  return {
    ...buildSettlementView(execution),
    batchId: execution.batch.id,
    policyId: execution.batch.policyId,
    lines: execution.lines.map((line) => ({
      lineId: line.id,
      participantId: line.participantId,
      amount: formatMoney(line.amount),
      description: line.description,
      proofHash: line.proofHash,
    })),
  };
}

/**
 * One aligned row per position: external id, name, role, amount.
 */
export function formatPositionLines(positions: readonly PositionView[]): string[] {
  if (positions.length === 0) return [];

  const idWidth = Math.max(...positions.map((p) => p.externalId.length));
  const nameWidth = Math.max(...positions.map((p) => p.name.length));
  const roleWidth = Math.max(...positions.map((p) => p.role.length));
  const amountWidth = Math.max(...positions.map((p) => p.amount.length));

  return positions.map(
    (p) =>
      `${p.externalId.padEnd(idWidth)}  ${p.name.padEnd(nameWidth)}  ${p.role.padEnd(roleWidth)}  ${p.amount.padStart(amountWidth)}`
  );
}

/**
 * Transfers labelled by external id where the participant has a position, else `#<id>`.
 */
export function formatTransferLines(transfers: readonly TransferView[], positions: readonly PositionView[]): string[] {
  const labels = new Map(positions.map((p): [number, string] => [p.participantId, p.externalId]));
  const label = (id: number) => labels.get(id) ?? `#${id}`;
  return transfers.map((t) => `${label(t.debtorId)} -> ${label(t.creditorId)}: ${t.amount} EUR`);
}

export function formatStatsLine(stats: SettlementView['stats']): string {
  const efficiency = (Number(stats.nettingEfficiency) * 100).toFixed(1);
  return `Gross ${stats.grossVolume} EUR, net ${stats.netVolume} EUR, netting efficiency ${efficiency}%, ${stats.transferCount} transfers`;
}
