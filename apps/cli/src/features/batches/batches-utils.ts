import type { SettlementBatch } from '@netsettle/core';
import { getUseCaseTitle } from '@netsettle/settlement';

export interface BatchView {
  batchId: string;
  useCase: string;
  title: string;
  policyId: number;
  start: string;
  end: string;
  createdAt: string;
}

export function buildBatchViews(batches: readonly SettlementBatch[]): BatchView[] {
  return batches.map((batch) => ({
    batchId: batch.id,
    useCase: batch.useCase,
    title: getUseCaseTitle(batch.useCase).unwrapOr(batch.useCase),
    policyId: batch.policyId,
    start: batch.start.toISOString(),
    end: batch.end.toISOString(),
    createdAt: batch.createdAt.toISOString(),
  }));
}

/**
 * `<batch id>  <start>/<end>  <title>`, one row per batch.
 */
export function formatBatchLines(batches: readonly BatchView[]): string[] {
  return batches.map((batch) => `${batch.batchId}  ${batch.start}/${batch.end}  ${batch.title}`);
}
