import type { AuditPayload } from '@netsettle/settlement';

/**
 * One row per line with its verification mark; explanations indented below their line.
 */
export function formatAuditLines(payload: AuditPayload): string[] {
  const rows: string[] = [];
  for (const line of payload.lines) {
    const mark = line.isVerified ? 'ok' : 'MISMATCH';
    rows.push(`[${mark}] ${line.participantName} (${line.participantRole}) ${line.amount} EUR: ${line.description}`);
    if (line.explanation) {
      rows.push(`    ${line.explanation}`);
    }
  }
  return rows;
}

export function formatAuditSummary(payload: AuditPayload): string {
  const { lineCount, verifiedCount, failedLineIds } = payload.summary;
  const base = `${verifiedCount}/${lineCount} lines verified`;
  return failedLineIds.length > 0 ? `${base}; altered: ${failedLineIds.join(', ')}` : base;
}
