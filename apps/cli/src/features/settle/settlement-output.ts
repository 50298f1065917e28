import type { OutputManager } from '../shared/output.js';

import { formatPositionLines, formatStatsLine, formatTransferLines, type SettlementView } from './settle-view-utils.js';

/**
 * Text rendering shared by preview and settle.
 */
export function displaySettlementView(output: OutputManager, view: SettlementView): void {
  output.log(`${view.useCase} ${view.window.start} / ${view.window.end}: ${view.eventCount} events`);

  const positions = formatPositionLines(view.positions);
  output.note(positions.length > 0 ? positions.join('\n') : 'No positions above the payout threshold', 'Net positions');

  const transfers = formatTransferLines(view.transfers, view.positions);
  if (transfers.length > 0) {
    output.note(transfers.join('\n'), 'Transfers');
  }
  output.log(formatStatsLine(view.stats));

  if (view.suppressed.length > 0) {
    output.warn(
      `${view.suppressed.length} positions below the minimum payout were not settled (${view.stats.suppressedVolume} EUR)`
    );
  }
  if (view.unpriced.length > 0) {
    output.warn(`${view.unpriced.length} events were not priced`);
  }
  if (view.unclassified.length > 0) {
    output.warn(`${view.unclassified.length} events had an unclassified source`);
  }
}
