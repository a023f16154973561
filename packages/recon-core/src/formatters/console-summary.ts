/**
 * Plain-text run summary for the terminal
 */

import type { ReconciliationResult } from '../types/index.js';
import { summarizeRun } from '../reconciliation/match-scorer.js';
import { formatPercent, formatTradeId, formatValue, statusIcon } from './utils.js';

const RULE = '='.repeat(60);

export function formatConsoleSummary(results: readonly ReconciliationResult[]): string {
  if (results.length === 0) {
    return `${statusIcon(false)} No reconciliation results to display`;
  }

  const run = summarizeRun(results);
  const lines: string[] = [
    RULE,
    'RECONCILIATION SUMMARY',
    RULE,
    `Total Trades: ${run.totalTrades}`,
    `Perfect Matches: ${run.perfectMatches}`,
    `Success Rate: ${formatPercent(run.successRate)}`,
    '',
    'Trade Details:',
  ];

  for (const result of results) {
    lines.push(
      `  ${statusIcon(result.overallMatch)} Trade ${formatTradeId(result.tradeId)}: ${formatPercent(result.matchPercentage)} match`
    );
    for (const mismatch of result.comparisons.filter((c) => !c.match)) {
      lines.push(
        `      ${statusIcon(false)} ${mismatch.fieldName}: ${formatValue(mismatch.termSheetValue, 'N/A')} ≠ ${formatValue(mismatch.bookingValue, 'N/A')}`
      );
    }
  }

  lines.push(RULE);
  return lines.join('\n');
}
