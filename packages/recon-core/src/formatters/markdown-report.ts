/**
 * Markdown Report Formatter
 */

import type { ReconciliationResult } from '../types/index.js';
import { summarizeRun } from '../reconciliation/match-scorer.js';
import { formatPercent, formatTradeId, formatValue, statusIcon } from './utils.js';

export interface MarkdownReportOptions {
  /** Term sheet document the run was based on */
  termSheetFile?: string;
  /** Booking file the run was based on */
  bookingFile?: string;
}

function cell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\r?\n/g, ' ');
}

export function formatMarkdownReport(
  results: readonly ReconciliationResult[],
  options: MarkdownReportOptions = {}
): string {
  const run = summarizeRun(results);
  const lines: string[] = [];

  lines.push('# Term Sheet Reconciliation Report');
  lines.push('');
  if (options.termSheetFile) {
    lines.push(`**Term Sheet:** ${options.termSheetFile}`);
  }
  if (options.bookingFile) {
    lines.push(`**Booking Data:** ${options.bookingFile}`);
  }
  lines.push(`**Total Trades:** ${run.totalTrades}`);
  lines.push('');

  lines.push('## Summary');
  lines.push('');
  lines.push(`- **Perfect Matches:** ${run.perfectMatches}/${run.totalTrades}`);
  lines.push(`- **Success Rate:** ${formatPercent(run.successRate)}`);
  lines.push('');

  lines.push('## Trade Results');
  lines.push('');

  for (const result of results) {
    lines.push(`### Trade ${formatTradeId(result.tradeId)} ${statusIcon(result.overallMatch)}`);
    lines.push('');
    lines.push(result.summary);
    lines.push('');
    lines.push('| Field | Term Sheet | Booking System | Match | Notes |');
    lines.push('|-------|------------|----------------|-------|-------|');
    for (const c of result.comparisons) {
      const row = [
        c.fieldName,
        cell(formatValue(c.termSheetValue, 'N/A')),
        cell(formatValue(c.bookingValue, 'N/A')),
        statusIcon(c.match),
        cell(c.note ?? ''),
      ];
      lines.push(`| ${row.join(' | ')} |`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
