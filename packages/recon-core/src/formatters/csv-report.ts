/**
 * CSV Report Formatter
 *
 * One row per field comparison, trade-level columns repeated on every row.
 */

import { stringify } from 'csv-stringify/sync';
import type { ReconciliationResult } from '../types/index.js';
import { formatPercent, formatValue, yesNo } from './utils.js';

export const CSV_REPORT_COLUMNS = [
  'Trade_ID',
  'Overall_Match',
  'Match_Percentage',
  'Field_Name',
  'Term_Sheet_Value',
  'Booking_Value',
  'Field_Match',
  'Similarity',
  'Notes',
] as const;

export function formatCsvReport(results: readonly ReconciliationResult[]): string {
  const rows: string[][] = [];

  for (const result of results) {
    for (const comparison of result.comparisons) {
      rows.push([
        result.tradeId === undefined ? '' : String(result.tradeId),
        yesNo(result.overallMatch),
        formatPercent(result.matchPercentage),
        comparison.fieldName,
        formatValue(comparison.termSheetValue),
        formatValue(comparison.bookingValue),
        yesNo(comparison.match),
        comparison.similarity.toFixed(3),
        comparison.note ?? '',
      ]);
    }
  }

  return stringify(rows, {
    header: true,
    columns: [...CSV_REPORT_COLUMNS],
  });
}
