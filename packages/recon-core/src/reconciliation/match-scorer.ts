/**
 * Match Scorer
 *
 * Turns per-field outcomes into the percentage, overall flag and summary line
 * of a ReconciliationResult, and aggregates a run of results.
 */

import type { FieldComparison, ReconciliationResult } from '../types/index.js';

export interface RecordScore {
  matches: number;
  comparisons: number;
  /** 0-100 */
  matchPercentage: number;
  overallMatch: boolean;
}

export interface RunSummary {
  totalTrades: number;
  perfectMatches: number;
  /** 0-100 */
  successRate: number;
}

export class MatchScorer {
  /**
   * Score a candidate from its field comparisons.
   *
   * Only fields that were actually compared count; overallMatch holds exactly
   * when every one of them matched, so zero comparisons is never a match.
   */
  score(comparisons: readonly FieldComparison[]): RecordScore {
    const total = comparisons.length;
    const matches = comparisons.filter((c) => c.match).length;
    const matchPercentage = total > 0 ? (matches / total) * 100 : 0;

    return {
      matches,
      comparisons: total,
      matchPercentage,
      overallMatch: matchPercentage === 100,
    };
  }

  /**
   * "Trade {id}: {matches}/{comparisons} fields match ({pct:.1f}%)"
   */
  summarize(tradeId: number | undefined, score: RecordScore): string {
    const id = tradeId === undefined ? 'unknown' : String(tradeId);
    return `Trade ${id}: ${score.matches}/${score.comparisons} fields match (${score.matchPercentage.toFixed(1)}%)`;
  }

  summarizeRun(results: readonly ReconciliationResult[]): RunSummary {
    const totalTrades = results.length;
    const perfectMatches = results.filter((r) => r.overallMatch).length;
    return {
      totalTrades,
      perfectMatches,
      successRate: totalTrades > 0 ? (perfectMatches / totalTrades) * 100 : 0,
    };
  }
}

/**
 * Run totals over a set of results
 */
export function summarizeRun(results: readonly ReconciliationResult[]): RunSummary {
  return new MatchScorer().summarizeRun(results);
}
