/**
 * Reconciliation module exports
 */

export { ReconciliationEngine } from './reconciliation-engine.js';
export type { ReconciliationEngineOptions } from './reconciliation-engine.js';
export { MatchScorer, summarizeRun } from './match-scorer.js';
export type { RecordScore, RunSummary } from './match-scorer.js';
