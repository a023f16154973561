/**
 * @termrecon/recon-core
 *
 * Reconciles an extracted term sheet against booking records: field name
 * resolution across schemas, tolerance-based comparison and match scoring.
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Configuration
export * from './config/index.js';

// Field resolution
export { FieldResolver } from './resolution/index.js';
export type { FieldResolution } from './resolution/index.js';

// Candidate matching
export { RecordMatcher } from './matching/index.js';
export type { RecordMatcherOptions } from './matching/index.js';

// Comparators
export * from './comparison/index.js';

// Reconciliation
import {
  ReconciliationEngine as _ReconciliationEngine,
  type ReconciliationEngineOptions as _ReconciliationEngineOptions,
} from './reconciliation/index.js';
export { ReconciliationEngine, MatchScorer, summarizeRun } from './reconciliation/index.js';
export type {
  ReconciliationEngineOptions,
  RecordScore,
  RunSummary,
} from './reconciliation/index.js';

// Summaries and formatters
export * from './summary/index.js';
export * from './formatters/index.js';

// Errors
export { ReconciliationError } from './errors/index.js';
export type { ReconciliationErrorCode, ReconciliationErrorDetails } from './errors/index.js';

/**
 * Factory function to create a ReconciliationEngine
 *
 * @throws ReconciliationError when the configuration is invalid
 */
export function createReconciliationEngine(
  options?: _ReconciliationEngineOptions
): _ReconciliationEngine {
  return new _ReconciliationEngine(options);
}
