/**
 * Type exports for recon-core
 */

export type {
  FieldSemantic,
  FieldComparison,
  ReconciliationResult,
} from './comparison.js';

export type {
  FieldSynonymMap,
  ReconciliationConfig,
  ReconciliationConfigInput,
} from './config.js';
