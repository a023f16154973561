/**
 * Reconciliation Configuration Types
 */

import type { FieldSemantic } from './comparison.js';

/** Canonical field name -> booking attribute names, highest priority first */
export type FieldSynonymMap = Readonly<{ [canonicalField: string]: readonly string[] }>;

export interface ReconciliationConfig {
  /** Relative numeric tolerance (0.001 = 0.1%) */
  readonly numericTolerance: number;
  /** Allowed day difference for date fields */
  readonly dateToleranceDays: number;
  /** Canonical fields, in comparison order */
  readonly fieldOrder: readonly string[];
  /** Synonym lists per canonical field */
  readonly fieldSynonyms: FieldSynonymMap;
  /** Semantic type overrides on top of the default classification */
  readonly fieldTypes: Readonly<{ [canonicalField: string]: FieldSemantic }>;
  /** Canonical field used to narrow booking candidates */
  readonly identifierField: string;
  /** Booking attribute names holding the trade identifier, highest priority first */
  readonly tradeIdFields: readonly string[];
}

/** Partial override as read from a configuration file */
export type ReconciliationConfigInput = {
  -readonly [K in keyof ReconciliationConfig]?: ReconciliationConfig[K];
};
