/**
 * Comparison Result Types
 */

/** Semantic type of a canonical field, selects the comparator */
export type FieldSemantic = 'numeric' | 'date' | 'exact' | 'text';

/**
 * Outcome of comparing one canonical field across term sheet and booking.
 * Created by the comparator library only.
 */
export interface FieldComparison {
  /** Canonical field name */
  readonly fieldName: string;
  /** Value from the term sheet (undefined when absent) */
  readonly termSheetValue: unknown;
  /** Value from the booking record (undefined when absent) */
  readonly bookingValue: unknown;
  readonly match: boolean;
  /** Confidence in [0, 1]; can be high on a mismatch ("close but not equal") */
  readonly similarity: number;
  /** Why the comparison came out the way it did, when that needs saying */
  readonly note?: string;
}

/** Result of comparing one term sheet against one booking record */
export interface ReconciliationResult {
  /** Trade identifier of the booking record */
  readonly tradeId?: number;
  /** True iff matchPercentage is exactly 100 */
  readonly overallMatch: boolean;
  /** 0-100 */
  readonly matchPercentage: number;
  /** In canonical field order */
  readonly comparisons: readonly FieldComparison[];
  /** e.g. "Trade 7: 3/4 fields match (75.0%)" */
  readonly summary: string;
}
