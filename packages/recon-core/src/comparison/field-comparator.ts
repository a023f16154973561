/**
 * FieldComparator
 *
 * Dispatches a canonical field to the comparator for its semantic type.
 */

import type { FieldComparison, FieldSemantic } from '../types/index.js';
import { ReconciliationError } from '../errors/index.js';
import {
  DEFAULT_DATE_TOLERANCE_DAYS,
  DEFAULT_FIELD_TYPES,
  DEFAULT_NUMERIC_TOLERANCE,
} from '../config/index.js';
import {
  compareAbsence,
  compareDate,
  compareExact,
  compareNumeric,
  compareText,
  type ComparatorFn,
} from './comparators.js';

export interface FieldComparatorOptions {
  numericTolerance?: number;
  dateToleranceDays?: number;
  /** Semantic type per canonical field; unlisted fields compare as text */
  fieldTypes?: Readonly<{ [field: string]: FieldSemantic }>;
}

/** Similarity within [0, 1]; anything that is not a number becomes 0 */
function clampSimilarity(value: number): number {
  return Number.isNaN(value) ? 0 : Math.min(1, Math.max(0, value));
}

export class FieldComparator {
  private readonly numericTolerance: number;
  private readonly dateToleranceDays: number;
  private readonly fieldTypes: Readonly<{ [field: string]: FieldSemantic }>;
  private readonly customComparators = new Map<string, ComparatorFn>();

  constructor(options: FieldComparatorOptions = {}) {
    this.numericTolerance = options.numericTolerance ?? DEFAULT_NUMERIC_TOLERANCE;
    this.dateToleranceDays = options.dateToleranceDays ?? DEFAULT_DATE_TOLERANCE_DAYS;
    this.fieldTypes = options.fieldTypes ?? DEFAULT_FIELD_TYPES;
  }

  /**
   * Use `fn` for `fieldName` in place of its semantic comparator. The shared
   * absence rule still runs first.
   */
  registerComparator(fieldName: string, fn: ComparatorFn): void {
    this.customComparators.set(fieldName, fn);
  }

  semanticOf(fieldName: string): FieldSemantic {
    return Object.prototype.hasOwnProperty.call(this.fieldTypes, fieldName)
      ? (this.fieldTypes[fieldName] ?? 'text')
      : 'text';
  }

  /**
   * Compare one field. Always returns a frozen FieldComparison; a custom
   * comparator that throws is reported as a non-match, and its similarity is
   * clamped to [0, 1].
   */
  compare(fieldName: string, termSheetValue: unknown, bookingValue: unknown): FieldComparison {
    const absent = compareAbsence(fieldName, termSheetValue, bookingValue);
    if (absent) return absent;

    const custom = this.customComparators.get(fieldName);
    if (custom) {
      return this.runCustom(custom, fieldName, termSheetValue, bookingValue);
    }

    const semantic = this.semanticOf(fieldName);
    switch (semantic) {
      case 'numeric':
        return compareNumeric(fieldName, termSheetValue, bookingValue, this.numericTolerance);
      case 'date':
        return compareDate(fieldName, termSheetValue, bookingValue, this.dateToleranceDays);
      case 'exact':
        return compareExact(fieldName, termSheetValue, bookingValue);
      case 'text':
        return compareText(fieldName, termSheetValue, bookingValue);
      default: {
        const exhaustive: never = semantic;
        throw new ReconciliationError({
          code: 'INVALID_FIELD_TYPE',
          message: `Unknown field type for ${fieldName}: ${String(exhaustive)}`,
        });
      }
    }
  }

  private runCustom(
    fn: ComparatorFn,
    fieldName: string,
    termSheetValue: unknown,
    bookingValue: unknown
  ): FieldComparison {
    let result: FieldComparison;
    try {
      result = fn(fieldName, termSheetValue, bookingValue);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return Object.freeze({
        fieldName,
        termSheetValue,
        bookingValue,
        match: false,
        similarity: 0,
        note: `comparator failed: ${message}`,
      });
    }

    return Object.freeze({ ...result, similarity: clampSimilarity(result.similarity) });
  }
}
