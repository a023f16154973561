/**
 * Reconciliation Engine
 *
 * Compares one extracted term sheet against booking records, field by field.
 */

import type { AttributeView } from '@termrecon/core';
import { Logger, isAbsent, snapshotAttributes } from '@termrecon/core';
import type { IReconciliationEngine, TermSheetView } from '../interfaces/index.js';
import type {
  FieldComparison,
  ReconciliationConfig,
  ReconciliationConfigInput,
  ReconciliationResult,
} from '../types/index.js';
import { resolveReconciliationConfig } from '../config/index.js';
import { FieldResolver } from '../resolution/index.js';
import { RecordMatcher } from '../matching/index.js';
import { FieldComparator, type ComparatorFn } from '../comparison/index.js';
import { MatchScorer } from './match-scorer.js';

export interface ReconciliationEngineOptions {
  /** Overrides merged onto the default configuration */
  config?: ReconciliationConfigInput;
  /** Diagnostics sink (default: info-level logger on stderr) */
  logger?: Logger;
}

/**
 * Reconciliation Engine Implementation
 *
 * Narrows the booking collection by identifier, then for every candidate
 * resolves each canonical field to that candidate's attribute name, compares
 * the values with the comparator for the field's type and scores the result.
 * Field resolution runs per candidate because records in one collection may
 * expose different attribute sets.
 */
export class ReconciliationEngine implements IReconciliationEngine {
  readonly config: ReconciliationConfig;
  private readonly logger: Logger;
  private readonly resolver: FieldResolver;
  private readonly matcher: RecordMatcher;
  private readonly comparator: FieldComparator;
  private readonly scorer: MatchScorer;

  /**
   * @throws ReconciliationError when the configuration is invalid
   */
  constructor(options: ReconciliationEngineOptions = {}) {
    this.config = resolveReconciliationConfig(options.config);
    this.logger = options.logger ?? new Logger();
    this.resolver = new FieldResolver(this.config.fieldSynonyms);
    this.matcher = new RecordMatcher({
      identifierField: this.config.identifierField,
      resolver: this.resolver,
      logger: this.logger,
    });
    this.comparator = new FieldComparator({
      numericTolerance: this.config.numericTolerance,
      dateToleranceDays: this.config.dateToleranceDays,
      fieldTypes: this.config.fieldTypes,
    });
    this.scorer = new MatchScorer();
  }

  /**
   * Replace the comparator of one canonical field
   */
  registerComparator(fieldName: string, fn: ComparatorFn): void {
    this.comparator.registerComparator(fieldName, fn);
  }

  reconcile(
    termSheet: TermSheetView | null | undefined,
    bookingRecords: readonly AttributeView[] | null | undefined
  ): ReconciliationResult[] {
    if (!termSheet) {
      this.logger.error('No term sheet data provided');
      return [];
    }

    if (!bookingRecords || bookingRecords.length === 0) {
      this.logger.error('No booking records provided');
      return [];
    }

    const candidates = this.matcher.filterCandidates(termSheet, bookingRecords);
    this.logger.info(`Reconciling against ${candidates.length} relevant booking records`, {
      candidates: candidates.length,
      total: bookingRecords.length,
    });

    return candidates.map((record) => this.reconcileRecord(termSheet, record));
  }

  /**
   * Compare the term sheet against a single booking record.
   *
   * A record that cannot be read or compared yields a result with no
   * comparisons instead of aborting the run.
   */
  reconcileRecord(termSheet: TermSheetView, record: AttributeView): ReconciliationResult {
    try {
      return this.compareAttributes(termSheet, snapshotAttributes(record));
    } catch (error) {
      this.logger.warn('Booking record could not be read, no fields compared', { error });
      return this.buildResult(undefined, []);
    }
  }

  private compareAttributes(
    termSheet: TermSheetView,
    attributes: Readonly<{ [name: string]: unknown }>
  ): ReconciliationResult {
    const available = new Set(Object.keys(attributes));
    const comparisons: FieldComparison[] = [];

    for (const field of this.config.fieldOrder) {
      const termSheetValue = termSheet[field];
      if (isAbsent(termSheetValue)) continue;

      const resolution = this.resolver.resolveField(field, available);
      if (!resolution.resolved) {
        this.logger.debug(`No matching booking field found for term sheet field: ${field}`, {
          field,
        });
        continue;
      }

      const bookingValue = attributes[resolution.attribute];
      if (isAbsent(bookingValue)) continue;

      comparisons.push(this.comparator.compare(field, termSheetValue, bookingValue));
    }

    return this.buildResult(this.extractTradeId(attributes, available), comparisons);
  }

  private buildResult(
    tradeId: number | undefined,
    comparisons: FieldComparison[]
  ): ReconciliationResult {
    const score = this.scorer.score(comparisons);
    return Object.freeze({
      ...(tradeId === undefined ? {} : { tradeId }),
      overallMatch: score.overallMatch,
      matchPercentage: score.matchPercentage,
      comparisons: Object.freeze(comparisons),
      summary: this.scorer.summarize(tradeId, score),
    });
  }

  /**
   * Trade identifier from the first configured trade id attribute present.
   * Integer text is accepted; anything else leaves the identifier absent.
   */
  private extractTradeId(
    attributes: Readonly<{ [name: string]: unknown }>,
    available: ReadonlySet<string>
  ): number | undefined {
    const attribute = FieldResolver.resolve(this.config.tradeIdFields, available);
    if (attribute === undefined) return undefined;

    const value = attributes[attribute];
    if (typeof value === 'number' && Number.isInteger(value)) return value;
    if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return Number(value.trim());
    return undefined;
  }
}
