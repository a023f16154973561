/**
 * RecordMatcher
 *
 * Narrows the booking collection to the records that carry the term sheet's
 * identifier.
 */

import type { AttributeView, Logger } from '@termrecon/core';
import { isAbsent, snapshotAttributes, stringifyValue } from '@termrecon/core';
import type { FieldResolver } from '../resolution/index.js';

export interface RecordMatcherOptions {
  /** Canonical identifier field (e.g. `isin`) */
  identifierField: string;
  resolver: FieldResolver;
  logger: Logger;
}

export class RecordMatcher {
  private readonly identifierField: string;
  private readonly resolver: FieldResolver;
  private readonly logger: Logger;

  constructor(options: RecordMatcherOptions) {
    this.identifierField = options.identifierField;
    this.resolver = options.resolver;
    this.logger = options.logger;
  }

  /**
   * Candidates for one term sheet, in input order.
   *
   * Without an identifier, or when no record carries it, every record is a
   * candidate: a stale or mistyped identifier must not produce an empty run.
   */
  filterCandidates<T extends AttributeView>(
    termSheet: Readonly<{ [field: string]: unknown }>,
    bookingRecords: readonly T[]
  ): T[] {
    const identifier = termSheet[this.identifierField];

    if (isAbsent(identifier)) {
      this.logger.warn('Term sheet has no identifier, using all booking records', {
        identifierField: this.identifierField,
        candidates: bookingRecords.length,
      });
      return [...bookingRecords];
    }

    const wanted = stringifyValue(identifier);
    const relevant = bookingRecords.filter((record) => this.extractIdentifier(record) === wanted);

    if (relevant.length === 0) {
      this.logger.warn('No booking records carry the term sheet identifier, using all records', {
        identifierField: this.identifierField,
        identifier: wanted,
        candidates: bookingRecords.length,
      });
      return [...bookingRecords];
    }

    return relevant;
  }

  /**
   * Identifier value of a booking record, stringified; `undefined` when the
   * record has none or cannot be read
   */
  extractIdentifier(record: AttributeView): string | undefined {
    let attributes: Readonly<{ [name: string]: unknown }>;
    try {
      attributes = snapshotAttributes(record);
    } catch (error) {
      this.logger.warn('Booking record attributes could not be read', { error });
      return undefined;
    }

    const attribute = this.resolver.attributeFor(this.identifierField, attributes);
    if (attribute === undefined) return undefined;

    const value = attributes[attribute];
    return isAbsent(value) ? undefined : stringifyValue(value);
  }
}
