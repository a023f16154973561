/**
 * Booking collection summary, logged before a run
 */

import type { AttributeView } from '@termrecon/core';
import { isAbsent, stringifyValue } from '@termrecon/core';
import type { ReconciliationConfigInput } from '../types/index.js';
import { resolveReconciliationConfig } from '../config/index.js';
import { FieldResolver } from '../resolution/index.js';
import { parseNumber } from '../comparison/index.js';

export interface BookingSummary {
  totalRecords: number;
  uniqueIdentifiers: string[];
  uniqueIssuers: string[];
  currencies: string[];
  /** "{min}%-{max}%" with two decimals, or "N/A" */
  couponRange: string;
}

export function summarizeBookings(
  records: readonly AttributeView[],
  config: ReconciliationConfigInput = {}
): BookingSummary {
  const resolved = resolveReconciliationConfig(config);
  const resolver = new FieldResolver(resolved.fieldSynonyms);

  const identifiers = new Set<string>();
  const issuers = new Set<string>();
  const currencies = new Set<string>();
  const coupons: number[] = [];

  const valueOf = (attributes: Readonly<{ [name: string]: unknown }>, field: string): unknown => {
    const attribute = resolver.attributeFor(field, attributes);
    return attribute === undefined ? undefined : attributes[attribute];
  };

  const addText = (target: Set<string>, value: unknown): void => {
    if (isAbsent(value)) return;
    const text = stringifyValue(value);
    if (text !== '') target.add(text);
  };

  for (const record of records) {
    const attributes = record.attributes();
    addText(identifiers, valueOf(attributes, resolved.identifierField));
    addText(issuers, valueOf(attributes, 'issuer'));
    addText(currencies, valueOf(attributes, 'currency'));

    const coupon = parseNumber(valueOf(attributes, 'coupon_rate'));
    if (coupon !== undefined) coupons.push(coupon);
  }

  const couponRange =
    coupons.length > 0
      ? `${Math.min(...coupons).toFixed(2)}%-${Math.max(...coupons).toFixed(2)}%`
      : 'N/A';

  return {
    totalRecords: records.length,
    uniqueIdentifiers: [...identifiers],
    uniqueIssuers: [...issuers],
    currencies: [...currencies],
    couponRange,
  };
}
