/**
 * Utility functions for working with records
 */

import type { AttributeView, Record } from '../types/index.js';

/**
 * Whether a value counts as "not present".
 *
 * Only `undefined` and `null` are absent; `''`, `0` and `false` are values.
 */
export function isAbsent(value: unknown): value is null | undefined {
  return value === undefined || value === null;
}

/**
 * Stringify a scalar for comparison or display
 */
export function stringifyValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
}

/**
 * Plain own-property copy of a record's attribute view.
 *
 * Every getter of the view runs here, so a view that cannot be read fails in
 * this call and not halfway through a comparison.
 *
 * @throws TypeError when the view is not an object
 */
export function snapshotAttributes(record: AttributeView): Record {
  const view: unknown = record.attributes();
  if (typeof view !== 'object' || view === null) {
    throw new TypeError(`Attribute view must be an object, got ${view === null ? 'null' : typeof view}`);
  }
  return Object.fromEntries(Object.entries(view));
}
