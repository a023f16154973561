/**
 * BookingRecord
 *
 * Immutable trade row from a booking system. Attribute names are whatever the
 * booking export used (`ISIN`, `Coupon`, `NominalAmountPerBond`, ...); the
 * reconciliation engine finds them by name through `attributes()`.
 */

import type { AttributeView, Record } from '../types/index.js';
import { isAbsent } from '../utils/records.js';

export class BookingRecord implements AttributeView {
  private readonly values: Readonly<Record>;

  constructor(values: Record) {
    const copy: Record = {};
    for (const [key, value] of Object.entries(values)) {
      copy[key] = value;
    }
    this.values = Object.freeze(copy);
  }

  attributes(): Readonly<Record> {
    return this.values;
  }

  has(name: string): boolean {
    return Object.prototype.hasOwnProperty.call(this.values, name);
  }

  /**
   * Value of an attribute, `undefined` when the attribute is missing or empty
   */
  get(name: string): unknown {
    if (!this.has(name)) return undefined;
    const value = this.values[name];
    return isAbsent(value) ? undefined : value;
  }

  toJSON(): Record {
    return { ...this.values };
  }
}
