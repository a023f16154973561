/**
 * FieldResolver
 *
 * Finds the booking attribute that carries a canonical field, by exact name
 * lookup over an ordered synonym list.
 */

import type { FieldSynonymMap } from '../types/index.js';

/** Outcome of resolving one canonical field against one record */
export type FieldResolution =
  | { resolved: true; field: string; attribute: string }
  | { resolved: false; field: string };

export class FieldResolver {
  private readonly synonyms: FieldSynonymMap;

  constructor(synonyms: FieldSynonymMap) {
    this.synonyms = synonyms;
  }

  /**
   * Return the first synonym present in `available`, or `undefined`.
   *
   * The list order is the precedence: a domain-specific name listed before a
   * generic one wins whenever both are present.
   */
  static resolve(
    synonyms: readonly string[],
    available: ReadonlySet<string>
  ): string | undefined {
    for (const candidate of synonyms) {
      if (available.has(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }

  /** Synonym list configured for a canonical field (empty when unknown) */
  synonymsFor(field: string): readonly string[] {
    return Object.prototype.hasOwnProperty.call(this.synonyms, field)
      ? (this.synonyms[field] ?? [])
      : [];
  }

  /**
   * Resolve a canonical field against the attribute names of one record
   */
  resolveField(field: string, available: ReadonlySet<string>): FieldResolution {
    const attribute = FieldResolver.resolve(this.synonymsFor(field), available);
    return attribute === undefined
      ? { resolved: false, field }
      : { resolved: true, field, attribute };
  }

  /**
   * Attribute name carrying `field` in a key-value view, if any
   */
  attributeFor(field: string, attributes: Readonly<{ [name: string]: unknown }>): string | undefined {
    const resolution = this.resolveField(field, new Set(Object.keys(attributes)));
    return resolution.resolved ? resolution.attribute : undefined;
  }
}
