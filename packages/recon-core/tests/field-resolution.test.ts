import { describe, expect, it } from 'vitest';
import { BookingRecord, Logger, type AttributeView } from '@termrecon/core';
import { DEFAULT_FIELD_SYNONYMS, FieldResolver, RecordMatcher } from '../src/index.js';

function captureLogger() {
  const entries: Array<{ [key: string]: unknown }> = [];
  const logger = new Logger({
    level: 'debug',
    format: 'json',
    write: (line) => {
      entries.push(JSON.parse(line));
    },
  });
  return { logger, entries };
}

describe('FieldResolver', () => {
  it('returns the first synonym present, in list order', () => {
    const available = new Set(['Rate', 'CouponRate']);

    expect(FieldResolver.resolve(['Coupon', 'CouponRate', 'Rate'], available)).toBe('CouponRate');
  });

  it('lets list order decide precedence', () => {
    const available = new Set(['Rate', 'CouponRate']);

    expect(FieldResolver.resolve(['Rate', 'CouponRate'], available)).toBe('Rate');
  });

  it('matches attribute names exactly', () => {
    expect(FieldResolver.resolve(['ISIN'], new Set(['isin ', 'Isin_Code']))).toBeUndefined();
  });

  it('resolves face value through NominalAmountPerBond', () => {
    const resolver = new FieldResolver(DEFAULT_FIELD_SYNONYMS);

    expect(resolver.resolveField('face_value', new Set(['TradeID', 'NominalAmountPerBond']))).toEqual({
      resolved: true,
      field: 'face_value',
      attribute: 'NominalAmountPerBond',
    });
  });

  it('reports unresolved and unknown fields', () => {
    const resolver = new FieldResolver({ isin: ['ISIN'] });

    expect(resolver.resolveField('isin', new Set(['Isin']))).toEqual({ resolved: false, field: 'isin' });
    expect(resolver.synonymsFor('tenor')).toEqual([]);
    expect(resolver.synonymsFor('constructor')).toEqual([]);
  });

  it('finds attributes in a key-value view', () => {
    const resolver = new FieldResolver({ currency: ['Currency', 'Ccy'] });

    expect(resolver.attributeFor('currency', { Ccy: 'EUR' })).toBe('Ccy');
    expect(resolver.attributeFor('currency', { CCY: 'EUR' })).toBeUndefined();
  });
});

describe('RecordMatcher', () => {
  const resolver = new FieldResolver(DEFAULT_FIELD_SYNONYMS);
  const records = [
    new BookingRecord({ TradeID: 1, ISIN: 'US123' }),
    new BookingRecord({ TradeID: 2, isin: 'US456' }),
    new BookingRecord({ TradeID: 3, Isin: 'US123' }),
  ];

  it('keeps records carrying the identifier, in order', () => {
    const { logger } = captureLogger();
    const matcher = new RecordMatcher({ identifierField: 'isin', resolver, logger });

    expect(matcher.filterCandidates({ isin: 'US123' }, records)).toEqual([records[0], records[2]]);
  });

  it('compares identifiers case-sensitively', () => {
    const { logger, entries } = captureLogger();
    const matcher = new RecordMatcher({ identifierField: 'isin', resolver, logger });

    expect(matcher.filterCandidates({ isin: 'us123' }, records)).toHaveLength(3);
    expect(entries[0]).toMatchObject({
      level: 'warn',
      msg: 'No booking records carry the term sheet identifier, using all records',
      identifier: 'us123',
    });
  });

  it('uses every record when the term sheet has no identifier', () => {
    const { logger, entries } = captureLogger();
    const matcher = new RecordMatcher({ identifierField: 'isin', resolver, logger });

    const candidates = matcher.filterCandidates({ isin: null, issuer: 'Acme' }, records);

    expect(candidates).toEqual(records);
    expect(candidates).not.toBe(records);
    expect(entries[0]).toMatchObject({
      msg: 'Term sheet has no identifier, using all booking records',
      candidates: 3,
    });
  });

  it('skips records whose attributes cannot be read', () => {
    const { logger, entries } = captureLogger();
    const matcher = new RecordMatcher({ identifierField: 'isin', resolver, logger });
    const broken: AttributeView = {
      attributes() {
        throw new Error('row decode failed');
      },
    };

    expect(matcher.extractIdentifier(broken)).toBeUndefined();
    expect(entries[0]).toMatchObject({
      level: 'warn',
      error: { name: 'Error', message: 'row decode failed' },
    });
  });

  it('stringifies numeric identifiers', () => {
    const { logger } = captureLogger();
    const matcher = new RecordMatcher({ identifierField: 'isin', resolver, logger });

    expect(matcher.extractIdentifier(new BookingRecord({ ISIN: 12345 }))).toBe('12345');
    expect(matcher.extractIdentifier(new BookingRecord({ ISIN: null }))).toBeUndefined();
  });
});
