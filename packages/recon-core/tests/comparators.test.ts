import { describe, expect, it } from 'vitest';
import {
  FieldComparator,
  NOTES,
  cleanDateText,
  compareAbsence,
  compareDate,
  compareExact,
  compareNumeric,
  compareText,
  daysBetween,
  parseDate,
  parseNumber,
} from '../src/index.js';

describe('compareAbsence', () => {
  it('matches when both values are absent', () => {
    expect(compareAbsence('tenor', null, undefined)).toEqual({
      fieldName: 'tenor',
      termSheetValue: undefined,
      bookingValue: undefined,
      match: true,
      similarity: 1,
      note: 'both absent',
    });
  });

  it('fails when one value is missing', () => {
    expect(compareAbsence('tenor', '5Y', null)).toMatchObject({
      termSheetValue: '5Y',
      match: false,
      similarity: 0,
      note: 'one value missing',
    });
  });

  it('treats empty string and zero as values', () => {
    expect(compareAbsence('tenor', '', 0)).toBeUndefined();
  });
});

describe('compareNumeric', () => {
  it('matches drift within tolerance', () => {
    const result = compareNumeric('coupon_rate', 5.001, 5.0);

    expect(result.match).toBe(true);
    expect(result.similarity).toBeCloseTo(0.9998, 10);
    expect(result.note).toBeUndefined();
  });

  it('reports the absolute difference on mismatch', () => {
    const result = compareNumeric('coupon_rate', 5.1, 5.0);

    expect(result.match).toBe(false);
    expect(result.similarity).toBeCloseTo(0.98, 10);
    expect(result.note).toBe('difference: 0.1000');
  });

  it('uses the absolute difference when the booking value is zero', () => {
    expect(compareNumeric('face_value', 0.0005, 0).match).toBe(true);
    expect(compareNumeric('face_value', 0.5, 0)).toMatchObject({
      match: false,
      similarity: 0.5,
      note: 'difference: 0.5000',
    });
  });

  it('measures against the booking value only', () => {
    // relative to 100 (booking), not to 0 (term sheet)
    const result = compareNumeric('face_value', 0, 100);

    expect(result.match).toBe(false);
    expect(result.similarity).toBe(0);
    expect(result.note).toBe('difference: 100.0000');
  });

  it('parses numeric text', () => {
    expect(compareNumeric('issue_amount', '1000000', 1000000).match).toBe(true);
  });

  it('honours a custom tolerance', () => {
    expect(compareNumeric('coupon_rate', 5.1, 5.0, 0.05).match).toBe(true);
  });

  it('falls back to exact comparison for non-numbers', () => {
    expect(compareNumeric('coupon_rate', 'floating', 'floating')).toMatchObject({
      match: true,
      similarity: 1,
      note: NOTES.notNumeric,
    });
    expect(compareNumeric('coupon_rate', 'floating', 5)).toMatchObject({
      match: false,
      similarity: 0,
      note: "not numeric, compared as text; exact values don't match",
    });
  });

  it('compares hex text as text', () => {
    expect(compareNumeric('coupon_rate', '0x10', 16)).toMatchObject({
      match: false,
      similarity: 0,
      note: "not numeric, compared as text; exact values don't match",
    });
  });

  it('keeps similarity within [0, 1]', () => {
    expect(compareNumeric('coupon_rate', 50, 5).similarity).toBe(0);
  });
});

describe('parseNumber', () => {
  it('accepts finite numbers and numeric text', () => {
    expect(parseNumber(5)).toBe(5);
    expect(parseNumber(' 5.25 ')).toBe(5.25);
    expect(parseNumber('')).toBeUndefined();
    expect(parseNumber('abc')).toBeUndefined();
    expect(parseNumber(Number.NaN)).toBeUndefined();
    expect(parseNumber(Infinity)).toBeUndefined();
    expect(parseNumber(true)).toBeUndefined();
  });

  it('reads decimal and scientific notation only', () => {
    expect(parseNumber('1e-3')).toBe(0.001);
    expect(parseNumber('-.5')).toBe(-0.5);
    expect(parseNumber('+7.')).toBe(7);
    expect(parseNumber('0x10')).toBeUndefined();
    expect(parseNumber('0o7')).toBeUndefined();
    expect(parseNumber('0b1')).toBeUndefined();
    expect(parseNumber('1,000')).toBeUndefined();
  });
});

describe('date parsing', () => {
  it('strips everything but digits and separators', () => {
    expect(cleanDateText(' 15 Jan 2030 ')).toBe('152030');
    expect(cleanDateText('2030-01-15T00:00')).toBe('2030-01-150000');
  });

  it('tries patterns in order', () => {
    expect(parseDate('2030-01-15')?.toISOString()).toBe('2030-01-15T00:00:00.000Z');
    // day first wins over month first
    expect(parseDate('03-04-2030')?.toISOString()).toBe('2030-04-03T00:00:00.000Z');
    // day first is not a date, month first is
    expect(parseDate('04-15-2030')?.toISOString()).toBe('2030-04-15T00:00:00.000Z');
    expect(parseDate('2030/01/15')?.toISOString()).toBe('2030-01-15T00:00:00.000Z');
    expect(parseDate('15/01/2030')?.toISOString()).toBe('2030-01-15T00:00:00.000Z');
  });

  it('rejects impossible calendar dates', () => {
    expect(parseDate('2030-02-30')).toBeUndefined();
    expect(parseDate('not-a-date')).toBeUndefined();
    expect(parseDate('15.01.2030')).toBeUndefined();
  });

  it('counts whole days', () => {
    const a = parseDate('2030-01-15');
    const b = parseDate('2030-03-01');
    expect(a && b ? daysBetween(a, b) : undefined).toBe(45);
  });
});

describe('compareDate', () => {
  it('matches the same day written differently', () => {
    expect(compareDate('maturity_date', '2030-01-15', '15/01/2030')).toMatchObject({
      match: true,
      similarity: 1,
    });
  });

  it('reports the day delta and both values', () => {
    const result = compareDate('maturity_date', '2030-01-15', '2030-01-20');

    expect(result.match).toBe(false);
    expect(result.similarity).toBeCloseTo(1 - 5 / 365, 10);
    expect(result.note).toBe('date difference: 5 days (2030-01-15 vs 2030-01-20)');
  });

  it('honours a day tolerance', () => {
    expect(compareDate('maturity_date', '2030-01-15', '2030-01-17', 2).match).toBe(true);
  });

  it('floors similarity at zero', () => {
    expect(compareDate('maturity_date', '2030-01-15', '2032-01-15').similarity).toBe(0);
  });

  it('falls back to exact comparison for unparseable dates', () => {
    expect(compareDate('maturity_date', 'not-a-date', 'not-a-date')).toEqual({
      fieldName: 'maturity_date',
      termSheetValue: 'not-a-date',
      bookingValue: 'not-a-date',
      match: true,
      similarity: 1,
      note: 'not a recognised date, compared as text',
    });
    expect(compareDate('maturity_date', 'perpetual', '2030-01-15').match).toBe(false);
  });
});

describe('compareExact', () => {
  it('trims but does not fold case', () => {
    expect(compareExact('isin', ' US123 ', 'US123')).toEqual({
      fieldName: 'isin',
      termSheetValue: ' US123 ',
      bookingValue: 'US123',
      match: true,
      similarity: 1,
    });
    expect(compareExact('currency', 'usd', 'USD')).toMatchObject({
      match: false,
      similarity: 0,
      note: "exact values don't match",
    });
  });
});

describe('compareText', () => {
  it('ignores case and surrounding whitespace', () => {
    expect(compareText('seniority', ' Senior Unsecured', 'senior unsecured ')).toMatchObject({
      match: true,
      similarity: 1,
    });
  });

  it('accepts a substring with reduced similarity', () => {
    expect(compareText('issuer', 'Genel Energy PLC', 'Genel Energy')).toEqual({
      fieldName: 'issuer',
      termSheetValue: 'Genel Energy PLC',
      bookingValue: 'Genel Energy',
      match: true,
      similarity: 0.9,
      note: 'partial text match',
    });
  });

  it('rejects unrelated text', () => {
    expect(compareText('payment_frequency', 'Annual', 'Quarterly')).toMatchObject({
      match: false,
      similarity: 0,
      note: "text doesn't match",
    });
  });
});

describe('FieldComparator', () => {
  it('dispatches by the default classification', () => {
    const comparator = new FieldComparator();

    expect(comparator.semanticOf('coupon_rate')).toBe('numeric');
    expect(comparator.semanticOf('maturity_date')).toBe('date');
    expect(comparator.semanticOf('isin')).toBe('exact');
    expect(comparator.semanticOf('settlement_date')).toBe('text');
    expect(comparator.semanticOf('toString')).toBe('text');
    expect(comparator.compare('currency', 'usd', 'USD').match).toBe(false);
    expect(comparator.compare('issuer', 'usd', 'USD').match).toBe(true);
  });

  it('applies field type overrides', () => {
    const comparator = new FieldComparator({ fieldTypes: { settlement_date: 'date' } });

    expect(comparator.compare('settlement_date', '2030-01-15', '15/01/2030').match).toBe(true);
  });

  it('runs custom comparators after the absence rule', () => {
    const comparator = new FieldComparator();
    comparator.registerComparator('issuer', (fieldName, a, b) => ({
      fieldName,
      termSheetValue: a,
      bookingValue: b,
      match: true,
      similarity: 0.5,
      note: 'custom',
    }));

    expect(comparator.compare('issuer', 'A', 'B').note).toBe('custom');
    expect(comparator.compare('issuer', 'A', null).note).toBe('one value missing');
  });

  it('freezes custom results and bounds their similarity', () => {
    const comparator = new FieldComparator();
    comparator.registerComparator('issuer', (fieldName, a, b) => ({
      fieldName,
      termSheetValue: a,
      bookingValue: b,
      match: false,
      similarity: a === 'high' ? 1.5 : Number.NaN,
    }));

    const high = comparator.compare('issuer', 'high', 'B');
    const invalid = comparator.compare('issuer', 'nan', 'B');

    expect(high.similarity).toBe(1);
    expect(invalid.similarity).toBe(0);
    expect(Object.isFrozen(high)).toBe(true);
    expect(high).toEqual({
      fieldName: 'issuer',
      termSheetValue: 'high',
      bookingValue: 'B',
      match: false,
      similarity: 1,
    });
  });

  it('turns a throwing custom comparator into a non-match', () => {
    const comparator = new FieldComparator();
    comparator.registerComparator('issuer', () => {
      throw new Error('lookup table missing');
    });

    expect(comparator.compare('issuer', 'A', 'A')).toEqual({
      fieldName: 'issuer',
      termSheetValue: 'A',
      bookingValue: 'A',
      match: false,
      similarity: 0,
      note: 'comparator failed: lookup table missing',
    });
  });
});
