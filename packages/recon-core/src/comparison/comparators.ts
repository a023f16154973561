/**
 * Comparator library
 *
 * One pure function per semantic field type. Each takes the two raw values
 * and always returns a FieldComparison; unparseable input degrades to an
 * exact text comparison instead of throwing.
 */

import { isAbsent, stringifyValue } from '@termrecon/core';
import type { FieldComparison } from '../types/index.js';
import {
  DATE_SIMILARITY_HORIZON_DAYS,
  DEFAULT_DATE_TOLERANCE_DAYS,
  DEFAULT_NUMERIC_TOLERANCE,
  PARTIAL_TEXT_SIMILARITY,
} from '../config/index.js';
import { daysBetween, parseDate } from './date-parser.js';

/** Custom comparator function type */
export type ComparatorFn = (
  fieldName: string,
  termSheetValue: unknown,
  bookingValue: unknown
) => FieldComparison;

export const NOTES = {
  bothAbsent: 'both absent',
  oneMissing: 'one value missing',
  exactMismatch: "exact values don't match",
  partialText: 'partial text match',
  textMismatch: "text doesn't match",
  notNumeric: 'not numeric, compared as text',
  notDate: 'not a recognised date, compared as text',
} as const;

function comparison(
  fieldName: string,
  termSheetValue: unknown,
  bookingValue: unknown,
  match: boolean,
  similarity: number,
  note?: string
): FieldComparison {
  return Object.freeze({
    fieldName,
    termSheetValue,
    bookingValue,
    match,
    similarity,
    ...(note === undefined ? {} : { note }),
  });
}

/**
 * Shared absence rule, evaluated before any type-specific comparison.
 * Returns `undefined` when both values are present.
 */
export function compareAbsence(
  fieldName: string,
  termSheetValue: unknown,
  bookingValue: unknown
): FieldComparison | undefined {
  const termSheetAbsent = isAbsent(termSheetValue);
  const bookingAbsent = isAbsent(bookingValue);

  if (termSheetAbsent && bookingAbsent) {
    return comparison(fieldName, undefined, undefined, true, 1, NOTES.bothAbsent);
  }
  if (termSheetAbsent || bookingAbsent) {
    return comparison(
      fieldName,
      termSheetAbsent ? undefined : termSheetValue,
      bookingAbsent ? undefined : bookingValue,
      false,
      0,
      NOTES.oneMissing
    );
  }
  return undefined;
}

/** Plain decimal or scientific notation; no hex, octal or binary literals */
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)(e[+-]?\d+)?$/i;

/**
 * Finite number from a number or decimal text, otherwise `undefined`
 */
export function parseNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) return undefined;
    const parsed = Number(trimmed);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/**
 * Byte-for-byte comparison of the trimmed string forms; no case folding.
 *
 * @param reason - Why an exact comparison was used in place of another one
 */
export function compareExact(
  fieldName: string,
  termSheetValue: unknown,
  bookingValue: unknown,
  reason?: string
): FieldComparison {
  const absent = compareAbsence(fieldName, termSheetValue, bookingValue);
  if (absent) return absent;

  const match =
    stringifyValue(termSheetValue).trim() === stringifyValue(bookingValue).trim();

  let note: string | undefined;
  if (match) {
    note = reason;
  } else {
    note = reason ? `${reason}; ${NOTES.exactMismatch}` : NOTES.exactMismatch;
  }

  return comparison(fieldName, termSheetValue, bookingValue, match, match ? 1 : 0, note);
}

/**
 * Relative difference against the booking value (absolute when the booking
 * value is 0), matched against `tolerance`.
 */
export function compareNumeric(
  fieldName: string,
  termSheetValue: unknown,
  bookingValue: unknown,
  tolerance: number = DEFAULT_NUMERIC_TOLERANCE
): FieldComparison {
  const absent = compareAbsence(fieldName, termSheetValue, bookingValue);
  if (absent) return absent;

  const a = parseNumber(termSheetValue);
  const b = parseNumber(bookingValue);
  if (a === undefined || b === undefined) {
    return compareExact(fieldName, termSheetValue, bookingValue, NOTES.notNumeric);
  }

  const absoluteDiff = Math.abs(a - b);
  const diff = b !== 0 ? absoluteDiff / Math.abs(b) : absoluteDiff;
  const match = diff <= tolerance;

  return comparison(
    fieldName,
    termSheetValue,
    bookingValue,
    match,
    Math.max(0, 1 - diff),
    match ? undefined : `difference: ${absoluteDiff.toFixed(4)}`
  );
}

/**
 * Day difference between two free-form dates, matched against
 * `toleranceDays`. Similarity decays linearly to 0 over a year.
 */
export function compareDate(
  fieldName: string,
  termSheetValue: unknown,
  bookingValue: unknown,
  toleranceDays: number = DEFAULT_DATE_TOLERANCE_DAYS
): FieldComparison {
  const absent = compareAbsence(fieldName, termSheetValue, bookingValue);
  if (absent) return absent;

  const termSheetDate = parseDate(stringifyValue(termSheetValue));
  const bookingDate = parseDate(stringifyValue(bookingValue));
  if (!termSheetDate || !bookingDate) {
    return compareExact(fieldName, termSheetValue, bookingValue, NOTES.notDate);
  }

  const days = daysBetween(termSheetDate, bookingDate);
  const match = days <= toleranceDays;

  return comparison(
    fieldName,
    termSheetValue,
    bookingValue,
    match,
    Math.max(0, 1 - days / DATE_SIMILARITY_HORIZON_DAYS),
    match
      ? undefined
      : `date difference: ${days} days (${stringifyValue(termSheetValue)} vs ${stringifyValue(bookingValue)})`
  );
}

/**
 * Case- and whitespace-insensitive text comparison. A substring in either
 * direction counts as a match with reduced similarity, so "Genel Energy PLC"
 * matches "Genel Energy".
 */
export function compareText(
  fieldName: string,
  termSheetValue: unknown,
  bookingValue: unknown
): FieldComparison {
  const absent = compareAbsence(fieldName, termSheetValue, bookingValue);
  if (absent) return absent;

  const a = stringifyValue(termSheetValue).trim().toLowerCase();
  const b = stringifyValue(bookingValue).trim().toLowerCase();

  if (a === b) {
    return comparison(fieldName, termSheetValue, bookingValue, true, 1);
  }
  if (a.includes(b) || b.includes(a)) {
    return comparison(
      fieldName,
      termSheetValue,
      bookingValue,
      true,
      PARTIAL_TEXT_SIMILARITY,
      NOTES.partialText
    );
  }
  return comparison(fieldName, termSheetValue, bookingValue, false, 0, NOTES.textMismatch);
}
