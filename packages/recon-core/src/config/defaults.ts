/**
 * Default reconciliation settings
 *
 * Every value here can be overridden per run through
 * `resolveReconciliationConfig`.
 */

import { DEFAULT_TRADE_ID_FIELDS } from '@termrecon/core';
import type { FieldSemantic, FieldSynonymMap } from '../types/index.js';

/** Relative tolerance for numeric fields (0.1%) */
export const DEFAULT_NUMERIC_TOLERANCE = 0.001;

/** Date fields must agree to the day */
export const DEFAULT_DATE_TOLERANCE_DAYS = 0;

/** Horizon over which date similarity decays to 0 */
export const DATE_SIMILARITY_HORIZON_DAYS = 365;

/** Similarity reported for a substring text match */
export const PARTIAL_TEXT_SIMILARITY = 0.9;

/**
 * Booking attribute names accepted for each canonical field, in priority order.
 * Key order is the default comparison order.
 */
export const DEFAULT_FIELD_SYNONYMS: FieldSynonymMap = {
  isin: ['ISIN', 'isin', 'Isin'],
  issuer: ['Issuer', 'issuer', 'IssuerName', 'IssuingEntity'],
  issue_amount: ['IssueAmount', 'IssueSize', 'TotalAmount', 'issue_amount'],
  face_value: ['NominalAmountPerBond', 'FaceValue', 'Denomination', 'ParValue', 'face_value'],
  notional_amount: ['Notional', 'NotionalAmount', 'TotalNotional', 'notional_amount'],
  coupon_rate: ['Coupon', 'CouponRate', 'InterestRate', 'Rate', 'coupon_rate'],
  currency: ['Currency', 'currency', 'Ccy'],
  issue_date: ['IssueDate', 'issue_date', 'IssuanceDate'],
  maturity_date: ['Maturity', 'MaturityDate', 'maturity_date'],
  settlement_date: ['SettlementDate', 'settlement_date', 'SettleDate'],
  payment_frequency: [
    'InterestPaymentFrequency',
    'PaymentFrequency',
    'Frequency',
    'payment_frequency',
  ],
  day_count_convention: [
    'DayCountFraction',
    'DayCount',
    'DayCountConvention',
    'day_count_convention',
  ],
  security_type: ['SecurityType', 'InstrumentType', 'security_type'],
  seniority: ['Seniority', 'Rank', 'seniority'],
  tenor: ['Tenor', 'Term', 'tenor'],
};

export const DEFAULT_FIELD_ORDER: readonly string[] = Object.keys(DEFAULT_FIELD_SYNONYMS);

/**
 * Fixed semantic classification. Fields not listed compare as fuzzy text.
 */
export const DEFAULT_FIELD_TYPES: Readonly<{ [field: string]: FieldSemantic }> = {
  coupon_rate: 'numeric',
  face_value: 'numeric',
  issue_amount: 'numeric',
  issue_date: 'date',
  maturity_date: 'date',
  isin: 'exact',
  currency: 'exact',
};

export const DEFAULT_IDENTIFIER_FIELD = 'isin';

/** Booking columns searched for the trade identifier; shared with the loaders */
export { DEFAULT_TRADE_ID_FIELDS };
