/**
 * Zod schemas for the records handed over by the extraction and loading
 * collaborators
 */

import { z } from 'zod';

/**
 * Numeric term: a number, or numeric text such as "9.25" or "1,000,000".
 * Anything else is rejected rather than silently turned into NaN.
 */
const numericTerm = z
  .union([
    z.number().finite(),
    z
      .string()
      .trim()
      .transform((value, ctx) => {
        const parsed = Number(value.replace(/,/g, ''));
        if (value === '' || !Number.isFinite(parsed)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `Expected a number, received "${value}"`,
          });
          return z.NEVER;
        }
        return parsed;
      }),
  ])
  .nullish();

const textTerm = z.string().nullish();

/** Term sheet as produced by the extraction collaborator; unknown keys are dropped */
export const termSheetSchema = z.object({
  // Identifiers
  isin: textTerm,
  issuer: textTerm,

  // Financial terms
  issue_amount: numericTerm,
  face_value: numericTerm,
  notional_amount: numericTerm,
  coupon_rate: numericTerm,
  currency: textTerm,

  // Dates
  issue_date: textTerm,
  maturity_date: textTerm,
  settlement_date: textTerm,

  // Payment terms
  payment_frequency: textTerm,
  day_count_convention: textTerm,

  // Bond characteristics
  security_type: textTerm,
  seniority: textTerm,
  tenor: textTerm,
});

/** Booking columns that may carry the trade identifier, in priority order */
export const DEFAULT_TRADE_ID_FIELDS: readonly string[] = [
  'TradeID',
  'TradeId',
  'trade_id',
  'TradeRef',
];

/**
 * Trade identifier column value: integers, or integer text from CSV exports
 */
export const tradeIdSchema = z.union([
  z.number().int(),
  z
    .string()
    .trim()
    .regex(/^-?\d+$/, 'Trade identifier must be an integer')
    .transform((value) => Number(value)),
]);

/** Booking attribute values: scalars only, empty cells become absent (null) */
export const bookingValueSchema = z
  .union([z.string(), z.number().finite(), z.boolean(), z.null(), z.undefined()])
  .transform((value) => (value === '' || value === undefined ? null : value));

/** One booking row, keyed by whatever column names the export used */
export const bookingRowSchema = z.record(bookingValueSchema);

export type TermSheetInput = z.input<typeof termSheetSchema>;
export type BookingRowInput = z.input<typeof bookingRowSchema>;
