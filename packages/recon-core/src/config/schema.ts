/**
 * Reconciliation configuration validation
 */

import { z } from 'zod';
import type { ReconciliationConfig, ReconciliationConfigInput } from '../types/index.js';
import { ReconciliationError } from '../errors/index.js';
import {
  DEFAULT_DATE_TOLERANCE_DAYS,
  DEFAULT_FIELD_ORDER,
  DEFAULT_FIELD_SYNONYMS,
  DEFAULT_FIELD_TYPES,
  DEFAULT_IDENTIFIER_FIELD,
  DEFAULT_NUMERIC_TOLERANCE,
  DEFAULT_TRADE_ID_FIELDS,
} from './defaults.js';

export const fieldSemanticSchema = z.enum(['numeric', 'date', 'exact', 'text']);

const synonymListSchema = z.array(z.string().min(1)).min(1);

/** Partial configuration, as accepted from a configuration file */
export const reconciliationConfigInputSchema = z
  .object({
    numericTolerance: z.number().finite().min(0).optional(),
    dateToleranceDays: z.number().int().min(0).optional(),
    fieldOrder: z.array(z.string().min(1)).optional(),
    fieldSynonyms: z.record(synonymListSchema).optional(),
    fieldTypes: z.record(fieldSemanticSchema).optional(),
    identifierField: z.string().min(1).optional(),
    tradeIdFields: z.array(z.string().min(1)).optional(),
  })
  .strict();

/** Fully merged configuration */
export const reconciliationConfigSchema = z
  .object({
    numericTolerance: z.number().finite().min(0),
    dateToleranceDays: z.number().int().min(0),
    fieldOrder: z.array(z.string().min(1)),
    fieldSynonyms: z.record(synonymListSchema),
    fieldTypes: z.record(fieldSemanticSchema),
    identifierField: z.string().min(1),
    tradeIdFields: z.array(z.string().min(1)),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.fieldOrder.forEach((field, index) => {
      if (seen.has(field)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate field in fieldOrder: ${field}`,
          path: ['fieldOrder', index],
        });
      }
      seen.add(field);

      if (!Object.prototype.hasOwnProperty.call(config.fieldSynonyms, field)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `No synonym list for field: ${field}`,
          path: ['fieldSynonyms', field],
        });
      }
    });

    if (!Object.prototype.hasOwnProperty.call(config.fieldSynonyms, config.identifierField)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `No synonym list for identifier field: ${config.identifierField}`,
        path: ['identifierField'],
      });
    }
  });

export function formatConfigIssues(err: z.ZodError): string {
  return err.issues
    .map((issue) => {
      const path = issue.path.length ? issue.path.join('.') : '(root)';
      return `- ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Merge overrides onto the defaults and validate the result.
 *
 * Synonym lists and field types merge per field. When `fieldOrder` is not
 * given, fields introduced by `fieldSynonyms` are appended to the default
 * order.
 *
 * @throws ReconciliationError with code INVALID_CONFIG
 */
export function resolveReconciliationConfig(
  overrides: ReconciliationConfigInput = {}
): ReconciliationConfig {
  const fieldSynonyms = { ...DEFAULT_FIELD_SYNONYMS, ...(overrides.fieldSynonyms ?? {}) };
  const fieldOrder =
    overrides.fieldOrder ??
    [
      ...DEFAULT_FIELD_ORDER,
      ...Object.keys(overrides.fieldSynonyms ?? {}).filter(
        (field) => !DEFAULT_FIELD_ORDER.includes(field)
      ),
    ];

  const merged = {
    numericTolerance: overrides.numericTolerance ?? DEFAULT_NUMERIC_TOLERANCE,
    dateToleranceDays: overrides.dateToleranceDays ?? DEFAULT_DATE_TOLERANCE_DAYS,
    fieldOrder: [...fieldOrder],
    fieldSynonyms: Object.fromEntries(
      Object.entries(fieldSynonyms).map(([field, names]) => [field, [...names]])
    ),
    fieldTypes: { ...DEFAULT_FIELD_TYPES, ...(overrides.fieldTypes ?? {}) },
    identifierField: overrides.identifierField ?? DEFAULT_IDENTIFIER_FIELD,
    tradeIdFields: [...(overrides.tradeIdFields ?? DEFAULT_TRADE_ID_FIELDS)],
  };

  const result = reconciliationConfigSchema.safeParse(merged);
  if (!result.success) {
    throw new ReconciliationError({
      code: 'INVALID_CONFIG',
      message: `Invalid reconciliation config:\n${formatConfigIssues(result.error)}`,
      suggestion: 'Every field in fieldOrder needs a non-empty synonym list and tolerances must be >= 0.',
      context: { overrides },
    });
  }

  return Object.freeze(result.data);
}
