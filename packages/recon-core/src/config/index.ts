export {
  DEFAULT_NUMERIC_TOLERANCE,
  DEFAULT_DATE_TOLERANCE_DAYS,
  DATE_SIMILARITY_HORIZON_DAYS,
  PARTIAL_TEXT_SIMILARITY,
  DEFAULT_FIELD_SYNONYMS,
  DEFAULT_FIELD_ORDER,
  DEFAULT_FIELD_TYPES,
  DEFAULT_IDENTIFIER_FIELD,
  DEFAULT_TRADE_ID_FIELDS,
} from './defaults.js';
export {
  fieldSemanticSchema,
  reconciliationConfigInputSchema,
  reconciliationConfigSchema,
  resolveReconciliationConfig,
  formatConfigIssues,
} from './schema.js';
