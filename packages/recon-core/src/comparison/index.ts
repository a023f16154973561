export { FieldComparator } from './field-comparator.js';
export type { FieldComparatorOptions } from './field-comparator.js';
export {
  compareAbsence,
  compareExact,
  compareNumeric,
  compareDate,
  compareText,
  parseNumber,
  NOTES,
} from './comparators.js';
export type { ComparatorFn } from './comparators.js';
export { parseDate, cleanDateText, daysBetween, DATE_PATTERNS } from './date-parser.js';
