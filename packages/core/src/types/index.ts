/**
 * Type exports for core
 */

export type { Record, AttributeView, ReadResult } from './record.js';
export type { TermSheetData, TermSheetField } from './term-sheet.js';
