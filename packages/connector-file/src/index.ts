/**
 * @termrecon/connector-file
 *
 * Booking file connectors (CSV, JSON, Excel) and the term sheet loader
 */

export { BaseFileConnector } from './base-file-connector.js';
export type { FileConnectorConfig } from './base-file-connector.js';

export { CsvConnector, createCsvConnector } from './csv-connector.js';
export type { CsvConnectorConfig } from './csv-connector.js';

export { JsonConnector, createJsonConnector, DEFAULT_RECORD_KEYS } from './json-connector.js';
export type { JsonConnectorConfig } from './json-connector.js';

export { ExcelConnector, createExcelConnector, normalizeCellValue } from './excel-connector.js';
export type { ExcelConnectorConfig } from './excel-connector.js';

export {
  loadBookingRecords,
  createBookingSource,
  detectBookingFormat,
  toBookingRecord,
} from './booking-loader.js';
export type { BookingLoadOptions, BookingFileFormat, BookingRowResult } from './booking-loader.js';

export {
  loadTermSheet,
  parseTermSheetJson,
  stripCodeFence,
  flattenTermSheet,
  JsonTermSheetSource,
  TERM_SHEET_CATEGORIES,
} from './term-sheet-loader.js';
