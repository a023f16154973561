/**
 * Booking loader
 *
 * Picks a connector by file extension and turns the raw rows into validated
 * BookingRecords. A row that fails validation is skipped with a warning; it
 * never aborts the load.
 */

import { extname, basename } from 'node:path';
import {
  BookingRecord,
  ConnectorError,
  DEFAULT_TRADE_ID_FIELDS,
  bookingRowSchema,
  createSilentLogger,
  tradeIdSchema,
  type IRecordSource,
  type Logger,
  type Record,
} from '@termrecon/core';
import { CsvConnector } from './csv-connector.js';
import { JsonConnector } from './json-connector.js';
import { ExcelConnector } from './excel-connector.js';

export interface BookingLoadOptions {
  /** Dot path to the records array inside a JSON file */
  recordsPath?: string;
  /** Worksheet name or id for .xlsx files */
  sheet?: string | number;
  /** CSV delimiter */
  delimiter?: string;
  /** Columns holding the trade identifier, coerced to an integer */
  tradeIdFields?: readonly string[];
  logger?: Logger;
}

export type BookingFileFormat = 'csv' | 'json' | 'excel';

const FORMATS_BY_EXTENSION: { readonly [ext: string]: BookingFileFormat } = {
  '.csv': 'csv',
  '.json': 'json',
  '.xlsx': 'excel',
};

/**
 * Booking file format for a path, from its extension
 *
 * @throws ConnectorError UNSUPPORTED_FORMAT
 */
export function detectBookingFormat(filePath: string): BookingFileFormat {
  const ext = extname(filePath).toLowerCase();
  const format = FORMATS_BY_EXTENSION[ext];
  if (!format) {
    throw new ConnectorError({
      code: 'UNSUPPORTED_FORMAT',
      message: `Unsupported booking file format: ${ext || '(none)'}`,
      source: filePath,
      suggestion: 'Use a .csv, .json or .xlsx file.',
    });
  }
  return format;
}

/**
 * Source for a booking file
 */
export function createBookingSource(
  filePath: string,
  options: BookingLoadOptions = {}
): IRecordSource {
  const id = `bookings:${basename(filePath)}`;
  const name = basename(filePath);

  switch (detectBookingFormat(filePath)) {
    case 'csv':
      return new CsvConnector({ id, name, filePath, delimiter: options.delimiter });
    case 'json':
      return new JsonConnector({ id, name, filePath, recordsPath: options.recordsPath });
    case 'excel':
      return new ExcelConnector({ id, name, filePath, sheet: options.sheet });
  }
}

export type BookingRowResult =
  | { ok: true; record: BookingRecord }
  | { ok: false; reason: string };

/**
 * Validate one raw row. The first trade id column present is coerced to an
 * integer; empty cells become absent.
 */
export function toBookingRecord(
  row: Record,
  tradeIdFields: readonly string[] = DEFAULT_TRADE_ID_FIELDS
): BookingRowResult {
  const parsed = bookingRowSchema.safeParse(row);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return { ok: false, reason: `${where}${issue?.message ?? 'invalid row'}` };
  }

  const values = parsed.data;
  const idField = tradeIdFields.find(
    (field) => Object.prototype.hasOwnProperty.call(values, field) && values[field] !== null
  );

  if (idField !== undefined) {
    const id = tradeIdSchema.safeParse(values[idField]);
    if (!id.success) {
      return {
        ok: false,
        reason: `${idField}: ${id.error.issues[0]?.message ?? 'invalid trade identifier'}`,
      };
    }
    values[idField] = id.data;
  }

  return { ok: true, record: new BookingRecord(values) };
}

/**
 * Load booking records from a .csv, .json or .xlsx file, in file order
 *
 * @throws ConnectorError when the file cannot be read or has an unsupported format
 */
export async function loadBookingRecords(
  filePath: string,
  options: BookingLoadOptions = {}
): Promise<BookingRecord[]> {
  const logger = (options.logger ?? createSilentLogger()).child({ file: basename(filePath) });
  const source = createBookingSource(filePath, options);

  await source.connect();
  try {
    const { records: rows } = await source.readRecords();
    if (source instanceof JsonConnector && source.skippedCount > 0) {
      logger.warn('Skipped non-object entries', { count: source.skippedCount });
    }

    const records: BookingRecord[] = [];
    rows.forEach((row, index) => {
      const result = toBookingRecord(row, options.tradeIdFields);
      if (result.ok) {
        records.push(result.record);
      } else {
        logger.warn('Skipping invalid booking row', { row: index + 1, reason: result.reason });
      }
    });

    logger.info(`Loaded ${records.length} booking records`);
    return records;
  } finally {
    await source.disconnect();
  }
}
