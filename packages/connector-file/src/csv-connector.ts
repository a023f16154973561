/**
 * CSV Connector
 * Reads booking exports with a header row
 */

import { parse } from 'csv-parse/sync';
import type { Record } from '@termrecon/core';
import {
  BaseFileConnector,
  type FileConnectorConfig,
} from './base-file-connector.js';

export interface CsvConnectorConfig extends FileConnectorConfig {
  type: 'csv';
  /** CSV delimiter (default: ',') */
  delimiter?: string;
  /** Quote character (default: '"') */
  quote?: string;
  /** Skip empty lines (default: true) */
  skipEmptyLines?: boolean;
}

export class CsvConnector extends BaseFileConnector<CsvConnectorConfig> {
  constructor(config: Omit<CsvConnectorConfig, 'type'> & { type?: 'csv' }) {
    super({ ...config, type: 'csv' });
  }

  protected async parseFile(): Promise<Record[]> {
    const content = await this.readText();

    const rows: unknown[][] = parse(content, {
      columns: false, // Parse rows first so we can safely map headers ourselves
      delimiter: this.config.delimiter ?? ',',
      quote: this.config.quote ?? '"',
      skip_empty_lines: this.config.skipEmptyLines !== false,
      trim: true,
      cast: true, // Numbers and booleans
      cast_date: false, // Dates stay as written; the date comparator parses them
      relax_column_count: true,
    });
    if (rows.length === 0) return [];

    const [headerRow = [], ...dataRows] = rows;
    const headers = headerRow.map((h) => String(h ?? ''));
    this.assertSafeHeaders(headers, 'CSV');

    return dataRows.map((row) => {
      const record: Record = Object.create(null);
      for (let i = 0; i < headers.length; i++) {
        const key = headers[i];
        if (key === undefined || key === '') continue;
        record[key] = row[i] ?? null;
      }
      return record;
    });
  }
}

/**
 * Factory function to create a CSV connector
 */
export function createCsvConnector(
  config: Omit<CsvConnectorConfig, 'type'>
): CsvConnector {
  return new CsvConnector(config);
}
