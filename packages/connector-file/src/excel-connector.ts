/**
 * Excel Connector
 * Reads booking sheets from .xlsx workbooks
 */

import ExcelJS from 'exceljs';
import type { Record } from '@termrecon/core';
import { ConnectorError } from '@termrecon/core';
import {
  BaseFileConnector,
  type FileConnectorConfig,
} from './base-file-connector.js';

export interface ExcelConnectorConfig extends FileConnectorConfig {
  type: 'excel';
  /** Sheet name or 1-based id (default: first sheet) */
  sheet?: string | number;
  /** Header row (1-indexed, default: 1) */
  startRow?: number;
  /** First column read (1-indexed, default: 1) */
  startColumn?: number;
}

/**
 * Plain value of a cell. Formula cells give their cached result, rich text
 * its concatenated runs and dates their calendar day (YYYY-MM-DD, UTC).
 */
export function normalizeCellValue(value: ExcelJS.CellValue): unknown {
  if (value === null || value === undefined) {
    return null;
  }

  if (value instanceof Date) {
    return value.toISOString().slice(0, 10);
  }

  if (typeof value !== 'object') {
    return value;
  }

  if ('result' in value) {
    return value.result === undefined ? null : normalizeCellValue(value.result);
  }

  if ('richText' in value) {
    return value.richText.map((run) => run.text).join('');
  }

  if ('hyperlink' in value) {
    return value.text;
  }

  // Error cells (#N/A, #DIV/0!, ...)
  return null;
}

export class ExcelConnector extends BaseFileConnector<ExcelConnectorConfig> {
  constructor(config: Omit<ExcelConnectorConfig, 'type'> & { type?: 'excel' }) {
    super({ ...config, type: 'excel' });
  }

  protected async parseFile(): Promise<Record[]> {
    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(this.config.filePath);

    const sheet = this.getSheet(workbook);
    if (!sheet) {
      throw new ConnectorError({
        code: 'NOT_FOUND',
        message: `Sheet not found: ${this.config.sheet ?? 'first sheet'}`,
        source: this.config.id,
        suggestion: 'Check that the sheet name/index is correct.',
      });
    }

    const startRow = this.config.startRow ?? 1;
    const startColumn = this.config.startColumn ?? 1;

    // Merged header cells repeat the master value; the first column keeps it
    const headers: string[] = [];
    const seen = new Set<string>();
    sheet.getRow(startRow).eachCell({ includeEmpty: false }, (cell, colNumber) => {
      if (colNumber < startColumn) return;
      const value = normalizeCellValue(cell.value);
      const header = value === null ? `Column${colNumber}` : String(value).trim();
      if (seen.has(header)) return;
      seen.add(header);
      headers[colNumber - startColumn] = header;
    });
    this.assertSafeHeaders([...seen], 'Excel');

    const records: Record[] = [];
    sheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
      if (rowNumber <= startRow) return;

      const record: Record = Object.create(null);
      let hasData = false;

      row.eachCell({ includeEmpty: true }, (cell, colNumber) => {
        if (colNumber < startColumn) return;

        const header = headers[colNumber - startColumn];
        if (!header) return;

        const value = normalizeCellValue(cell.value);
        if (value !== null && value !== '') {
          hasData = true;
        }
        record[header] = value;
      });

      if (hasData) {
        records.push(record);
      }
    });

    return records;
  }

  private getSheet(workbook: ExcelJS.Workbook): ExcelJS.Worksheet | undefined {
    if (this.config.sheet !== undefined) {
      return workbook.getWorksheet(this.config.sheet);
    }
    return workbook.worksheets[0];
  }
}

/**
 * Factory function to create an Excel connector
 */
export function createExcelConnector(
  config: Omit<ExcelConnectorConfig, 'type'>
): ExcelConnector {
  return new ExcelConnector(config);
}
