/**
 * Writes reconciliation reports next to each other in one output directory
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import {
  ReconciliationError,
  formatCsvReport,
  formatMarkdownReport,
  type ReconciliationResult,
} from '@termrecon/recon-core';
import type { ReportFormat } from './config.js';

export interface ReportWriteOptions {
  outputDir: string;
  termSheetPath: string;
  bookingsPath: string;
  formats?: readonly ReportFormat[];
}

export interface WrittenReport {
  format: ReportFormat;
  path: string;
}

export const DEFAULT_REPORT_FORMATS: readonly ReportFormat[] = ['csv', 'markdown'];

const EXTENSIONS: { readonly [F in ReportFormat]: string } = {
  csv: '.csv',
  markdown: '.md',
};

function stem(filePath: string): string {
  return basename(filePath, extname(filePath));
}

/** "reconciliation_<termSheetStem>_<bookingStem>" */
export function reportBaseName(termSheetPath: string, bookingsPath: string): string {
  return `reconciliation_${stem(termSheetPath)}_${stem(bookingsPath)}`;
}

function render(
  format: ReportFormat,
  results: readonly ReconciliationResult[],
  options: ReportWriteOptions
): string {
  switch (format) {
    case 'csv':
      return formatCsvReport(results);
    case 'markdown':
      return formatMarkdownReport(results, {
        termSheetFile: basename(options.termSheetPath),
        bookingFile: basename(options.bookingsPath),
      });
  }
}

/**
 * @throws ReconciliationError REPORT_FAILED when the directory or a file cannot be written
 */
export async function writeReports(
  results: readonly ReconciliationResult[],
  options: ReportWriteOptions
): Promise<WrittenReport[]> {
  const base = reportBaseName(options.termSheetPath, options.bookingsPath);
  const written: WrittenReport[] = [];

  try {
    await mkdir(options.outputDir, { recursive: true });
    for (const format of options.formats ?? DEFAULT_REPORT_FORMATS) {
      const path = join(options.outputDir, `${base}${EXTENSIONS[format]}`);
      await writeFile(path, render(format, results, options), 'utf-8');
      written.push({ format, path });
    }
  } catch (error) {
    throw new ReconciliationError({
      code: 'REPORT_FAILED',
      message: `Failed to write reports: ${error instanceof Error ? error.message : String(error)}`,
      suggestion: 'Check that the output directory is writable.',
      cause: error instanceof Error ? error : undefined,
      context: { outputDir: options.outputDir },
    });
  }

  return written;
}
