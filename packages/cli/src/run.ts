/**
 * Reconciliation pipeline behind the termrecon command
 */

import { resolve } from 'node:path';
import { ConnectorError, Logger } from '@termrecon/core';
import { loadBookingRecords, loadTermSheet } from '@termrecon/connector-file';
import {
  ReconciliationError,
  createReconciliationEngine,
  formatConsoleSummary,
  summarizeBookings,
} from '@termrecon/recon-core';
import { loadConfig, type ConfigFile } from './config.js';
import { writeReports, type WrittenReport } from './report-writer.js';
import type { CliArgs } from './args.js';

export const DEFAULT_OUTPUT_DIR = 'outputs';

export interface RunIo {
  /** Report summary sink (default: process.stdout) */
  stdout?: (text: string) => void;
  /** Diagnostics (default: built from the config file and --verbose) */
  logger?: Logger;
}

export interface RunOutcome {
  exitCode: 0 | 1;
  reports: WrittenReport[];
}

function createLogger(config: ConfigFile, verbose: boolean): Logger {
  return new Logger({
    level: verbose ? 'debug' : config.logging?.level,
    format: config.logging?.format,
  });
}

function describeError(error: unknown): { [key: string]: unknown } {
  if (error instanceof ConnectorError || error instanceof ReconciliationError) {
    return error.toJSON();
  }
  return { error };
}

/**
 * Load, reconcile, write reports and print the summary.
 *
 * Never throws: every failure is logged and reported as exit code 1.
 */
export async function runReconciliation(args: CliArgs, io: RunIo = {}): Promise<RunOutcome> {
  const stdout = io.stdout ?? ((text: string) => process.stdout.write(`${text}\n`));
  let logger = io.logger ?? new Logger();

  try {
    const config: ConfigFile = args.configPath ? await loadConfig(args.configPath) : {};
    logger = io.logger ?? createLogger(config, args.verbose);

    const termSheetPath = resolve(process.cwd(), args.termSheetPath);
    const bookingsPath = resolve(process.cwd(), args.bookingsPath);

    const termSheet = await loadTermSheet(termSheetPath);
    logger.info('Loaded term sheet', {
      file: args.termSheetPath,
      fields: Object.keys(termSheet).length,
    });

    const bookings = await loadBookingRecords(bookingsPath, {
      ...(config.bookings ?? {}),
      tradeIdFields: config.reconciliation?.tradeIdFields,
      logger,
    });
    if (bookings.length === 0) {
      logger.error('No booking records loaded', { file: args.bookingsPath });
      return { exitCode: 1, reports: [] };
    }

    const summary = summarizeBookings(bookings, config.reconciliation);
    logger.info('Booking data summary', { ...summary });

    const engine = createReconciliationEngine({ config: config.reconciliation, logger });
    const results = engine.reconcile(termSheet, bookings);
    if (results.length === 0) {
      logger.error('No reconciliation results generated');
      return { exitCode: 1, reports: [] };
    }

    const reports = await writeReports(results, {
      outputDir: resolve(process.cwd(), args.outputDir ?? config.output?.dir ?? DEFAULT_OUTPUT_DIR),
      termSheetPath,
      bookingsPath,
      formats: config.output?.formats,
    });
    for (const report of reports) {
      logger.info(`Wrote ${report.format} report`, { path: report.path });
    }

    stdout(formatConsoleSummary(results));
    return { exitCode: 0, reports };
  } catch (error) {
    logger.error('Reconciliation failed', describeError(error));
    return { exitCode: 1, reports: [] };
  }
}
