/**
 * @termrecon/cli
 *
 * Configuration loading, report writing and the reconciliation pipeline used
 * by the termrecon command
 */

export {
  ConfigError,
  configFileSchema,
  reportFormatSchema,
  expandEnvVars,
  formatZodError,
  parseConfig,
  loadConfig,
} from './config.js';
export type { ConfigFile, ReportFormat, EnvExpansionOptions } from './config.js';

export {
  writeReports,
  reportBaseName,
  DEFAULT_REPORT_FORMATS,
} from './report-writer.js';
export type { ReportWriteOptions, WrittenReport } from './report-writer.js';

export { parseCliArgs, USAGE } from './args.js';
export type { CliArgs, ParsedArgs } from './args.js';

export { runReconciliation, DEFAULT_OUTPUT_DIR } from './run.js';
export type { RunIo, RunOutcome } from './run.js';
