/**
 * Formatters for reconciliation results
 */

export { formatCsvReport, CSV_REPORT_COLUMNS } from './csv-report.js';
export { formatMarkdownReport } from './markdown-report.js';
export type { MarkdownReportOptions } from './markdown-report.js';
export { formatConsoleSummary } from './console-summary.js';
export { formatValue, formatPercent, formatTradeId } from './utils.js';
