/**
 * Barrel exports for the reporter modules.
 */

export {
  buildAnalysisReport,
  generateJsonReport,
  writeAnalysisReport,
  processingTimeMs,
  type AnalysisReport,
  type ReportOptions,
} from './json-reporter.js';

export { formatSummaryTable, printSummary } from './summary-reporter.js';
