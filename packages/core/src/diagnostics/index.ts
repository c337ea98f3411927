/**
 * Diagnostics - collection and reporting of compiler errors, warnings and debug output
 */

export { DiagnosticCollector } from './DiagnosticCollector.js';
export type { Diagnostic, DiagnosticInput } from './DiagnosticCollector.js';

export { DiagnosticReporter } from './DiagnosticReporter.js';
export type { ReportOptions, SummaryStats } from './DiagnosticReporter.js';
