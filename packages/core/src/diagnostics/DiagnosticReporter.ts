/**
 * DiagnosticReporter - Formats diagnostics for output
 *
 * Supports two output formats:
 * - text: Human-readable, one line per diagnostic with location
 * - json: Machine-readable JSON for CI integration
 *
 * Usage:
 *   const reporter = new DiagnosticReporter(collector);
 *   console.error(reporter.report({ format: 'text', includeSummary: true }));
 */

import { formatLocation } from '@layoutforge/types';
import type { Diagnostic, DiagnosticCollector } from './DiagnosticCollector.js';

export interface ReportOptions {
  format: 'text' | 'json';
  includeSummary?: boolean;
  /** Leave out 'info' diagnostics (ShowClass output and the like) */
  excludeInfo?: boolean;
}

export interface SummaryStats {
  total: number;
  fatal: number;
  errors: number;
  warnings: number;
  info: number;
}

const SEVERITY_LABELS: Record<Diagnostic['severity'], string> = {
  fatal: 'FATAL',
  error: 'ERROR',
  warning: 'WARN',
  info: 'INFO',
};

export class DiagnosticReporter {
  constructor(private collector: DiagnosticCollector) {}

  report(options: ReportOptions): string {
    const diagnostics = this.collector
      .getAll()
      .filter(d => !(options.excludeInfo && d.severity === 'info'));

    if (options.format === 'json') {
      return this.jsonReport(diagnostics, options);
    }
    return this.textReport(diagnostics, options);
  }

  /**
   * Human-readable summary of diagnostic counts. Info entries are not issues.
   */
  summary(): string {
    const stats = this.getStats();
    const parts: string[] = [];

    if (stats.fatal > 0) {
      parts.push(`Fatal: ${stats.fatal}`);
    }
    if (stats.errors > 0) {
      parts.push(`Errors: ${stats.errors}`);
    }
    if (stats.warnings > 0) {
      parts.push(`Warnings: ${stats.warnings}`);
    }

    return parts.length > 0 ? parts.join(', ') : 'No issues found.';
  }

  getStats(): SummaryStats {
    const diagnostics = this.collector.getAll();
    return {
      total: diagnostics.length,
      fatal: diagnostics.filter(d => d.severity === 'fatal').length,
      errors: diagnostics.filter(d => d.severity === 'error').length,
      warnings: diagnostics.filter(d => d.severity === 'warning').length,
      info: diagnostics.filter(d => d.severity === 'info').length,
    };
  }

  private textReport(diagnostics: Diagnostic[], options: ReportOptions): string {
    const lines = diagnostics.map(d => this.formatDiagnostic(d));

    if (options.includeSummary) {
      if (lines.length > 0) {
        lines.push('');
      }
      lines.push(this.summary());
    }

    return lines.join('\n');
  }

  private jsonReport(diagnostics: Diagnostic[], options: ReportOptions): string {
    const result: { diagnostics: Diagnostic[]; summary?: SummaryStats } = { diagnostics };
    if (options.includeSummary) {
      result.summary = this.getStats();
    }
    return JSON.stringify(result, null, 2);
  }

  /**
   * `[WARN] WARN_UNKNOWN_VERB rules.fee:3:1 Unknown verb 'Frobnicate'`
   */
  formatDiagnostic(diagnostic: Diagnostic): string {
    const parts = [`[${SEVERITY_LABELS[diagnostic.severity]}]`, diagnostic.code];

    if (diagnostic.line !== undefined) {
      parts.push(formatLocation({ file: diagnostic.file, line: diagnostic.line, column: diagnostic.column ?? 1 }));
    } else if (diagnostic.file) {
      parts.push(diagnostic.file);
    }
    parts.push(diagnostic.message);

    let text = parts.join(' ');
    if (diagnostic.suggestion) {
      text += `\n  Suggestion: ${diagnostic.suggestion}`;
    }
    return text;
  }
}
