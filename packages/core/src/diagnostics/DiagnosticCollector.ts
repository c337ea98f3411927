/**
 * DiagnosticCollector - Collects diagnostics produced while compiling
 *
 * Converts LayoutError instances (with code, severity and location) and
 * plain Error instances (treated as generic errors) into unified Diagnostic
 * entries. Debug verbs add 'info' entries directly.
 *
 * Usage:
 *   const collector = new DiagnosticCollector();
 *   collector.addFromError(new UnknownVerbWarning('Frobnicate', { line: 3 }));
 *
 *   if (collector.hasWarnings()) {
 *     console.error(new DiagnosticReporter(collector).report({ format: 'text' }));
 *   }
 */

import { LayoutError } from '../errors/LayoutError.js';

/**
 * Diagnostic entry - unified format for all errors, warnings and debug output
 */
export interface Diagnostic {
  code: string;
  severity: 'fatal' | 'error' | 'warning' | 'info';
  message: string;
  file?: string;
  line?: number;
  column?: number;
  verb?: string;
  timestamp: number;
  suggestion?: string;
}

/**
 * Diagnostic input (without timestamp, which is auto-generated)
 */
export type DiagnosticInput = Omit<Diagnostic, 'timestamp'>;

function numberOrUndefined(value: unknown): number | undefined {
  return typeof value === 'number' ? value : undefined;
}

function stringOrUndefined(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export class DiagnosticCollector {
  private diagnostics: Diagnostic[] = [];

  /**
   * Add an error or warning.
   *
   * LayoutError instances provide code, severity, location and suggestion.
   * Plain Error instances become 'error' diagnostics with code 'ERR_UNKNOWN'.
   */
  addFromError(error: Error, verb?: string): void {
    if (error instanceof LayoutError) {
      this.add({
        code: error.code,
        severity: error.severity,
        message: error.message,
        file: stringOrUndefined(error.context.file),
        line: numberOrUndefined(error.context.line),
        column: numberOrUndefined(error.context.column),
        verb: verb ?? stringOrUndefined(error.context.verb),
        suggestion: error.suggestion,
      });
    } else {
      this.add({
        code: 'ERR_UNKNOWN',
        severity: 'error',
        message: error.message,
        verb,
      });
    }
  }

  /**
   * Add a diagnostic directly. Timestamp is set automatically.
   */
  add(diagnostic: DiagnosticInput): void {
    this.diagnostics.push({
      ...diagnostic,
      timestamp: Date.now(),
    });
  }

  /**
   * All diagnostics in the order they were reported (a copy).
   */
  getAll(): Diagnostic[] {
    return [...this.diagnostics];
  }

  getByCode(code: string): Diagnostic[] {
    return this.diagnostics.filter(d => d.code === code);
  }

  getByVerb(verb: string): Diagnostic[] {
    return this.diagnostics.filter(d => d.verb === verb);
  }

  getBySeverity(severity: Diagnostic['severity']): Diagnostic[] {
    return this.diagnostics.filter(d => d.severity === severity);
  }

  hasFatal(): boolean {
    return this.diagnostics.some(d => d.severity === 'fatal');
  }

  /**
   * Check if any error (including fatal) exists.
   */
  hasErrors(): boolean {
    return this.diagnostics.some(d => d.severity === 'error' || d.severity === 'fatal');
  }

  hasWarnings(): boolean {
    return this.diagnostics.some(d => d.severity === 'warning');
  }

  count(): number {
    return this.diagnostics.length;
  }

  /**
   * Format diagnostics as JSON lines (one JSON object per line).
   */
  toDiagnosticsLog(): string {
    return this.diagnostics.map(d => JSON.stringify(d)).join('\n');
  }

  clear(): void {
    this.diagnostics = [];
  }
}
