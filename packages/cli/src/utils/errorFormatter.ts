/**
 * Standardized error formatting for CLI commands
 *
 * Format:
 *   ✗ Main error message (1 line, concise)
 *
 *   → Next action 1
 *   → Next action 2
 */

import { LayoutError } from '@layoutforge/core';

/**
 * Lines printed for an error: the title, then one `→` line per step.
 */
export function formatError(title: string, nextSteps: readonly string[] = []): string[] {
  const lines = [`✗ ${title}`];
  if (nextSteps.length > 0) {
    lines.push('');
    for (const step of nextSteps) {
      lines.push(`→ ${step}`);
    }
  }
  return lines;
}

/**
 * Print a standardized error message and exit.
 *
 * @example
 * exitWithError('Font description not found', [
 *   'Pass --font <file> or set font in .layoutforge/config.yaml'
 * ]);
 */
export function exitWithError(title: string, nextSteps?: string[]): never {
  for (const line of formatError(title, nextSteps)) {
    console.error(line);
  }
  process.exit(1);
}

/**
 * Exit for anything thrown by a command. Compiler errors carry their own
 * suggestion; anything else is reported by message.
 */
export function exitWithFailure(err: unknown): never {
  if (err instanceof LayoutError) {
    exitWithError(`${err.code}: ${err.message}`, err.suggestion ? [err.suggestion] : []);
  }
  exitWithError(err instanceof Error ? err.message : String(err));
}
