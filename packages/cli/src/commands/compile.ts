/**
 * Compile command - compile a rule file and print the resulting layout
 */

import { Command } from 'commander';
import { resolve } from 'path';
import {
  DiagnosticReporter,
  describeRule,
  type FontFeatures,
  type Routine,
  type StatementOutcome,
} from '@layoutforge/core';
import { exitWithFailure } from '../utils/errorFormatter.js';
import { openSession, type OpenedSession, type SessionFlags } from '../utils/session.js';

export interface CompileOptions extends SessionFlags {
  json?: boolean;
}

export interface CompileResult {
  opened: OpenedSession;
  outcomes: StatementOutcome[];
}

export class CompileFailure extends Error {
  constructor(readonly opened: OpenedSession, readonly reason: unknown) {
    super(reason instanceof Error ? reason.message : String(reason));
    this.name = 'CompileFailure';
  }
}

/**
 * Open a session and compile one rule file. A compile error is rethrown as
 * CompileFailure, which carries the session so its diagnostics can still
 * be printed.
 */
export async function compileRules(rulesPath: string, options: SessionFlags): Promise<CompileResult> {
  const opened = await openSession(options);
  try {
    const outcomes = opened.session.compileFile(resolve(rulesPath));
    return { opened, outcomes };
  } catch (err) {
    await opened.close();
    throw new CompileFailure(opened, err);
  }
}

function routineLabel(features: FontFeatures, routine: Routine): string {
  return routine.name ?? `#${features.routines.indexOf(routine)}`;
}

/**
 * Text rendering of the IR: class count, routines with their rules, then
 * the feature table.
 */
export function renderFeatures(features: FontFeatures): string[] {
  const lines = [`Classes: ${features.namedClasses.size}`, '', 'Routines:'];

  if (features.routines.length === 0) {
    lines.push('  (none)');
  }
  for (const routine of features.routines) {
    const flags = routine.flags !== 0 ? ` flags=${routine.flags}` : '';
    lines.push(`  ${routineLabel(features, routine)}${flags}`);
    for (const rule of routine.rules) {
      lines.push(`    ${describeRule(rule)}`);
    }
  }

  lines.push('', 'Features:');
  if (features.features.size === 0) {
    lines.push('  (none)');
  }
  for (const [tag, routines] of features.features) {
    lines.push(`  ${tag}: ${routines.map(r => routineLabel(features, r)).join(', ')}`);
  }
  return lines;
}

function printResult(opened: OpenedSession, json: boolean): void {
  const { session } = opened;
  if (json) {
    console.log(JSON.stringify({ ...session.fontFeatures.toJSON(), diagnostics: session.diagnostics.getAll() }, null, 2));
    return;
  }

  for (const line of renderFeatures(session.fontFeatures)) {
    console.log(line);
  }
  console.log('');
  console.log(new DiagnosticReporter(session.diagnostics).report({ format: 'text', includeSummary: true }));
}

export const compileCommand = new Command('compile')
  .description('Compile a rule file against a font description')
  .argument('<rules>', 'Rule file to compile')
  .option('-p, --project <path>', 'Project path (for .layoutforge/config.yaml)', '.')
  .option('-f, --font <file>', 'Font description (YAML or JSON)')
  .option('-j, --json', 'Output as JSON')
  .option('--strict', 'Treat missing glyphs as errors')
  .option('-l, --log-level <level>', 'silent, errors, warnings, info or debug')
  .option('--log-file <path>', 'Also write a debug log to this file')
  .addHelpText('after', `
Examples:
  layoutforge compile rules.fee --font MyFont.yaml
  layoutforge compile rules.fee --json > features.json
  layoutforge compile rules.fee --strict --log-level debug
`)
  .action(async (rules: string, options: CompileOptions) => {
    let result: CompileResult;
    try {
      result = await compileRules(rules, options);
    } catch (err) {
      if (err instanceof CompileFailure) {
        printResult(err.opened, options.json === true);
        exitWithFailure(err.reason);
      }
      exitWithFailure(err);
    }

    printResult(result.opened, options.json === true);
    await result.opened.close();
    if (result.opened.session.diagnostics.hasErrors()) {
      process.exit(1);
    }
  });
