/**
 * Classes command - print the named glyph classes a rule file defines
 */

import { Command } from 'commander';
import type { FontFeatures } from '@layoutforge/core';
import { exitWithFailure } from '../utils/errorFormatter.js';
import { CompileFailure, compileRules, type CompileOptions } from './compile.js';

/**
 * `@name = a b c`, one line per class in definition order.
 */
export function renderClasses(features: FontFeatures): string[] {
  return [...features.namedClasses].map(([name, glyphs]) => `@${name} = ${glyphs.join(' ')}`);
}

export const classesCommand = new Command('classes')
  .description('Print the glyph classes defined by a rule file')
  .argument('<rules>', 'Rule file to compile')
  .option('-p, --project <path>', 'Project path (for .layoutforge/config.yaml)', '.')
  .option('-f, --font <file>', 'Font description (YAML or JSON)')
  .option('-j, --json', 'Output as JSON')
  .option('-l, --log-level <level>', 'silent, errors, warnings, info or debug')
  .action(async (rules: string, options: CompileOptions) => {
    try {
      const { opened } = await compileRules(rules, options);
      const features = opened.session.fontFeatures;
      if (options.json) {
        console.log(JSON.stringify(Object.fromEntries(features.namedClasses), null, 2));
      } else {
        for (const line of renderClasses(features)) {
          console.log(line);
        }
      }
      await opened.close();
    } catch (err) {
      exitWithFailure(err instanceof CompileFailure ? err.reason : err);
    }
  });
