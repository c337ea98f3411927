/**
 * Verbs command - list the verbs available to rule files
 */

import { Command } from 'commander';
import type { VerbInfo } from '@layoutforge/core';
import { exitWithFailure } from '../utils/errorFormatter.js';
import { openSession } from '../utils/session.js';

/**
 * Aligned table: verb, providing plugin, and `{ }` for block verbs.
 */
export function renderVerbs(verbs: readonly VerbInfo[]): string[] {
  const width = Math.max(0, ...verbs.map(v => v.verb.length));
  return verbs.map(v => `${v.verb.padEnd(width)}  ${v.plugin}${v.block ? '  { }' : ''}`);
}

export const verbsCommand = new Command('verbs')
  .description('List registered verbs and the plugin providing each')
  .option('-p, --project <path>', 'Project path (for .layoutforge/config.yaml)', '.')
  .option('-j, --json', 'Output as JSON')
  .action(async (options: { project: string; json?: boolean }) => {
    try {
      const opened = await openSession({ project: options.project, logLevel: 'warnings' }, false);
      const verbs = opened.session.verbs();
      if (options.json) {
        console.log(JSON.stringify(verbs, null, 2));
      } else {
        for (const line of renderVerbs(verbs)) {
          console.log(line);
        }
      }
      await opened.close();
    } catch (err) {
      exitWithFailure(err);
    }
  });
