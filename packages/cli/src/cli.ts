#!/usr/bin/env -S node --import tsx
/**
 * @layoutforge/cli - command line for the layoutforge rule compiler
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import { initCommand } from './commands/init.js';
import { compileCommand } from './commands/compile.js';
import { classesCommand } from './commands/classes.js';
import { verbsCommand } from './commands/verbs.js';

// Read version from package.json
const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));
const version = typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
  ? pkg.version
  : '0.0.0';

const program = new Command();

program
  .name('layoutforge')
  .description('Font layout rule compiler')
  .version(version);

program.addCommand(initCommand);
program.addCommand(compileCommand);
program.addCommand(classesCommand);
program.addCommand(verbsCommand);

await program.parseAsync();
