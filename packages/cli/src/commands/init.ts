/**
 * Init command - write a default .layoutforge/config.yaml
 */

import { Command } from 'commander';
import { resolve, join } from 'path';
import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { stringify as stringifyYAML } from 'yaml';
import { DEFAULT_CONFIG } from '@layoutforge/core';

/**
 * Generate config.yaml content. Optional keys are left as comments.
 */
export function generateConfigYAML(): string {
  const config = {
    version: DEFAULT_CONFIG.version,
    plugins: DEFAULT_CONFIG.plugins,
    strict: DEFAULT_CONFIG.strict,
    logLevel: DEFAULT_CONFIG.logLevel,
    includePaths: DEFAULT_CONFIG.includePaths,
  };

  const yaml = stringifyYAML(config, {
    lineWidth: 0, // Don't wrap long lines
  });

  return `# layoutforge configuration

${yaml}
# Font description used when --font is not given
# font: fonts/MyFont.glyphs.yaml
#
# Custom verb plugins: .js or .mjs modules in .layoutforge/plugins/
`;
}

export interface InitResult {
  configPath: string;
  written: boolean;
}

/**
 * Write the config unless one exists; `force` overwrites.
 */
export function initProject(projectPath: string, force: boolean = false): InitResult {
  const configDir = join(projectPath, '.layoutforge');
  const configPath = join(configDir, 'config.yaml');

  if (existsSync(configPath) && !force) {
    return { configPath, written: false };
  }

  mkdirSync(join(configDir, 'plugins'), { recursive: true });
  writeFileSync(configPath, generateConfigYAML());
  return { configPath, written: true };
}

export const initCommand = new Command('init')
  .description('Initialize layoutforge in a project')
  .argument('[path]', 'Project path', '.')
  .option('-f, --force', 'Overwrite existing config')
  .addHelpText('after', `
Examples:
  layoutforge init                   Initialize in current directory
  layoutforge init ./my-font         Initialize in specific directory
  layoutforge init --force           Overwrite existing configuration
`)
  .action((path: string, options: { force?: boolean }) => {
    const result = initProject(resolve(path), options.force === true);
    if (!result.written) {
      console.log('✓ layoutforge already initialized');
      console.log('  → Use --force to overwrite config');
      return;
    }
    console.log('✓ Created .layoutforge/config.yaml');
    console.log('');
    console.log('Next steps:');
    console.log('  1. Set font: in .layoutforge/config.yaml');
    console.log('  2. Compile:  layoutforge compile rules.fee');
  });
