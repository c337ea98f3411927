/**
 * Session setup shared by the commands: config, logger, font, plugins.
 */

import { resolve } from 'path';
import {
  CompilationSession,
  ConfigError,
  InMemoryFont,
  MultiLogger,
  builtinPlugins,
  createLogger,
  loadConfig,
  loadFontDescription,
  type LayoutForgeConfig,
  type Logger,
} from '@layoutforge/core';
import { isLogLevel } from '@layoutforge/types';
import { loadCustomPlugins } from '../plugins/pluginLoader.js';

export interface SessionFlags {
  project?: string;
  font?: string;
  strict?: boolean;
  logLevel?: string;
  logFile?: string;
}

export interface OpenedSession {
  session: CompilationSession;
  config: LayoutForgeConfig;
  logger: Logger;
  projectPath: string;
  /** Flush the log file, if any */
  close(): Promise<void>;
}

/**
 * Resolve the font description: --font first, then `font` in config.yaml
 * (relative to the project root).
 */
export function fontPathFor(flags: SessionFlags, config: LayoutForgeConfig, projectPath: string): string {
  if (flags.font) {
    return resolve(flags.font);
  }
  if (config.font) {
    return resolve(projectPath, config.font);
  }
  throw new ConfigError(
    'No font description given',
    'ERR_FONT_INVALID',
    {},
    'Pass --font <file> or set font in .layoutforge/config.yaml'
  );
}

/**
 * @param requireFont - false for commands that never resolve glyphs
 */
export async function openSession(flags: SessionFlags, requireFont: boolean = true): Promise<OpenedSession> {
  const projectPath = resolve(flags.project ?? '.');
  const config = loadConfig(projectPath);

  const level = flags.logLevel ?? config.logLevel;
  if (!isLogLevel(level)) {
    throw new ConfigError(
      `Unknown log level "${level}"`,
      'ERR_CONFIG_INVALID',
      {},
      'Use one of: silent, errors, warnings, info, debug'
    );
  }
  const logger = createLogger(level, { logFile: flags.logFile });

  const font = requireFont ? loadFontDescription(fontPathFor(flags, config, projectPath)) : new InMemoryFont([]);

  const session = new CompilationSession({
    font,
    plugins: builtinPlugins(config.plugins),
    logger,
    strict: flags.strict ?? config.strict,
    includePaths: config.includePaths.map(path => resolve(projectPath, path)),
  });

  for (const { plugin } of await loadCustomPlugins(projectPath, session.diagnostics, logger)) {
    session.registerPlugin(plugin);
  }

  return {
    session,
    config,
    logger,
    projectPath,
    close: async () => {
      if (logger instanceof MultiLogger) {
        await logger.close();
      }
    },
  };
}
