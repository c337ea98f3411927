/**
 * Plugin loading - custom verb plugins from .layoutforge/plugins/
 *
 * Each .js or .mjs file is imported in name order. The plugin is the
 * module's default export, or its `plugin` export. Shape checks happen when
 * the session registers the plugin; this module only reports modules that
 * fail to load or export nothing usable.
 */

import { join } from 'path';
import { existsSync, readdirSync } from 'fs';
import { pathToFileURL } from 'url';
import { PluginError, type DiagnosticCollector, type Logger } from '@layoutforge/core';

export interface LoadedPlugin {
  file: string;
  plugin: unknown;
}

const PLUGIN_FILE = /\.m?js$/;

export function customPluginDirectory(projectPath: string): string {
  return join(projectPath, '.layoutforge', 'plugins');
}

/**
 * `default` wins over `plugin` when a module has both.
 */
export function pluginExport(module: unknown): unknown {
  if (typeof module !== 'object' || module === null) {
    return undefined;
  }
  if ('default' in module && module.default !== undefined) {
    return module.default;
  }
  if ('plugin' in module) {
    return module.plugin;
  }
  return undefined;
}

/**
 * Load custom plugins from .layoutforge/plugins/
 */
export async function loadCustomPlugins(
  projectPath: string,
  diagnostics: DiagnosticCollector,
  logger: Logger
): Promise<LoadedPlugin[]> {
  const pluginsDir = customPluginDirectory(projectPath);
  if (!existsSync(pluginsDir)) {
    return [];
  }

  const files = readdirSync(pluginsDir).filter(f => PLUGIN_FILE.test(f)).sort();
  const loaded: LoadedPlugin[] = [];

  for (const file of files) {
    const pluginPath = join(pluginsDir, file);
    let module: unknown;
    try {
      module = await import(pathToFileURL(pluginPath).href);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      fail(new PluginError(`Failed to load plugin ${file}: ${message}`, 'ERR_PLUGIN_LOAD', { file: pluginPath }), diagnostics, logger);
      continue;
    }

    const plugin = pluginExport(module);
    if (plugin === undefined) {
      fail(
        new PluginError(
          `Plugin module ${file} has no default or 'plugin' export`,
          'ERR_PLUGIN_LOAD',
          { file: pluginPath },
          'export default { name, options, grammar, verbs }'
        ),
        diagnostics,
        logger
      );
      continue;
    }

    logger.debug(`Loaded custom plugin module ${file}`);
    loaded.push({ file: pluginPath, plugin });
  }

  return loaded;
}

function fail(error: PluginError, diagnostics: DiagnosticCollector, logger: Logger): void {
  diagnostics.addFromError(error);
  logger.warn(error.message);
}
