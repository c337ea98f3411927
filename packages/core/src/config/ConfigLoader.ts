import { readFileSync, existsSync } from 'fs';
import { join } from 'path';
import { parse as parseYAML } from 'yaml';
import { isLogLevel, type LogLevel } from '@layoutforge/types';
import { ConfigError } from '../errors/LayoutError.js';
import { LAYOUTFORGE_VERSION, getSchemaVersion } from '../version.js';

/**
 * Project configuration.
 *
 * YAML Location: .layoutforge/config.yaml
 *
 * Example config.yaml:
 *
 * ```yaml
 * version: "0.3.0"
 * # Built-in verb plugins to register (default: all)
 * plugins:
 *   - ClassDefinition
 *   - Debug
 *   - Substitute
 * # Missing glyphs abort compilation instead of warning
 * strict: false
 * logLevel: info
 * # Searched after the including file's directory
 * includePaths:
 *   - shared/rules
 * # Glyph description used when --font is not given
 * font: fonts/MyFont.glyphs.yaml
 * ```
 */
export interface LayoutForgeConfig {
  /**
   * Config schema version (major.minor.patch, no pre-release tag).
   * If omitted, no version check is performed.
   */
  version?: string;

  /** Built-in plugin names, in registration order */
  plugins: string[];

  strict: boolean;

  logLevel: LogLevel;

  /** Directories searched by Include, relative to the project root */
  includePaths: string[];

  /** Font description file, relative to the project root */
  font?: string;
}

export const BUILTIN_PLUGIN_NAMES: readonly string[] = [
  'ClassDefinition',
  'Debug',
  'Variables',
  'Feature',
  'Routine',
  'Substitute',
  'Position',
  'Chain',
  'Attach',
  'Include',
  'Conditional',
];

export const DEFAULT_CONFIG: LayoutForgeConfig = {
  version: getSchemaVersion(LAYOUTFORGE_VERSION),
  plugins: [...BUILTIN_PLUGIN_NAMES],
  strict: false,
  logLevel: 'info',
  includePaths: [],
};

/**
 * Load config from project directory.
 *
 * YAML syntax errors are logged and defaults are returned. Validation
 * failures (wrong types, incompatible version, unknown plugin) throw
 * ConfigError.
 *
 * @param projectPath - Absolute path to project root
 * @param logger - Optional logger for warnings (defaults to console.warn)
 */
export function loadConfig(
  projectPath: string,
  logger: { warn: (msg: string) => void } = console
): LayoutForgeConfig {
  const configPath = join(projectPath, '.layoutforge', 'config.yaml');

  if (!existsSync(configPath)) {
    return DEFAULT_CONFIG;
  }

  let parsed: unknown;
  try {
    parsed = parseYAML(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.warn(`Failed to parse config.yaml: ${error.message}`);
    logger.warn('Using default configuration');
    return DEFAULT_CONFIG;
  }

  // An empty file parses to null
  if (parsed === null || parsed === undefined) {
    return DEFAULT_CONFIG;
  }
  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError('Config error: config.yaml must contain a mapping', 'ERR_CONFIG_INVALID', { file: configPath });
  }

  // Outside try-catch: config errors MUST throw
  const user = validateConfig(parsed, configPath);
  return mergeConfig(DEFAULT_CONFIG, user);
}

/**
 * Validate config version compatibility with the running version.
 * THROWS on error.
 *
 * @param configVersion - Version string from config file (may be undefined)
 * @param currentVersion - Override for testing (defaults to LAYOUTFORGE_VERSION)
 */
export function validateVersion(configVersion: unknown, currentVersion?: string): void {
  if (configVersion === undefined || configVersion === null) {
    return;
  }

  if (typeof configVersion !== 'string') {
    throw new ConfigError(`Config error: version must be a string, got ${typeof configVersion}`);
  }

  if (!configVersion.trim()) {
    throw new ConfigError('Config error: version cannot be empty');
  }

  const current = currentVersion ?? LAYOUTFORGE_VERSION;
  const configSchema = getSchemaVersion(configVersion);
  const currentSchema = getSchemaVersion(current);

  if (configSchema !== currentSchema) {
    throw new ConfigError(
      `Config error: config version "${configVersion}" is not compatible with ` +
      `layoutforge ${current}. Expected "${currentSchema}".`,
      'ERR_CONFIG_INVALID',
      {},
      'Run: layoutforge init --force  (to regenerate config for current version)'
    );
  }
}

/**
 * Validate an optional list of non-empty strings. THROWS on error.
 */
export function validateStringList(value: unknown, field: string): string[] | undefined {
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new ConfigError(`Config error: ${field} must be an array, got ${typeof value}`);
  }

  const result: string[] = [];
  for (let i = 0; i < value.length; i++) {
    const item: unknown = value[i];
    if (typeof item !== 'string') {
      throw new ConfigError(`Config error: ${field}[${i}] must be a string, got ${typeof item}`);
    }
    if (!item.trim()) {
      throw new ConfigError(`Config error: ${field}[${i}] cannot be empty or whitespace-only`);
    }
    result.push(item);
  }
  return result;
}

function validateConfig(raw: object, configPath: string): Partial<LayoutForgeConfig> {
  const fields = new Map<string, unknown>(Object.entries(raw));
  const user: Partial<LayoutForgeConfig> = {};

  const version = fields.get('version');
  validateVersion(version);
  if (typeof version === 'string') {
    user.version = version;
  }

  const plugins = validateStringList(fields.get('plugins'), 'plugins');
  if (plugins) {
    for (const name of plugins) {
      if (!BUILTIN_PLUGIN_NAMES.includes(name)) {
        throw new ConfigError(
          `Config error: unknown plugin "${name}"`,
          'ERR_CONFIG_INVALID',
          { file: configPath },
          `Available plugins: ${BUILTIN_PLUGIN_NAMES.join(', ')}. Custom plugins go in .layoutforge/plugins/`
        );
      }
    }
    user.plugins = plugins;
  }

  const strict = fields.get('strict');
  if (strict !== undefined && strict !== null) {
    if (typeof strict !== 'boolean') {
      throw new ConfigError(`Config error: strict must be a boolean, got ${typeof strict}`);
    }
    user.strict = strict;
  }

  const logLevel = fields.get('logLevel');
  if (logLevel !== undefined && logLevel !== null) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigError(
        `Config error: logLevel must be one of silent, errors, warnings, info, debug, got "${String(logLevel)}"`
      );
    }
    user.logLevel = logLevel;
  }

  const includePaths = validateStringList(fields.get('includePaths'), 'includePaths');
  if (includePaths) {
    user.includePaths = includePaths;
  }

  const font = fields.get('font');
  if (font !== undefined && font !== null) {
    if (typeof font !== 'string' || !font.trim()) {
      throw new ConfigError('Config error: font must be a non-empty string');
    }
    user.font = font;
  }

  return user;
}

/**
 * Merge user config with defaults. User values take precedence.
 */
function mergeConfig(defaults: LayoutForgeConfig, user: Partial<LayoutForgeConfig>): LayoutForgeConfig {
  return {
    version: user.version ?? defaults.version,
    plugins: user.plugins ?? defaults.plugins,
    strict: user.strict ?? defaults.strict,
    logLevel: user.logLevel ?? defaults.logLevel,
    includePaths: user.includePaths ?? defaults.includePaths,
    font: user.font ?? defaults.font,
  };
}
