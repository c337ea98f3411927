/**
 * @layoutforge/core - rule compiler for font layout
 */

// Error types
export {
  LayoutError,
  GrammarError,
  RuleSyntaxError,
  UndefinedReferenceError,
  UnknownMetricError,
  ResolutionError,
  ConfigError,
  FileAccessError,
  PluginError,
  MissingGlyphWarning,
  MissingAnchorWarning,
  UnknownVerbWarning,
} from './errors/LayoutError.js';
export type { ErrorContext, ErrorSeverity, LayoutErrorJSON, ReferenceKind } from './errors/LayoutError.js';

// Logging
export { ConsoleLogger, MemoryLogger, FileLogger, MultiLogger, createLogger, formatLogMessage } from './logging/Logger.js';
export type { Logger, LogLevel, LogEntry } from './logging/Logger.js';

// Diagnostics
export { DiagnosticCollector, DiagnosticReporter } from './diagnostics/index.js';
export type { Diagnostic, DiagnosticInput, ReportOptions, SummaryStats } from './diagnostics/index.js';

// Config
export { loadConfig, validateVersion, validateStringList, DEFAULT_CONFIG, BUILTIN_PLUGIN_NAMES } from './config/index.js';
export type { LayoutForgeConfig } from './config/index.js';
export { LAYOUTFORGE_VERSION, getSchemaVersion } from './version.js';

// Font model
export { InMemoryFont, loadFontDescription, parseFontDescription } from './font/index.js';
export type { GlyphDescription } from './font/index.js';

// IR
export * from './ir/index.js';

// Selectors and class algebra
export * from './selectors/index.js';
export * from './classes/index.js';

// Grammar
export * from './grammar/index.js';

// Compilation
export * from './compiler/index.js';

// Plugins
export * from './plugins/index.js';
