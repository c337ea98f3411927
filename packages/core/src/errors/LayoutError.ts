/**
 * LayoutError - Error hierarchy for the rule compiler
 *
 * All errors extend the native JavaScript Error class so callers can catch
 * them alongside plain errors.
 *
 * Error types:
 * - GrammarError: Grammar fragment failed to compose (fatal)
 * - RuleSyntaxError: Statement arguments do not match the verb's grammar (fatal)
 * - UndefinedReferenceError: Unknown class, routine or variable (fatal)
 * - UnknownMetricError: Metric name outside the metric vocabulary (fatal)
 * - ResolutionError: Selector cannot be resolved against the font (fatal)
 * - ConfigError: Configuration parsing/validation errors (fatal)
 * - FileAccessError: Unreadable rule files, include cycles (error)
 * - PluginError: Plugin module rejected at registration or load (error)
 * - MissingGlyphWarning: Selector named glyphs the font lacks (warning)
 * - UnknownVerbWarning: Statement used an unregistered verb (warning)
 * - MissingAnchorWarning: Attach named an anchor a glyph lacks (warning)
 */

export type ErrorSeverity = 'fatal' | 'error' | 'warning';

/**
 * Context for error reporting
 */
export interface ErrorContext {
  file?: string;
  line?: number;
  column?: number;
  verb?: string;
  [key: string]: unknown;
}

/**
 * JSON representation of LayoutError
 */
export interface LayoutErrorJSON {
  code: string;
  severity: ErrorSeverity;
  message: string;
  context: ErrorContext;
  suggestion?: string;
}

/**
 * Abstract base class for all compiler errors.
 */
export abstract class LayoutError extends Error {
  abstract readonly code: string;
  abstract readonly severity: ErrorSeverity;
  readonly context: ErrorContext;
  readonly suggestion?: string;

  constructor(message: string, context: ErrorContext = {}, suggestion?: string) {
    super(message);
    this.name = this.constructor.name;
    this.context = context;
    this.suggestion = suggestion;

    // Ensure proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for the diagnostics log
   */
  toJSON(): LayoutErrorJSON {
    return {
      code: this.code,
      severity: this.severity,
      message: this.message,
      context: this.context,
      suggestion: this.suggestion,
    };
  }
}

/**
 * Grammar composition error - a fragment the parsing toolkit rejects
 *
 * Severity: fatal (always)
 * Codes: ERR_GRAMMAR_COMPOSE
 */
export class GrammarError extends LayoutError {
  readonly code = 'ERR_GRAMMAR_COMPOSE';
  readonly severity = 'fatal' as const;
}

/**
 * Syntax error in a statement or in a verb's arguments
 *
 * Severity: fatal (always)
 * Codes: ERR_SYNTAX, ERR_BLOCK_UNSUPPORTED
 */
export class RuleSyntaxError extends LayoutError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string = 'ERR_SYNTAX', context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

export type ReferenceKind = 'class' | 'routine' | 'variable';

const REFERENCE_CODES: Record<ReferenceKind, string> = {
  class: 'ERR_UNDEFINED_CLASS',
  routine: 'ERR_UNDEFINED_ROUTINE',
  variable: 'ERR_UNDEFINED_VARIABLE',
};

/**
 * Reference to a name that was never defined
 *
 * Severity: fatal (always)
 * Codes: ERR_UNDEFINED_CLASS, ERR_UNDEFINED_ROUTINE, ERR_UNDEFINED_VARIABLE
 */
export class UndefinedReferenceError extends LayoutError {
  readonly code: string;
  readonly severity = 'fatal' as const;
  readonly kind: ReferenceKind;
  readonly identifier: string;

  constructor(message: string, kind: ReferenceKind, identifier: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, { ...context, identifier }, suggestion);
    this.code = REFERENCE_CODES[kind];
    this.kind = kind;
    this.identifier = identifier;
  }
}

/**
 * Metric name outside the supported vocabulary
 *
 * Severity: fatal (always)
 * Codes: ERR_UNKNOWN_METRIC
 */
export class UnknownMetricError extends LayoutError {
  readonly code = 'ERR_UNKNOWN_METRIC';
  readonly severity = 'fatal' as const;
  readonly metric: string;

  constructor(metric: string, context: ErrorContext = {}, suggestion?: string) {
    super(`Unknown metric '${metric}'`, { ...context, metric }, suggestion);
    this.metric = metric;
  }
}

/**
 * Selector cannot be resolved against the font
 *
 * Severity: fatal (always)
 * Codes: ERR_MISSING_CODEPOINT, ERR_INVALID_REGEX, ERR_MISSING_GLYPH
 */
export class ResolutionError extends LayoutError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Configuration error - config.yaml parsing, validation
 *
 * Severity: fatal (always)
 * Codes: ERR_CONFIG_INVALID
 */
export class ConfigError extends LayoutError {
  readonly code: string;
  readonly severity = 'fatal' as const;

  constructor(message: string, code: string = 'ERR_CONFIG_INVALID', context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * File access error - unreadable rule or font files, include cycles
 *
 * Severity: error (default)
 * Codes: ERR_FILE_UNREADABLE, ERR_INCLUDE_CYCLE
 */
export class FileAccessError extends LayoutError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Plugin error - module does not satisfy the plugin contract or failed to load
 *
 * Severity: error (default)
 * Codes: ERR_PLUGIN_INVALID, ERR_PLUGIN_LOAD
 */
export class PluginError extends LayoutError {
  readonly code: string;
  readonly severity = 'error' as const;

  constructor(message: string, code: string, context: ErrorContext = {}, suggestion?: string) {
    super(message, context, suggestion);
    this.code = code;
  }
}

/**
 * Selector produced glyph names the font does not contain
 *
 * Severity: warning (always)
 * Codes: WARN_MISSING_GLYPH
 */
export class MissingGlyphWarning extends LayoutError {
  readonly code = 'WARN_MISSING_GLYPH';
  readonly severity = 'warning' as const;
  readonly glyphs: readonly string[];

  constructor(glyphs: readonly string[], selectorText: string, where: string, context: ErrorContext = {}) {
    super(`Couldn't find glyph(s) '${glyphs.join(', ')}' in font (${selectorText} at ${where})`, context);
    this.glyphs = glyphs;
  }
}

/**
 * Statement used a verb no plugin provides
 *
 * Severity: warning (always)
 * Codes: WARN_UNKNOWN_VERB
 */
export class UnknownVerbWarning extends LayoutError {
  readonly code = 'WARN_UNKNOWN_VERB';
  readonly severity = 'warning' as const;
  readonly verb: string;

  constructor(verb: string, context: ErrorContext = {}) {
    super(`Unknown verb '${verb}'`, { ...context, verb }, 'Register the plugin that provides this verb');
    this.verb = verb;
  }
}

/**
 * Attachment glyph lacks the anchor the statement names
 *
 * Severity: warning (always)
 * Codes: WARN_MISSING_ANCHOR
 */
export class MissingAnchorWarning extends LayoutError {
  readonly code = 'WARN_MISSING_ANCHOR';
  readonly severity = 'warning' as const;
  readonly glyph: string;
  readonly anchor: string;

  constructor(glyph: string, anchor: string, where: string, context: ErrorContext = {}) {
    super(`Glyph '${glyph}' has no anchor '${anchor}' (at ${where})`, context);
    this.glyph = glyph;
    this.anchor = anchor;
  }
}
