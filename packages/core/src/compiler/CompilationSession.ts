/**
 * CompilationSession - one compilation unit
 *
 * Owns the plugin table (composed verb parsers), the IR and the diagnostic
 * sink. Sessions share nothing with each other.
 *
 * Usage:
 *   const session = new CompilationSession({ font });
 *   session.compileString('DefineClass @upper = /^[A-Z]$/;');
 *   session.fontFeatures.namedClasses.get('upper');
 */

import { readFileSync } from 'fs';
import { resolve } from 'path';
import type { FontModel, Logger, SourceLocation } from '@layoutforge/types';
import { DiagnosticCollector } from '../diagnostics/DiagnosticCollector.js';
import { FileAccessError, LayoutError, PluginError } from '../errors/LayoutError.js';
import { GrammarComposer } from '../grammar/GrammarComposer.js';
import { StatementParser } from '../grammar/StatementParser.js';
import { FontFeatures } from '../ir/FontFeatures.js';
import { ConsoleLogger } from '../logging/Logger.js';
import { builtinPlugins } from '../plugins/index.js';
import { isRulePlugin, pluginLabel, pluginProblems } from '../plugins/PluginValidator.js';
import type { VerbContext } from '../plugins/types.js';
import type { StatementOutcome } from './outcomes.js';
import { StatementDispatcher } from './StatementDispatcher.js';

export interface SessionOptions {
  font: FontModel;
  /** Defaults to every built-in plugin */
  plugins?: readonly unknown[];
  logger?: Logger;
  /** Missing glyphs raise instead of warning */
  strict?: boolean;
  includePaths?: readonly string[];
}

export interface VerbInfo {
  verb: string;
  plugin: string;
  block: boolean;
}

export class CompilationSession {
  readonly font: FontModel;
  readonly fontFeatures = new FontFeatures();
  readonly diagnostics = new DiagnosticCollector();
  readonly logger: Logger;
  readonly strict: boolean;
  readonly includePaths: readonly string[];

  private readonly composer = new GrammarComposer();
  private readonly statements = new StatementParser();
  private readonly dispatcher: StatementDispatcher;
  private readonly fileStack: string[] = [];
  private readonly reported = new WeakSet<LayoutError>();

  constructor(options: SessionOptions) {
    this.font = options.font;
    this.logger = options.logger ?? new ConsoleLogger('warnings');
    this.strict = options.strict ?? false;
    this.includePaths = (options.includePaths ?? []).map(path => resolve(path));
    this.dispatcher = new StatementDispatcher({
      lookup: verb => this.composer.get(verb),
      createContext: (verb, location) => this.createContext(verb, location),
      diagnostics: this.diagnostics,
      logger: this.logger,
    });

    for (const plugin of options.plugins ?? builtinPlugins()) {
      this.registerPlugin(plugin);
    }
  }

  /**
   * Validate and register a plugin, composing its verb parsers.
   *
   * An invalid plugin is reported as an error diagnostic and false is
   * returned. A grammar the parser toolkit rejects throws GrammarError.
   */
  registerPlugin(candidate: unknown): boolean {
    if (!isRulePlugin(candidate)) {
      const problems = pluginProblems(candidate);
      const error = new PluginError(
        `Invalid plugin ${pluginLabel(candidate)}: ${problems.join('; ')}`,
        'ERR_PLUGIN_INVALID',
        { plugin: pluginLabel(candidate) },
        'A plugin exports { name, options: { useHelpers }, grammar, verbs }'
      );
      this.diagnostics.addFromError(error);
      this.logger.error(error.message);
      return false;
    }

    const replaced = this.composer.register(candidate);
    for (const verb of replaced) {
      this.logger.warn(`Verb '${verb}' replaced by plugin '${candidate.name}'`);
    }
    this.logger.debug(`Registered plugin ${candidate.name}`, { verbs: candidate.verbs.map(v => v.name) });
    return true;
  }

  get verbNames(): string[] {
    return this.composer.verbNames();
  }

  verbs(): VerbInfo[] {
    return this.composer.all().map(verb => ({
      verb: verb.name,
      plugin: verb.plugin,
      block: verb.definition.beforeBraceGrammar !== undefined || verb.definition.afterBraceGrammar !== undefined,
    }));
  }

  /**
   * Compile rule source. Fatal errors are recorded in the diagnostics and
   * rethrown; warnings are only recorded.
   */
  compileString(source: string, file?: string): StatementOutcome[] {
    try {
      const statements = this.statements.parse(source, file);
      return this.dispatcher.dispatchAll(statements, file);
    } catch (err) {
      if (err instanceof LayoutError) {
        this.record(err);
      }
      throw err;
    }
  }

  /**
   * Compile a rule file. Nested includes of a file already being compiled
   * raise ERR_INCLUDE_CYCLE.
   */
  compileFile(path: string): StatementOutcome[] {
    const file = resolve(path);
    if (this.fileStack.includes(file)) {
      const chain = [...this.fileStack, file].join(' -> ');
      const error = new FileAccessError(`Include cycle: ${chain}`, 'ERR_INCLUDE_CYCLE', { file });
      this.record(error);
      throw error;
    }

    let source: string;
    try {
      source = readFileSync(file, 'utf-8');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      const error = new FileAccessError(`Cannot read rule file ${file}: ${reason}`, 'ERR_FILE_UNREADABLE', { file });
      this.record(error);
      throw error;
    }

    this.fileStack.push(file);
    try {
      return this.compileString(source, file);
    } finally {
      this.fileStack.pop();
    }
  }

  private createContext(verb: string, location: SourceLocation): VerbContext {
    return {
      verb,
      location,
      font: this.font,
      fontFeatures: this.fontFeatures,
      logger: this.logger,
      diagnostics: this.diagnostics,
      strict: this.strict,
      includePaths: this.includePaths,
      compileFile: path => this.compileFile(path),
    };
  }

  // Errors from nested includes pass through several compileString frames
  private record(error: LayoutError): void {
    if (!this.reported.has(error)) {
      this.reported.add(error);
      this.diagnostics.addFromError(error);
    }
  }
}
