/**
 * BaseTransformer - shared plumbing for verb transformers
 *
 * Subclasses implement `action` and/or `blockAction`. Helpers here resolve
 * selectors, integers and value records against the session state and
 * report warnings.
 */

import { formatLocation, isValueRecordField, type Logger, type SourceLocation, type ValueRecord } from '@layoutforge/types';
import { ResolutionError, RuleSyntaxError, UndefinedReferenceError, type ErrorContext, type LayoutError } from '../errors/LayoutError.js';
import type { IntegerNode, ValueRecordNode } from '../grammar/syntax.js';
import type { VariableValue } from '../ir/FontFeatures.js';
import type { GlyphSelector, ResolveOptions, SelectorScope } from '../selectors/GlyphSelector.js';
import type { StatementValue } from '../compiler/outcomes.js';
import type { BlockArguments, VerbContext, VerbTransformer } from './types.js';

export abstract class BaseTransformer<TArgs = unknown, THeader = unknown, TTrailer = unknown>
  implements VerbTransformer<TArgs, THeader, TTrailer>
{
  constructor(protected readonly context: VerbContext) {}

  action?(args: TArgs): StatementValue;
  blockAction?(block: BlockArguments<THeader, TTrailer>): StatementValue;

  protected get logger(): Logger {
    return this.context.logger;
  }

  protected get errorContext(): ErrorContext {
    const { file, line, column } = this.context.location;
    return { file, line, column, verb: this.context.verb };
  }

  /** `file:line:column` of the statement being handled */
  protected get address(): string {
    return formatLocation(this.context.location);
  }

  protected get selectorScope(): SelectorScope {
    return {
      font: this.context.font,
      namedClasses: this.context.fontFeatures.namedClasses,
      strict: this.context.strict,
      onWarning: (warning) => this.warn(warning),
    };
  }

  protected resolveSelector(selector: GlyphSelector, options?: ResolveOptions): string[] {
    return selector.resolve(this.selectorScope, options);
  }

  /**
   * Record a warning diagnostic and log it.
   */
  protected warn(warning: LayoutError): void {
    this.context.diagnostics.addFromError(warning, this.context.verb);
    this.logger.warn(warning.message, { code: warning.code });
  }

  /**
   * Debug output: an info diagnostic plus an info log line.
   */
  protected report(code: string, message: string): void {
    const { file, line, column } = this.context.location;
    this.context.diagnostics.add({ code, severity: 'info', message, file, line, column, verb: this.context.verb });
    this.logger.info(message);
  }

  protected variable(name: string, location: SourceLocation): VariableValue {
    const value = this.context.fontFeatures.variables.get(name);
    if (value === undefined) {
      throw new UndefinedReferenceError(
        `Variable $${name} was not defined (at ${formatLocation(location)})`,
        'variable',
        name,
        { file: location.file, line: location.line, column: location.column, verb: this.context.verb },
        'Define it first with Set'
      );
    }
    return value;
  }

  protected resolveInteger(node: IntegerNode): number {
    switch (node.kind) {
      case 'literal':
        return node.value;
      case 'variable': {
        const value = this.variable(node.name, node.location);
        if (typeof value !== 'number') {
          throw new RuleSyntaxError(
            `Variable $${node.name} holds a value record, not a number (at ${formatLocation(node.location)})`,
            'ERR_SYNTAX',
            { file: node.location.file, line: node.location.line, column: node.location.column }
          );
        }
        return value;
      }
      case 'glyphMetric': {
        const metrics = this.context.font.metrics(node.glyph);
        if (!metrics) {
          throw new ResolutionError(
            `Glyph '${node.glyph}' in ${node.metric}[${node.glyph}] is not in the font (at ${formatLocation(node.location)})`,
            'ERR_MISSING_GLYPH',
            { file: node.location.file, line: node.location.line, column: node.location.column }
          );
        }
        return metrics[node.metric];
      }
    }
  }

  /**
   * A bare number or a numeric variable means an xAdvance adjustment.
   */
  protected resolveValueRecord(node: ValueRecordNode): ValueRecord {
    if (node.kind === 'variable') {
      const value = this.variable(node.name, node.location);
      return typeof value === 'number' ? { xAdvance: value } : { ...value };
    }
    const record: ValueRecord = {};
    for (const [field, integer] of Object.entries(node.fields)) {
      if (integer !== undefined && isValueRecordField(field)) {
        record[field] = this.resolveInteger(integer);
      }
    }
    return record;
  }
}

