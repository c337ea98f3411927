/**
 * Class algebra: evaluates class expressions to ordered glyph lists.
 *
 * Expressions chain primaries left to right with equal precedence:
 * `|` union, `&` / `and` intersection, `-` difference. A predicate used as
 * a primary is applied to the whole glyph order. When the right-hand
 * primary of a step is a predicate (plain or negated), the step filters
 * the left-hand list by it whatever the operator; write `& not (...)` to
 * exclude glyphs by a predicate.
 */

import type { FontModel, GlyphMetrics, SourceLocation } from '@layoutforge/types';
import { ResolutionError } from '../errors/LayoutError.js';
import type { Comparator, IntegerNode, MetricComparisonNode } from '../grammar/syntax.js';
import type { GlyphSelector, SelectorScope } from '../selectors/GlyphSelector.js';

export type PredicateNode =
  | { kind: 'hasglyph'; pattern: string; replacement: string; location: SourceLocation }
  | { kind: 'hasanchor'; anchor: string }
  | { kind: 'category'; category: string }
  | { kind: 'metric'; comparison: MetricComparisonNode };

export type Conjunctor = '|' | '&' | '-';

export type ClassExpression =
  | { kind: 'selector'; selector: GlyphSelector }
  | { kind: 'predicate'; predicate: PredicateNode; negated: boolean }
  | { kind: 'conjunction'; operator: Conjunctor; left: ClassExpression; right: ClassExpression };

/** Test applied to one glyph; metrics are undefined for glyphs outside the font */
export type GlyphPredicate = (metrics: GlyphMetrics | undefined, glyph: string) => boolean;

export interface AlgebraEnvironment {
  scope: SelectorScope;
  resolveInteger(node: IntegerNode): number;
}

export function compare(value: number, comparator: Comparator, operand: number): boolean {
  switch (comparator) {
    case '<':
      return value < operand;
    case '<=':
      return value <= operand;
    case '>':
      return value > operand;
    case '>=':
      return value >= operand;
    case '==':
      return value === operand;
  }
}

export function union(left: readonly string[], right: readonly string[]): string[] {
  return [...new Set([...left, ...right])];
}

export function intersection(left: readonly string[], right: readonly string[]): string[] {
  const keep = new Set(right);
  return [...new Set(left.filter(glyph => keep.has(glyph)))];
}

export function difference(left: readonly string[], right: readonly string[]): string[] {
  const drop = new Set(right);
  return [...new Set(left.filter(glyph => !drop.has(glyph)))];
}

const OPERATIONS: Record<Conjunctor, (left: readonly string[], right: readonly string[]) => string[]> = {
  '|': union,
  '&': intersection,
  '-': difference,
};

export class ClassAlgebra {
  constructor(private readonly env: AlgebraEnvironment) {}

  private get font(): FontModel {
    return this.env.scope.font;
  }

  evaluate(expression: ClassExpression): string[] {
    switch (expression.kind) {
      case 'selector':
        return expression.selector.resolve(this.env.scope);
      case 'predicate':
        return this.applyToFont(this.compile(expression));
      case 'conjunction': {
        const left = this.evaluate(expression.left);
        if (expression.right.kind === 'predicate') {
          return this.filter(left, this.compile(expression.right));
        }
        return OPERATIONS[expression.operator](left, this.evaluate(expression.right));
      }
    }
  }

  /**
   * Build the glyph test for a (possibly negated) predicate. Integer
   * operands are resolved once, here.
   */
  compile(expression: Extract<ClassExpression, { kind: 'predicate' }>): GlyphPredicate {
    const test = this.compilePredicate(expression.predicate);
    return expression.negated ? (metrics, glyph) => !test(metrics, glyph) : test;
  }

  filter(glyphs: readonly string[], predicate: GlyphPredicate): string[] {
    return glyphs.filter(glyph => predicate(this.font.metrics(glyph), glyph));
  }

  applyToFont(predicate: GlyphPredicate): string[] {
    return this.filter(this.font.glyphOrder, predicate);
  }

  private compilePredicate(predicate: PredicateNode): GlyphPredicate {
    const font = this.font;
    switch (predicate.kind) {
      case 'hasglyph': {
        const pattern = this.regex(predicate);
        const replacement = predicate.replacement;
        return (_metrics, glyph) => font.hasGlyph(glyph.replace(pattern, () => replacement));
      }
      case 'hasanchor': {
        const anchor = predicate.anchor;
        return (_metrics, glyph) => font.anchors(glyph).has(anchor);
      }
      case 'category': {
        const category = predicate.category;
        return (_metrics, glyph) => font.category(glyph) === category;
      }
      case 'metric': {
        const { metric, comparator, operand } = predicate.comparison;
        const value = this.env.resolveInteger(operand);
        return (metrics) => metrics !== undefined && compare(metrics[metric], comparator, value);
      }
    }
  }

  private regex(predicate: Extract<PredicateNode, { kind: 'hasglyph' }>): RegExp {
    try {
      return new RegExp(predicate.pattern, 'g');
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      const { file, line, column } = predicate.location;
      throw new ResolutionError(
        `Invalid regular expression /${predicate.pattern}/: ${reason}`,
        'ERR_INVALID_REGEX',
        { file, line, column }
      );
    }
  }
}
