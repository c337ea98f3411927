/**
 * ClassDefinition plugin - DefineClass and DefineClassBinned
 *
 *   DefineClass @upper = /^[A-Z]$/;
 *   DefineClass @short = @alpha and (width < width[space]);
 *   DefineClassBinned @bases[width,2] = @bases;
 */

import type { IToken, ParserMethod } from 'chevrotain';
import { isMetricName, type MetricName, type SourceLocation } from '@layoutforge/types';
import { ClassAlgebra, type ClassExpression, type Conjunctor, type PredicateNode } from '../classes/ClassAlgebra.js';
import { binAverages, binGlyphsByMetric } from '../classes/binning.js';
import type { StatementValue } from '../compiler/outcomes.js';
import { RuleSyntaxError, UnknownMetricError } from '../errors/LayoutError.js';
import type { GrammarBuilder, HelperRules } from '../grammar/GrammarBuilder.js';
import {
  Ampersand,
  BareName,
  ClassName,
  Comma,
  Dot,
  Equals,
  LParen,
  LSquare,
  Minus,
  NumberLiteral,
  Pipe,
  RParen,
  RSquare,
  Regex,
  keyword,
} from '../grammar/tokens.js';
import { BaseTransformer } from './BaseTransformer.js';
import { definePlugin, defineVerb, type VerbContext } from './types.js';

const HasGlyph = keyword('hasglyph');
const HasAnchor = keyword('hasanchor');
const Category = keyword('category');
const Not = keyword('not');
const And = keyword('and');

export interface ClassRules {
  classExpression: ParserMethod<[], ClassExpression>;
}

export interface DefineClassArgs {
  name: string;
  expression: ClassExpression;
}

export interface DefineClassBinnedArgs extends DefineClassArgs {
  metric: MetricName;
  bins: number;
}

function classRules(g: GrammarBuilder, helpers: HelperRules): ClassRules {
  const predicate = g.rule('predicate', () =>
    g.or<PredicateNode>(0, [
      {
        ALT: () => {
          const head = g.consume(0, HasGlyph);
          g.consume(0, LParen);
          const regex = g.consume(0, Regex);
          const parts: IToken[] = [];
          g.many(0, () => {
            parts.push(
              g.or<IToken>(1, [
                { ALT: () => g.consume(0, Dot) },
                { ALT: () => g.consume(0, BareName) },
                { ALT: () => g.consume(0, NumberLiteral) },
              ])
            );
          });
          g.consume(0, RParen);
          return g.action((): PredicateNode => ({
            kind: 'hasglyph',
            pattern: regex.image.slice(1, -1),
            replacement: parts.map(part => part.image).join(''),
            location: g.locate(head),
          }));
        },
      },
      {
        ALT: () => {
          g.consume(0, HasAnchor);
          g.consume(1, LParen);
          const anchor = g.consume(1, BareName);
          g.consume(1, RParen);
          return g.action((): PredicateNode => ({ kind: 'hasanchor', anchor: anchor.image }));
        },
      },
      {
        ALT: () => {
          g.consume(0, Category);
          g.consume(2, LParen);
          const category = g.consume(2, BareName);
          g.consume(2, RParen);
          return g.action((): PredicateNode => ({ kind: 'category', category: category.image }));
        },
      },
      {
        ALT: () => {
          const comparison = g.subrule(0, helpers.metricComparison);
          return g.action((): PredicateNode => ({ kind: 'metric', comparison }));
        },
      },
    ])
  );

  // `not x` and `not (x)`
  const negatable = g.rule('negatable', () =>
    g.or<PredicateNode>(0, [
      { ALT: () => g.subrule(0, predicate) },
      {
        ALT: () => {
          g.consume(0, LParen);
          const inner = g.subrule(1, predicate);
          g.consume(0, RParen);
          return inner;
        },
      },
    ])
  );

  const conjunctor = g.rule('conjunctor', () =>
    g.or<Conjunctor>(0, [
      { ALT: () => (g.consume(0, Pipe), '|') },
      { ALT: () => (g.consume(0, Ampersand), '&') },
      { ALT: () => (g.consume(0, And), '&') },
      { ALT: () => (g.consume(0, Minus), '-') },
    ])
  );

  let classExpression: ParserMethod<[], ClassExpression>;

  // Predicates precede selectors: both may start with a bare name.
  const primary = g.rule('primary', () =>
    g.or<ClassExpression>(0, [
      {
        ALT: () => {
          g.consume(0, LParen);
          const inner = g.subrule(0, classExpression);
          g.consume(0, RParen);
          return inner;
        },
      },
      {
        ALT: () => {
          const node = g.subrule(0, predicate);
          return g.action((): ClassExpression => ({ kind: 'predicate', predicate: node, negated: false }));
        },
      },
      {
        ALT: () => {
          g.consume(0, Not);
          const node = g.subrule(0, negatable);
          return g.action((): ClassExpression => ({ kind: 'predicate', predicate: node, negated: true }));
        },
      },
      {
        ALT: () => {
          const selector = g.subrule(0, helpers.glyphSelector);
          return g.action((): ClassExpression => ({ kind: 'selector', selector }));
        },
      },
    ])
  );

  classExpression = g.rule('classExpression', () => {
    let result = g.subrule(0, primary);
    g.many(0, () => {
      const operator = g.subrule(0, conjunctor);
      const right = g.subrule(1, primary);
      const left = result;
      result = g.action((): ClassExpression => ({ kind: 'conjunction', operator, left, right }));
    });
    return result;
  });

  return { classExpression };
}

abstract class ClassTransformer<TArgs> extends BaseTransformer<TArgs> {
  protected algebra(): ClassAlgebra {
    return new ClassAlgebra({
      scope: this.selectorScope,
      resolveInteger: node => this.resolveInteger(node),
    });
  }
}

class DefineClassTransformer extends ClassTransformer<DefineClassArgs> {
  action(args: DefineClassArgs): StatementValue {
    const glyphs = this.algebra().evaluate(args.expression);
    this.context.fontFeatures.defineClass(args.name, glyphs);
    this.logger.debug(`Defined @${args.name}`, { glyphs: glyphs.length });
    return { kind: 'class', name: args.name, glyphs };
  }
}

class DefineClassBinnedTransformer extends ClassTransformer<DefineClassBinnedArgs> {
  action(args: DefineClassBinnedArgs): StatementValue {
    const glyphs = this.algebra().evaluate(args.expression);
    const bins = binGlyphsByMetric(this.context.font, glyphs, args.metric, args.bins);
    const names = bins.map((bin, i) => {
      const name = `${args.name}_${args.metric}${i + 1}`;
      this.context.fontFeatures.defineClass(name, bin);
      return name;
    });
    this.logger.debug(`Binned @${args.name} by ${args.metric}`, {
      classes: names,
      averages: binAverages(this.context.font, bins, args.metric),
    });
    return { kind: 'classes', names };
  }
}

function locationContext(location: SourceLocation): { file?: string; line: number; column: number } {
  return { file: location.file, line: location.line, column: location.column };
}

export const DefineClass = defineVerb<DefineClassArgs, ClassRules>({
  name: 'DefineClass',
  grammar(g, _helpers, rules) {
    return g.rule('defineClass', () => {
      const name = g.consume(0, ClassName);
      g.consume(0, Equals);
      const expression = g.subrule(0, rules.classExpression);
      return g.action((): DefineClassArgs => ({ name: name.image.slice(1), expression }));
    });
  },
  transformer: (context: VerbContext) => new DefineClassTransformer(context),
});

export const DefineClassBinned = defineVerb<DefineClassBinnedArgs, ClassRules>({
  name: 'DefineClassBinned',
  grammar(g, _helpers, rules) {
    return g.rule('defineClassBinned', () => {
      const name = g.consume(0, ClassName);
      g.consume(0, LSquare);
      const metric = g.consume(0, BareName);
      g.consume(0, Comma);
      const count = g.consume(0, NumberLiteral);
      g.consume(0, RSquare);
      g.consume(0, Equals);
      const expression = g.subrule(0, rules.classExpression);
      return g.action((): DefineClassBinnedArgs => {
        if (!isMetricName(metric.image)) {
          throw new UnknownMetricError(metric.image, locationContext(g.locate(metric)));
        }
        const bins = Number(count.image);
        if (!Number.isInteger(bins) || bins < 1) {
          throw new RuleSyntaxError(
            `Bin count must be a positive integer, got ${count.image}`,
            'ERR_SYNTAX',
            locationContext(g.locate(count))
          );
        }
        return { name: name.image.slice(1), metric: metric.image, bins, expression };
      });
    });
  },
  transformer: (context: VerbContext) => new DefineClassBinnedTransformer(context),
});

export const ClassDefinitionPlugin = definePlugin<ClassRules>({
  name: 'ClassDefinition',
  options: { useHelpers: true },
  tokens: [HasGlyph, HasAnchor, Category, Not, And],
  grammar: classRules,
  verbs: [DefineClass, DefineClassBinned],
});
