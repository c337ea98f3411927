/**
 * Helper rules shared by verb grammars: glyph selectors, integers, value
 * records, metric comparisons and language systems.
 *
 * Defined afresh inside every parser that asks for them, so each verb
 * parser stays independent.
 */

import type { IToken } from 'chevrotain';
import { isMetricName, isValueRecordField, type MetricName, type SourceLocation } from '@layoutforge/types';
import { RuleSyntaxError, UnknownMetricError, type ErrorContext } from '../errors/LayoutError.js';
import { GlyphSelector, type GlyphSuffix, type InlineMember, type SelectorBody } from '../selectors/GlyphSelector.js';
import type { GrammarBuilder, HelperRules } from './GrammarBuilder.js';
import type { Comparator, IntegerNode, LanguageSystem, ValueRecordNode } from './syntax.js';
import {
  BareName,
  ClassName,
  DoubleEquals,
  Dot,
  Equals,
  Greater,
  GreaterEqual,
  LAngles,
  LParen,
  LSquare,
  Less,
  LessEqual,
  NamedInteger,
  NumberLiteral,
  RAngles,
  RParen,
  RSquare,
  Regex,
  Slash,
  Star,
  Tilde,
  UnicodeGlyph,
  UnicodeRange,
} from './tokens.js';

interface LocatedBody {
  body: SelectorBody;
  token: IToken;
}

function locationContext(location: SourceLocation): ErrorContext {
  return { file: location.file, line: location.line, column: location.column };
}

function codepoint(image: string): number {
  return parseInt(image.slice(2), 16);
}

export function defineHelperRules(g: GrammarBuilder): HelperRules {
  const metricName = (token: IToken): MetricName => {
    if (!isMetricName(token.image)) {
      throw new UnknownMetricError(token.image, locationContext(g.locate(token)));
    }
    return token.image;
  };

  const inlineClass = g.rule('inlineClass', () => {
    const members: InlineMember[] = [];
    const open = g.consume(0, LSquare);
    g.many(0, () => {
      const member = g.or<InlineMember>(0, [
        {
          ALT: () => {
            const t = g.consume(0, ClassName);
            return g.action((): InlineMember => ({ kind: 'classname', name: t.image.slice(1) }));
          },
        },
        {
          ALT: () => {
            const t = g.consume(0, BareName);
            return g.action((): InlineMember => ({ kind: 'barename', name: t.image }));
          },
        },
        {
          ALT: () => {
            const t = g.consume(0, UnicodeGlyph);
            return g.action((): InlineMember => ({ kind: 'unicodeglyph', codepoint: codepoint(t.image) }));
          },
        },
      ]);
      members.push(member);
    });
    g.consume(0, RSquare);
    return g.action((): LocatedBody => ({ body: { kind: 'inlineclass', members }, token: open }));
  });

  const selectorBody = g.rule('selectorBody', () =>
    g.or<LocatedBody>(0, [
      {
        ALT: () => {
          const t = g.consume(0, UnicodeRange);
          return g.action((): LocatedBody => {
            const [start, end] = t.image.split('=>');
            return { body: { kind: 'unicoderange', start: codepoint(start), end: codepoint(end) }, token: t };
          });
        },
      },
      {
        ALT: () => {
          const t = g.consume(0, UnicodeGlyph);
          return g.action((): LocatedBody => ({ body: { kind: 'unicodeglyph', codepoint: codepoint(t.image) }, token: t }));
        },
      },
      {
        ALT: () => {
          const t = g.consume(0, Regex);
          return g.action((): LocatedBody => ({ body: { kind: 'regex', pattern: t.image.slice(1, -1) }, token: t }));
        },
      },
      {
        ALT: () => {
          const t = g.consume(0, ClassName);
          return g.action((): LocatedBody => ({ body: { kind: 'classname', name: t.image.slice(1) }, token: t }));
        },
      },
      {
        ALT: () => {
          const t = g.consume(0, BareName);
          return g.action((): LocatedBody => ({ body: { kind: 'barename', name: t.image }, token: t }));
        },
      },
      { ALT: () => g.subrule(0, inlineClass) },
    ])
  );

  const glyphSuffix = g.rule('glyphSuffix', () => {
    const operation = g.or<GlyphSuffix['operation']>(0, [
      {
        ALT: () => {
          g.consume(0, Dot);
          return 'append';
        },
      },
      {
        ALT: () => {
          g.consume(0, Tilde);
          return 'strip';
        },
      },
    ]);
    const name = g.consume(0, BareName);
    return g.action((): GlyphSuffix => ({ operation, suffix: name.image }));
  });

  const glyphSelector = g.rule('glyphSelector', () => {
    const head = g.subrule(0, selectorBody);
    const suffixes: GlyphSuffix[] = [];
    g.many(0, () => {
      suffixes.push(g.subrule(0, glyphSuffix));
    });
    return g.action(() => new GlyphSelector(head.body, suffixes, g.locate(head.token)));
  });

  const glyphMetric = g.rule('glyphMetric', () => {
    const metric = g.consume(0, BareName);
    const glyph = g.or<IToken>(0, [
      {
        ALT: () => {
          g.consume(0, LSquare);
          const t = g.consume(1, BareName);
          g.consume(0, RSquare);
          return t;
        },
      },
      {
        ALT: () => {
          g.consume(0, LParen);
          const t = g.consume(2, BareName);
          g.consume(0, RParen);
          return t;
        },
      },
    ]);
    return g.action((): IntegerNode => ({
      kind: 'glyphMetric',
      metric: metricName(metric),
      glyph: glyph.image,
      location: g.locate(metric),
    }));
  });

  const integerContainer = g.rule('integerContainer', () =>
    g.or<IntegerNode>(0, [
      {
        ALT: () => {
          const t = g.consume(0, NumberLiteral);
          return g.action((): IntegerNode => ({ kind: 'literal', value: Number(t.image) }));
        },
      },
      {
        ALT: () => {
          const t = g.consume(0, NamedInteger);
          return g.action((): IntegerNode => ({ kind: 'variable', name: t.image.slice(1), location: g.locate(t) }));
        },
      },
      { ALT: () => g.subrule(0, glyphMetric) },
    ])
  );

  const valueRecordLiteral = g.rule('valueRecordLiteral', () => {
    g.consume(0, Less);
    const node = g.or<ValueRecordNode>(0, [
      {
        ALT: () => {
          const entries: [IToken, IntegerNode][] = [];
          g.atLeastOne(0, () => {
            const name = g.consume(0, BareName);
            g.consume(0, Equals);
            entries.push([name, g.subrule(0, integerContainer)]);
          });
          return g.action((): ValueRecordNode => {
            const fields: Extract<ValueRecordNode, { kind: 'fields' }>['fields'] = {};
            for (const [name, value] of entries) {
              if (!isValueRecordField(name.image)) {
                throw new RuleSyntaxError(
                  `Unknown value record field '${name.image}'`,
                  'ERR_SYNTAX',
                  locationContext(g.locate(name)),
                  'Use xPlacement, yPlacement, xAdvance or yAdvance'
                );
              }
              fields[name.image] = value;
            }
            return { kind: 'fields', fields };
          });
        },
      },
      {
        ALT: () => {
          const xPlacement = g.subrule(1, integerContainer);
          const yPlacement = g.subrule(2, integerContainer);
          const xAdvance = g.subrule(3, integerContainer);
          const yAdvance = g.subrule(4, integerContainer);
          return g.action((): ValueRecordNode => ({
            kind: 'fields',
            fields: { xPlacement, yPlacement, xAdvance, yAdvance },
          }));
        },
      },
    ]);
    g.consume(0, Greater);
    return node;
  });

  const valueRecord = g.rule('valueRecord', () =>
    g.or<ValueRecordNode>(0, [
      {
        ALT: () => {
          const t = g.consume(0, NumberLiteral);
          return g.action((): ValueRecordNode => ({
            kind: 'fields',
            fields: { xAdvance: { kind: 'literal', value: Number(t.image) } },
          }));
        },
      },
      {
        ALT: () => {
          const t = g.consume(0, NamedInteger);
          return g.action((): ValueRecordNode => ({ kind: 'variable', name: t.image.slice(1), location: g.locate(t) }));
        },
      },
      { ALT: () => g.subrule(0, valueRecordLiteral) },
    ])
  );

  const comparator = g.rule('comparator', () =>
    g.or<Comparator>(0, [
      { ALT: () => (g.consume(0, LessEqual), '<=') },
      { ALT: () => (g.consume(0, GreaterEqual), '>=') },
      { ALT: () => (g.consume(0, DoubleEquals), '==') },
      { ALT: () => (g.consume(0, Less), '<') },
      { ALT: () => (g.consume(0, Greater), '>') },
      { ALT: () => (g.consume(0, Equals), '==') },
    ])
  );

  const metricComparison = g.rule('metricComparison', () => {
    const metric = g.consume(0, BareName);
    const op = g.subrule(0, comparator);
    const operand = g.subrule(0, integerContainer);
    return g.action(() => ({
      metric: metricName(metric),
      comparator: op,
      operand,
      location: g.locate(metric),
    }));
  });

  const languageSlot = g.rule('languageSlot', () =>
    g.or<string>(0, [
      {
        ALT: () => {
          const t = g.consume(0, BareName);
          return g.action(() => t.image);
        },
      },
      { ALT: () => (g.consume(0, Star), '*') },
    ])
  );

  const languages = g.rule('languages', () => {
    const systems: LanguageSystem[] = [];
    g.consume(0, LAngles);
    g.atLeastOne(0, () => {
      const script = g.subrule(0, languageSlot);
      g.consume(0, Slash);
      const language = g.subrule(1, languageSlot);
      systems.push({ script, language });
    });
    g.consume(0, RAngles);
    return systems;
  });

  return { glyphSelector, integerContainer, valueRecord, valueRecordLiteral, metricComparison, comparator, languages };
}
