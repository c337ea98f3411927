/**
 * Position plugin
 *
 *   Position A -20 V;
 *   Position @top ( acutecomb <0 50 0 0> ) <<latn/*>>;
 *
 * A bare number after a glyph is an xAdvance adjustment. Value records are
 * only allowed on input positions.
 */

import type { LanguageSystem } from '@layoutforge/types';
import type { StatementValue } from '../compiler/outcomes.js';
import { RuleSyntaxError } from '../errors/LayoutError.js';
import type { ValueRecordNode } from '../grammar/syntax.js';
import { LParen, RParen } from '../grammar/tokens.js';
import { positioning } from '../ir/rules.js';
import type { GlyphSelector } from '../selectors/GlyphSelector.js';
import { BaseTransformer } from './BaseTransformer.js';
import { splitSequence, type SequenceItem } from './sequence.js';
import { definePlugin, defineVerb } from './types.js';

export interface PositionedGlyph {
  selector: GlyphSelector;
  valueRecord?: ValueRecordNode;
}

export interface PositionArgs {
  items: SequenceItem<PositionedGlyph>[];
  languages: LanguageSystem[];
}

class PositionTransformer extends BaseTransformer<PositionArgs> {
  action(args: PositionArgs): StatementValue {
    const { precontext, input, postcontext } = splitSequence(args.items, this.context.verb);
    const context = [...precontext, ...postcontext].find(entry => entry.valueRecord !== undefined);
    if (context) {
      throw new RuleSyntaxError(
        `Value record on context glyph '${context.selector.asText()}'`,
        'ERR_SYNTAX',
        this.errorContext,
        'Move the adjusted glyphs inside the parentheses'
      );
    }

    const resolve = (entry: PositionedGlyph): string[] => this.resolveSelector(entry.selector);
    const rule = positioning(
      input.map(resolve),
      input.map(entry => (entry.valueRecord ? this.resolveValueRecord(entry.valueRecord) : undefined)),
      {
        precontext: precontext.map(resolve),
        postcontext: postcontext.map(resolve),
        languages: args.languages,
        address: this.address,
      }
    );
    return { kind: 'rules', rules: [rule] };
  }
}

export const PositionVerb = defineVerb<PositionArgs>({
  name: 'Position',
  grammar(g, helpers) {
    const positioned = g.rule('positionedGlyph', () => {
      const selector = g.subrule(0, helpers.glyphSelector);
      const valueRecord = g.option(0, () => g.subrule(0, helpers.valueRecord));
      return g.action((): PositionedGlyph => (valueRecord ? { selector, valueRecord } : { selector }));
    });

    const item = g.rule('positionItem', () =>
      g.or<SequenceItem<PositionedGlyph>>(0, [
        {
          ALT: () => {
            const open = g.consume(0, LParen);
            const entries: PositionedGlyph[] = [];
            g.atLeastOne(0, () => {
              entries.push(g.subrule(0, positioned));
            });
            g.consume(0, RParen);
            return g.action((): SequenceItem<PositionedGlyph> => ({ group: true, entries, location: g.locate(open) }));
          },
        },
        {
          ALT: () => {
            const entry = g.subrule(1, positioned);
            return g.action((): SequenceItem<PositionedGlyph> => ({
              group: false,
              entries: [entry],
              location: entry.selector.location,
            }));
          },
        },
      ])
    );

    return g.rule('position', () => {
      const items: SequenceItem<PositionedGlyph>[] = [];
      g.atLeastOne(0, () => {
        items.push(g.subrule(0, item));
      });
      const languages = g.option(0, () => g.subrule(0, helpers.languages));
      return g.action((): PositionArgs => ({ items, languages: languages ?? [] }));
    });
  },
  transformer: context => new PositionTransformer(context),
});

export const PositionPlugin = definePlugin<undefined>({
  name: 'Position',
  options: { useHelpers: true },
  grammar: () => undefined,
  verbs: [PositionVerb],
});
