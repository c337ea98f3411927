/**
 * Chain plugin - apply routines at positions of a context
 *
 *   Chain @consonant ( ra ^halfForms ) @vowel;
 *
 * `^name` refers to a routine defined earlier; it must be inside the
 * parenthesised input.
 */

import type { IToken } from 'chevrotain';
import type { LanguageSystem, SourceLocation } from '@layoutforge/types';
import type { StatementValue } from '../compiler/outcomes.js';
import { RuleSyntaxError } from '../errors/LayoutError.js';
import { BareName, Caret, LParen, RParen } from '../grammar/tokens.js';
import type { Routine } from '../ir/Routine.js';
import { chaining } from '../ir/rules.js';
import type { GlyphSelector } from '../selectors/GlyphSelector.js';
import { BaseTransformer } from './BaseTransformer.js';
import { splitSequence, type SequenceItem } from './sequence.js';
import { definePlugin, defineVerb } from './types.js';

export interface RoutineReference {
  name: string;
  location: SourceLocation;
}

export interface ChainedGlyph {
  selector: GlyphSelector;
  routines: RoutineReference[];
}

export interface ChainArgs {
  items: SequenceItem<ChainedGlyph>[];
  languages: LanguageSystem[];
}

class ChainTransformer extends BaseTransformer<ChainArgs> {
  action(args: ChainArgs): StatementValue {
    const { precontext, input, postcontext } = splitSequence(args.items, this.context.verb);
    const misplaced = [...precontext, ...postcontext].find(entry => entry.routines.length > 0);
    if (misplaced) {
      throw new RuleSyntaxError(
        `Routine reference on context glyph '${misplaced.selector.asText()}'`,
        'ERR_SYNTAX',
        this.errorContext,
        'Put glyphs that carry ^routine references inside the parentheses'
      );
    }

    const features = this.context.fontFeatures;
    const lookups: Routine[][] = input.map(entry =>
      entry.routines.map(ref => features.referenceRoutine(ref.name, ref.location))
    );
    const resolve = (entry: ChainedGlyph): string[] => this.resolveSelector(entry.selector);
    const rule = chaining(input.map(resolve), lookups, {
      precontext: precontext.map(resolve),
      postcontext: postcontext.map(resolve),
      languages: args.languages,
      address: this.address,
    });
    return { kind: 'rules', rules: [rule] };
  }
}

export const ChainVerb = defineVerb<ChainArgs>({
  name: 'Chain',
  grammar(g, helpers) {
    const chained = g.rule('chainedGlyph', () => {
      const selector = g.subrule(0, helpers.glyphSelector);
      const names: IToken[] = [];
      g.many(0, () => {
        g.consume(0, Caret);
        names.push(g.consume(0, BareName));
      });
      return g.action((): ChainedGlyph => ({
        selector,
        routines: names.map(name => ({ name: name.image, location: g.locate(name) })),
      }));
    });

    const item = g.rule('chainItem', () =>
      g.or<SequenceItem<ChainedGlyph>>(0, [
        {
          ALT: () => {
            const open = g.consume(0, LParen);
            const entries: ChainedGlyph[] = [];
            g.atLeastOne(0, () => {
              entries.push(g.subrule(0, chained));
            });
            g.consume(0, RParen);
            return g.action((): SequenceItem<ChainedGlyph> => ({ group: true, entries, location: g.locate(open) }));
          },
        },
        {
          ALT: () => {
            const entry = g.subrule(1, chained);
            return g.action((): SequenceItem<ChainedGlyph> => ({
              group: false,
              entries: [entry],
              location: entry.selector.location,
            }));
          },
        },
      ])
    );

    return g.rule('chain', () => {
      const items: SequenceItem<ChainedGlyph>[] = [];
      g.atLeastOne(0, () => {
        items.push(g.subrule(0, item));
      });
      const languages = g.option(0, () => g.subrule(0, helpers.languages));
      return g.action((): ChainArgs => ({ items, languages: languages ?? [] }));
    });
  },
  transformer: context => new ChainTransformer(context),
});

export const ChainPlugin = definePlugin<undefined>({
  name: 'Chain',
  options: { useHelpers: true },
  grammar: () => undefined,
  verbs: [ChainVerb],
});
