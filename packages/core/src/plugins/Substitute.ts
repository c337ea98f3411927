/**
 * Substitute plugin
 *
 *   Substitute f i -> f_i;
 *   Substitute @consonants ( ra ) -> ra.alt <<deva/dflt>>;
 */

import type { LanguageSystem } from '@layoutforge/types';
import type { StatementValue } from '../compiler/outcomes.js';
import { Arrow, LParen, RParen } from '../grammar/tokens.js';
import { substitution } from '../ir/rules.js';
import type { GlyphSelector } from '../selectors/GlyphSelector.js';
import { BaseTransformer } from './BaseTransformer.js';
import { splitSequence, type SequenceItem } from './sequence.js';
import { definePlugin, defineVerb } from './types.js';

export interface SubstituteArgs {
  lhs: SequenceItem<GlyphSelector>[];
  rhs: GlyphSelector[];
  languages: LanguageSystem[];
}

class SubstituteTransformer extends BaseTransformer<SubstituteArgs> {
  action(args: SubstituteArgs): StatementValue {
    const { precontext, input, postcontext } = splitSequence(args.lhs, this.context.verb);
    const resolve = (selector: GlyphSelector): string[] => this.resolveSelector(selector);
    const rule = substitution(input.map(resolve), args.rhs.map(resolve), {
      precontext: precontext.map(resolve),
      postcontext: postcontext.map(resolve),
      languages: args.languages,
      address: this.address,
    });
    return { kind: 'rules', rules: [rule] };
  }
}

export const SubstituteVerb = defineVerb<SubstituteArgs>({
  name: 'Substitute',
  grammar(g, helpers) {
    const item = g.rule('substituteItem', () =>
      g.or<SequenceItem<GlyphSelector>>(0, [
        {
          ALT: () => {
            const open = g.consume(0, LParen);
            const entries: GlyphSelector[] = [];
            g.atLeastOne(0, () => {
              entries.push(g.subrule(0, helpers.glyphSelector));
            });
            g.consume(0, RParen);
            return g.action((): SequenceItem<GlyphSelector> => ({ group: true, entries, location: g.locate(open) }));
          },
        },
        {
          ALT: () => {
            const selector = g.subrule(1, helpers.glyphSelector);
            return g.action((): SequenceItem<GlyphSelector> => ({
              group: false,
              entries: [selector],
              location: selector.location,
            }));
          },
        },
      ])
    );

    return g.rule('substitute', () => {
      const lhs: SequenceItem<GlyphSelector>[] = [];
      const rhs: GlyphSelector[] = [];
      g.atLeastOne(0, () => {
        lhs.push(g.subrule(0, item));
      });
      g.consume(0, Arrow);
      g.many(0, () => {
        rhs.push(g.subrule(0, helpers.glyphSelector));
      });
      const languages = g.option(0, () => g.subrule(0, helpers.languages));
      return g.action((): SubstituteArgs => ({ lhs, rhs, languages: languages ?? [] }));
    });
  },
  transformer: context => new SubstituteTransformer(context),
});

export const SubstitutePlugin = definePlugin<undefined>({
  name: 'Substitute',
  options: { useHelpers: true },
  grammar: () => undefined,
  verbs: [SubstituteVerb],
});
