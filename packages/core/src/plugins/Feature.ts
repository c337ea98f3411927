/**
 * Feature plugin - `Feature tag { statements };`
 *
 * Each run of consecutive rules in the body becomes one anonymous routine;
 * routines defined in the body keep their place. Everything is appended
 * to the feature tag in source order.
 */

import type { StatementValue } from '../compiler/outcomes.js';
import { RuleSyntaxError } from '../errors/LayoutError.js';
import { BareName } from '../grammar/tokens.js';
import { Routine } from '../ir/Routine.js';
import { BaseTransformer } from './BaseTransformer.js';
import { bodyValues } from './blockBody.js';
import { definePlugin, defineVerb, type BlockArguments } from './types.js';

const FEATURE_TAG = /^[A-Za-z0-9_ ]{1,4}$/;

class FeatureTransformer extends BaseTransformer<unknown, string, undefined> {
  blockAction(block: BlockArguments<string, undefined>): StatementValue {
    const tag = block.before;
    const routines: Routine[] = [];
    let loose: Routine | undefined;

    for (const value of bodyValues(block, this.context.verb)) {
      if (value.kind === 'rules') {
        loose ??= new Routine({ address: this.address });
        for (const rule of value.rules) loose.addRule(rule);
      } else if (value.kind === 'routine') {
        if (loose) routines.push(loose.close());
        loose = undefined;
        routines.push(value.routine);
      }
    }
    if (loose) routines.push(loose.close());

    this.context.fontFeatures.addFeature(tag, routines);
    this.logger.debug(`Feature ${tag}`, { routines: routines.length });
    return { kind: 'feature', tag, routines };
  }
}

export const FeatureVerb = defineVerb<unknown, undefined, string, undefined>({
  name: 'Feature',
  beforeBraceGrammar(g) {
    return g.rule('featureTag', () => {
      const tag = g.consume(0, BareName);
      return g.action(() => {
        if (!FEATURE_TAG.test(tag.image)) {
          const { file, line, column } = g.locate(tag);
          throw new RuleSyntaxError(
            `Feature tag must be 1 to 4 characters, got '${tag.image}'`,
            'ERR_SYNTAX',
            { file, line, column, verb: 'Feature' }
          );
        }
        return tag.image;
      });
    });
  },
  transformer: context => new FeatureTransformer(context),
});

export const FeaturePlugin = definePlugin<undefined>({
  name: 'Feature',
  options: { useHelpers: true },
  grammar: () => undefined,
  verbs: [FeatureVerb],
});
