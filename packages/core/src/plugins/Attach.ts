/**
 * Attach plugin - mark-to-base attachment from font anchors
 *
 *   Attach top _top @bases @marks;
 *
 * Glyphs lacking the named anchor are left out of the rule.
 */

import type { AnchorPoint } from '@layoutforge/types';
import type { StatementValue } from '../compiler/outcomes.js';
import { MissingAnchorWarning } from '../errors/LayoutError.js';
import { BareName } from '../grammar/tokens.js';
import { attachment } from '../ir/rules.js';
import type { GlyphSelector } from '../selectors/GlyphSelector.js';
import { BaseTransformer } from './BaseTransformer.js';
import { definePlugin, defineVerb } from './types.js';

export interface AttachArgs {
  baseAnchor: string;
  markAnchor: string;
  bases: GlyphSelector;
  marks: GlyphSelector;
}

class AttachTransformer extends BaseTransformer<AttachArgs> {
  action(args: AttachArgs): StatementValue {
    const bases = this.anchored(this.resolveSelector(args.bases), args.baseAnchor);
    const marks = this.anchored(this.resolveSelector(args.marks), args.markAnchor);
    const rule = attachment(args.baseAnchor, args.markAnchor, bases, marks, { address: this.address });
    return { kind: 'rules', rules: [rule] };
  }

  private anchored(glyphs: readonly string[], anchor: string): Record<string, AnchorPoint> {
    const points: Record<string, AnchorPoint> = {};
    for (const glyph of glyphs) {
      const point = this.context.font.anchors(glyph).get(anchor);
      if (point) {
        points[glyph] = point;
      } else {
        this.warn(new MissingAnchorWarning(glyph, anchor, this.address, this.errorContext));
      }
    }
    return points;
  }
}

export const AttachVerb = defineVerb<AttachArgs>({
  name: 'Attach',
  grammar(g, helpers) {
    return g.rule('attach', () => {
      const baseAnchor = g.consume(0, BareName);
      const markAnchor = g.consume(1, BareName);
      const bases = g.subrule(0, helpers.glyphSelector);
      const marks = g.subrule(1, helpers.glyphSelector);
      return g.action((): AttachArgs => ({
        baseAnchor: baseAnchor.image,
        markAnchor: markAnchor.image,
        bases,
        marks,
      }));
    });
  },
  transformer: context => new AttachTransformer(context),
});

export const AttachPlugin = definePlugin<undefined>({
  name: 'Attach',
  options: { useHelpers: true },
  grammar: () => undefined,
  verbs: [AttachVerb],
});
