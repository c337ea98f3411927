/**
 * Debug plugin - inspect classes while writing rules
 *
 * Output goes to the session diagnostics as info entries and to the logger.
 * Nothing here changes the IR.
 */

import type { StatementValue } from '../compiler/outcomes.js';
import { GlyphSelector } from '../selectors/GlyphSelector.js';
import { BaseTransformer } from './BaseTransformer.js';
import { definePlugin, defineVerb } from './types.js';

abstract class DebugTransformer<TArgs> extends BaseTransformer<TArgs> {
  protected showClass(selector: GlyphSelector): void {
    const glyphs = this.resolveSelector(selector);
    this.report('INFO_SHOW_CLASS', `${selector.asText()} = ${glyphs.join(' ')}`);
  }
}

class ShowClassTransformer extends DebugTransformer<GlyphSelector> {
  action(selector: GlyphSelector): StatementValue {
    this.showClass(selector);
    return { kind: 'none' };
  }
}

class DumpClassNamesTransformer extends DebugTransformer<unknown> {
  action(): StatementValue {
    this.report('INFO_CLASS_NAMES', [...this.context.fontFeatures.namedClasses.keys()].join(' '));
    return { kind: 'none' };
  }
}

class DumpClassesTransformer extends DebugTransformer<unknown> {
  action(): StatementValue {
    for (const name of this.context.fontFeatures.namedClasses.keys()) {
      this.showClass(new GlyphSelector({ kind: 'classname', name }, [], this.context.location));
    }
    return { kind: 'none' };
  }
}

export const ShowClass = defineVerb<GlyphSelector>({
  name: 'ShowClass',
  grammar: (g, helpers) => helpers.glyphSelector,
  transformer: context => new ShowClassTransformer(context),
});

export const DumpClassNames = defineVerb<unknown>({
  name: 'DumpClassNames',
  transformer: context => new DumpClassNamesTransformer(context),
});

export const DumpClasses = defineVerb<unknown>({
  name: 'DumpClasses',
  transformer: context => new DumpClassesTransformer(context),
});

export const DebugPlugin = definePlugin<undefined>({
  name: 'Debug',
  options: { useHelpers: true },
  grammar: () => undefined,
  verbs: [ShowClass, DumpClassNames, DumpClasses],
});
