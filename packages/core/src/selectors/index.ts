export { GlyphSelector, codepointText } from './GlyphSelector.js';
export type { SelectorBody, InlineMember, GlyphSuffix, SelectorScope, ResolveOptions } from './GlyphSelector.js';
