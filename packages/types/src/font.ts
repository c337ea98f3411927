/**
 * Font model types - the read-only view of a font the compiler works against
 */

// === METRICS ===
/**
 * Glyph metrics available to class predicates and binning.
 * Order matters only for display.
 */
export const METRIC_NAMES = [
  'width',
  'lsb',
  'rsb',
  'xMin',
  'xMax',
  'yMin',
  'yMax',
  'rise',
  'run',
  'fullwidth',
] as const;

export type MetricName = typeof METRIC_NAMES[number];

export type GlyphMetrics = Record<MetricName, number>;

export function isMetricName(name: string): name is MetricName {
  return METRIC_NAMES.some(metric => metric === name);
}

// === CATEGORIES ===
export const GLYPH_CATEGORIES = ['base', 'mark', 'ligature', 'component'] as const;

export type GlyphCategory = typeof GLYPH_CATEGORIES[number];

export function isGlyphCategory(name: string): name is GlyphCategory {
  return GLYPH_CATEGORIES.some(category => category === name);
}

// === ANCHORS ===
export interface AnchorPoint {
  x: number;
  y: number;
}

// === FONT MODEL ===
/**
 * Read-only font interface.
 *
 * `glyphOrder` is every glyph in the font; `exportedGlyphs()` is the subset
 * that ends up in the binary (regex selectors and existence checks use it).
 */
export interface FontModel {
  readonly glyphOrder: readonly string[];
  exportedGlyphs(): readonly string[];
  hasGlyph(name: string): boolean;
  glyphForCodepoint(codepoint: number): string | undefined;
  /** Undefined for glyphs the font does not contain */
  metrics(name: string): GlyphMetrics | undefined;
  category(name: string): GlyphCategory | undefined;
  anchors(name: string): ReadonlyMap<string, AnchorPoint>;
}
