import type { AnchorPoint, FontModel, GlyphCategory, GlyphMetrics } from '@layoutforge/types';
import { ConfigError } from '../errors/LayoutError.js';

/**
 * One glyph of a font description.
 *
 * `bounds` is `[xMin, yMin, xMax, yMax]`; a glyph without bounds is empty
 * (all bounds zero). `exported` defaults to true.
 */
export interface GlyphDescription {
  name: string;
  codepoints?: number[];
  width: number;
  bounds?: [number, number, number, number];
  category?: GlyphCategory;
  anchors?: Record<string, AnchorPoint>;
  exported?: boolean;
}

/**
 * Font model backed by plain glyph descriptions.
 *
 * Cursive metrics come from the `entry` and `exit` anchors: `rise` is the
 * vertical distance from entry to exit, `run` the horizontal one (the
 * advance width when the glyph has no cursive anchors).
 */
export class InMemoryFont implements FontModel {
  readonly glyphOrder: readonly string[];
  private readonly glyphs = new Map<string, GlyphDescription>();
  private readonly cmap = new Map<number, string>();
  private readonly metricsCache = new Map<string, GlyphMetrics>();
  private readonly exported: readonly string[];

  constructor(glyphs: readonly GlyphDescription[]) {
    const order: string[] = [];
    for (const glyph of glyphs) {
      if (this.glyphs.has(glyph.name)) {
        throw new ConfigError(`Duplicate glyph '${glyph.name}' in font description`, 'ERR_FONT_INVALID');
      }
      this.glyphs.set(glyph.name, glyph);
      order.push(glyph.name);
      for (const codepoint of glyph.codepoints ?? []) {
        // First mapping wins, as in a cmap subtable
        if (!this.cmap.has(codepoint)) {
          this.cmap.set(codepoint, glyph.name);
        }
      }
    }
    this.glyphOrder = order;
    this.exported = order.filter(name => this.glyphs.get(name)?.exported !== false);
  }

  exportedGlyphs(): readonly string[] {
    return this.exported;
  }

  hasGlyph(name: string): boolean {
    return this.glyphs.has(name);
  }

  glyphForCodepoint(codepoint: number): string | undefined {
    return this.cmap.get(codepoint);
  }

  metrics(name: string): GlyphMetrics | undefined {
    const cached = this.metricsCache.get(name);
    if (cached) return cached;

    const glyph = this.glyphs.get(name);
    if (!glyph) return undefined;

    const [xMin, yMin, xMax, yMax] = glyph.bounds ?? [0, 0, 0, 0];
    const entry = glyph.anchors?.entry;
    const exit = glyph.anchors?.exit;
    const metrics: GlyphMetrics = {
      width: glyph.width,
      lsb: xMin,
      rsb: glyph.width - xMax,
      xMin,
      xMax,
      yMin,
      yMax,
      rise: entry && exit ? exit.y - entry.y : 0,
      run: entry && exit ? exit.x - entry.x : glyph.width,
      fullwidth: xMax - xMin,
    };
    this.metricsCache.set(name, metrics);
    return metrics;
  }

  category(name: string): GlyphCategory | undefined {
    return this.glyphs.get(name)?.category;
  }

  anchors(name: string): ReadonlyMap<string, AnchorPoint> {
    return new Map(Object.entries(this.glyphs.get(name)?.anchors ?? {}));
  }
}
