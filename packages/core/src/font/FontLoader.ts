/**
 * Font description loading.
 *
 * A font description is a YAML (or JSON) document listing glyphs in font
 * order:
 *
 * ```yaml
 * glyphs:
 *   - name: A
 *     codepoints: [U+0041]
 *     width: 600
 *     bounds: [10, 0, 590, 700]
 *     category: base
 *     anchors:
 *       top: [300, 700]
 *   - name: acutecomb
 *     codepoints: [0x0301]
 *     width: 0
 *     category: mark
 *     anchors:
 *       _top: { x: 0, y: 700 }
 * ```
 */

import { readFileSync } from 'fs';
import { parse as parseYAML } from 'yaml';
import { isGlyphCategory, type AnchorPoint } from '@layoutforge/types';
import { ConfigError, FileAccessError } from '../errors/LayoutError.js';
import { InMemoryFont, type GlyphDescription } from './InMemoryFont.js';

function fail(message: string, source: string): never {
  throw new ConfigError(`Font description error: ${message}`, 'ERR_FONT_INVALID', { file: source });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseCodepoint(value: unknown, where: string, source: string): number {
  if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
    return value;
  }
  if (typeof value === 'string') {
    const match = /^(?:U\+|0x)([0-9A-Fa-f]{1,6})$/.exec(value);
    if (match) {
      return parseInt(match[1], 16);
    }
  }
  return fail(`${where} must be a codepoint (number, "U+XXXX" or "0xXXXX"), got ${JSON.stringify(value)}`, source);
}

function parseAnchor(value: unknown, where: string, source: string): AnchorPoint {
  if (Array.isArray(value) && value.length === 2 && typeof value[0] === 'number' && typeof value[1] === 'number') {
    return { x: value[0], y: value[1] };
  }
  if (isRecord(value) && typeof value.x === 'number' && typeof value.y === 'number') {
    return { x: value.x, y: value.y };
  }
  return fail(`${where} must be [x, y] or { x, y }`, source);
}

function parseBounds(value: unknown, where: string, source: string): [number, number, number, number] {
  if (Array.isArray(value) && value.length === 4) {
    const [xMin, yMin, xMax, yMax]: unknown[] = value;
    if (typeof xMin === 'number' && typeof yMin === 'number' && typeof xMax === 'number' && typeof yMax === 'number') {
      return [xMin, yMin, xMax, yMax];
    }
  }
  return fail(`${where} must be [xMin, yMin, xMax, yMax]`, source);
}

function parseGlyph(raw: unknown, index: number, source: string): GlyphDescription {
  const where = `glyphs[${index}]`;
  if (!isRecord(raw)) {
    return fail(`${where} must be a mapping`, source);
  }
  if (typeof raw.name !== 'string' || !raw.name.trim()) {
    return fail(`${where}.name must be a non-empty string`, source);
  }
  if (typeof raw.width !== 'number') {
    return fail(`${where}.width must be a number`, source);
  }

  const glyph: GlyphDescription = { name: raw.name, width: raw.width };

  if (raw.codepoints !== undefined) {
    if (!Array.isArray(raw.codepoints)) {
      return fail(`${where}.codepoints must be an array`, source);
    }
    glyph.codepoints = raw.codepoints.map((cp: unknown, i: number) => parseCodepoint(cp, `${where}.codepoints[${i}]`, source));
  }
  if (raw.bounds !== undefined) {
    glyph.bounds = parseBounds(raw.bounds, `${where}.bounds`, source);
  }
  if (raw.category !== undefined) {
    if (typeof raw.category !== 'string' || !isGlyphCategory(raw.category)) {
      return fail(`${where}.category must be one of base, mark, ligature, component`, source);
    }
    glyph.category = raw.category;
  }
  if (raw.anchors !== undefined) {
    if (!isRecord(raw.anchors)) {
      return fail(`${where}.anchors must be a mapping`, source);
    }
    const anchors: Record<string, AnchorPoint> = {};
    for (const [name, point] of Object.entries(raw.anchors)) {
      anchors[name] = parseAnchor(point, `${where}.anchors.${name}`, source);
    }
    glyph.anchors = anchors;
  }
  if (raw.exported !== undefined) {
    if (typeof raw.exported !== 'boolean') {
      return fail(`${where}.exported must be a boolean`, source);
    }
    glyph.exported = raw.exported;
  }
  return glyph;
}

/**
 * Build a font from an already-parsed description document.
 */
export function parseFontDescription(document: unknown, source: string = '<font>'): InMemoryFont {
  if (!isRecord(document) || !Array.isArray(document.glyphs)) {
    return fail('document must contain a "glyphs" list', source);
  }
  const glyphs = document.glyphs.map((raw: unknown, index: number) => parseGlyph(raw, index, source));
  try {
    return new InMemoryFont(glyphs);
  } catch (err) {
    if (err instanceof ConfigError) {
      return fail(err.message, source);
    }
    throw err;
  }
}

/**
 * Read a YAML or JSON font description from disk.
 */
export function loadFontDescription(path: string): InMemoryFont {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new FileAccessError(`Cannot read font description ${path}: ${message}`, 'ERR_FILE_UNREADABLE', { file: path });
  }

  let document: unknown;
  try {
    document = parseYAML(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return fail(`cannot parse ${path}: ${message}`, path);
  }
  return parseFontDescription(document, path);
}
