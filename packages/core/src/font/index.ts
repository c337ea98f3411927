export { InMemoryFont } from './InMemoryFont.js';
export type { GlyphDescription } from './InMemoryFont.js';
export { loadFontDescription, parseFontDescription } from './FontLoader.js';
