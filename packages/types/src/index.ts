/**
 * @layoutforge/types - Type definitions for the layoutforge rule compiler
 */

// Font model
export * from './font.js';

// Layout primitives (value records, language systems, lookup flags, locations)
export * from './layout.js';

// Logging contract
export * from './logging.js';
