/**
 * Parser Module Exports
 *
 * Provides the parser abstraction layer, the built-in formats and the
 * registry that maps file extensions to them.
 */

export * from './types.js';
export * from './base-parser.js';
export * from './table-parser.js';
export * from './csv-parser.js';
export * from './tsv-parser.js';
export * from './json-parser.js';
export * from './arb-parser.js';
export { decodeDocument } from './json-document.js';
export * from './registry.js';
