// Public API - Core functionality used by the CLI
export * from './errors.js';
export * from './text-format.js';
export * from './escaping.js';
export * from './placeholders.js';
export * from './translation-entry.js';
export * from './translation.js';
export * from './translation-tree.js';
export * from './value-reader.js';
export * from './document-walker.js';
export * from './table/delimited-reader.js';
export * from './config/index.js';
export * from './translation-loader.js';

// Parsers
export * from './parsers/index.js';
