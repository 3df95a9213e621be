/**
 * Default configuration values for dotlex
 */

import type { ParsingConfig } from './types.js';

// ─────────────────────────────────────────────────────────────────────────────
// File Pattern Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_INCLUDE = ['**/*.{json,arb,csv,tsv}'];

export const DEFAULT_EXCLUDE = ['node_modules/**', 'dist/**', '**/dotlex.config.json', '**/package.json'];

// ─────────────────────────────────────────────────────────────────────────────
// Parsing Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_PARSING: ParsingConfig = {
  recognizeReferences: true,
  referenceMarker: '@',
  treatEmptyValuesAsAbsent: false,
  descriptionColumn: 'Description',
  csv: { separator: ',', textFormat: 'none' },
  tsv: { quotedFields: false, textFormat: 'none' },
  json: { textFormat: 'composite' },
  arb: { textFormat: 'arb' },
};

// ─────────────────────────────────────────────────────────────────────────────
// Other Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_CONFIG_VERSION = 1;
export const DEFAULT_TRANSLATIONS_DIR = '.';
export const DEFAULT_LOCALE_SEPARATOR = '_';
/** Key of the `translations` map that names the default file */
export const DEFAULT_TRANSLATION_KEY = '*';
export const DEFAULT_CONFIG_FILENAME = 'dotlex.config.json';
