/**
 * Configuration module for dotlex
 *
 * This module handles loading, parsing, and normalizing configuration files.
 */

export type {
  CsvParsingConfig,
  TsvParsingConfig,
  DocumentParsingConfig,
  ParsingConfig,
  DotlexConfig,
  LoadConfigResult,
} from './types.js';

export {
  DEFAULT_INCLUDE,
  DEFAULT_EXCLUDE,
  DEFAULT_PARSING,
  DEFAULT_CONFIG_VERSION,
  DEFAULT_TRANSLATIONS_DIR,
  DEFAULT_LOCALE_SEPARATOR,
  DEFAULT_TRANSLATION_KEY,
  DEFAULT_CONFIG_FILENAME,
} from './defaults.js';

export {
  isRecord,
  ensureStringArray,
  ensureArray,
  normalizeOptionalString,
  normalizeTextFormat,
  normalizeConfigVersion,
  normalizeTranslations,
  normalizeParsingConfig,
  normalizeConfig,
} from './normalizer.js';

export { validateConfig, assertConfigValid, isSafeLanguageTag } from './validator.js';
export type { ConfigValidationIssue } from './validator.js';

export { findUp, resolveConfigPath, loadConfig, loadConfigWithMeta } from './loader.js';
export type { LoadConfigOptions } from './loader.js';
