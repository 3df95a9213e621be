/**
 * Parser Abstraction Layer
 *
 * Provides a uniform interface for reading translation files of different
 * formats. Callers pick a parser by file extension through the
 * FileFormatRegistry and never need to know the format's details.
 */

import type { TemplateSyntaxTable } from '../placeholders.js';
import type { TextFormat } from '../text-format.js';
import type { Translation } from '../translation.js';
import type { TranslationTree } from '../translation-tree.js';

/**
 * Decides whether a table column caption names the requested locale.
 * Consulted after the exact (case-insensitive) comparison fails.
 */
export type LocaleMatcher = (caption: string, locale: string) => boolean;

/**
 * Settings handed to parser factories. Every field is optional; parsers fall
 * back to their own defaults.
 */
export interface ParserSettings {
  recognizeReferences?: boolean;
  referenceMarker?: string;
  treatEmptyValuesAsAbsent?: boolean;
  /** Caption of the table column holding entry descriptions */
  descriptionColumn?: string;
  csv?: { separator?: string; textFormat?: TextFormat };
  tsv?: { quotedFields?: boolean; textFormat?: TextFormat };
  json?: { textFormat?: TextFormat };
  arb?: { textFormat?: TextFormat };
  /** Replacement placeholder detectors, per text format */
  templateSyntaxes?: Partial<TemplateSyntaxTable>;
  matchLocale?: LocaleMatcher;
}

/**
 * Core parser interface that all translation file parsers implement.
 */
export interface TranslationParser {
  /** Unique parser identifier (e.g., 'csv', 'arb') */
  readonly id: string;

  /** Human-readable name */
  readonly name: string;

  /** File extensions this parser can handle, lower-case with the leading dot */
  readonly extensions: readonly string[];

  readonly textFormat: TextFormat;

  canHandle(extension: string): boolean;

  /**
   * Parse file content into a translation.
   * @param locale Locale to pick from multi-locale formats; ignored by single-locale ones
   * @returns null when the content holds nothing for the locale
   */
  loadTranslation(content: string, locale?: string): Translation | null;

  /**
   * Parse file content into its key tree.
   * @returns null when the content holds no translation
   */
  loadStructure(content: string): TranslationTree | null;
}

/**
 * Parser of project configuration files.
 */
export interface ConfigParser {
  readonly id: string;
  parseConfiguration(content: string): Record<string, unknown>;
}

export type ParserFactory = (settings: ParserSettings) => TranslationParser;
export type ConfigParserFactory = () => ConfigParser;
