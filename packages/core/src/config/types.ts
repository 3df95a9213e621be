/**
 * Configuration type definitions for dotlex
 */

import type { TextFormat } from '../text-format.js';

// ─────────────────────────────────────────────────────────────────────────────
// Parsing Configuration
// ─────────────────────────────────────────────────────────────────────────────

export interface CsvParsingConfig {
  /** Single-character cell separator */
  separator: string;
  textFormat: TextFormat;
}

export interface TsvParsingConfig {
  /** Whether a `"` at the start of a cell opens a quoted cell */
  quotedFields: boolean;
  textFormat: TextFormat;
}

export interface DocumentParsingConfig {
  textFormat: TextFormat;
}

export interface ParsingConfig {
  /**
   * Treat values starting with `referenceMarker` as references to other keys.
   * Defaults to true.
   */
  recognizeReferences: boolean;
  referenceMarker: string;
  /** Skip table rows whose value cell is empty instead of storing "" */
  treatEmptyValuesAsAbsent: boolean;
  /** Caption of the table column holding descriptions */
  descriptionColumn: string;
  csv: CsvParsingConfig;
  tsv: TsvParsingConfig;
  json: DocumentParsingConfig;
  arb: DocumentParsingConfig;
}

// ─────────────────────────────────────────────────────────────────────────────
// Main Configuration Interface
// ─────────────────────────────────────────────────────────────────────────────

export interface DotlexConfig {
  /**
   * Configuration schema version. Defaults to 1 when omitted.
   */
  configVersion: number;
  /**
   * Translation file holding the default locale, relative to `translationsDir`
   */
  defaultFile?: string;
  defaultLocale?: string;
  /**
   * Directory translation files are resolved against, relative to the project root
   */
  translationsDir: string;
  /**
   * Explicit locale → file mapping. Keys are lower-cased; `*` names the default file.
   */
  translations: Record<string, string>;
  /**
   * Joins the default file's base name and a locale in locale-specific file names
   * (`Strings_de.json`)
   */
  localeSeparator: string;
  include: string[];
  exclude: string[];
  parsing: ParsingConfig;
}

export interface LoadConfigResult {
  config: DotlexConfig;
  configPath: string;
  projectRoot: string;
}
