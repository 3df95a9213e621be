/**
 * Configuration normalization utilities
 *
 * These functions take raw/unknown input and return properly typed values,
 * applying defaults where necessary.
 */

import { isTextFormat, type TextFormat } from '../text-format.js';
import type { DotlexConfig, ParsingConfig } from './types.js';
import {
  DEFAULT_CONFIG_VERSION,
  DEFAULT_EXCLUDE,
  DEFAULT_INCLUDE,
  DEFAULT_LOCALE_SEPARATOR,
  DEFAULT_PARSING,
  DEFAULT_TRANSLATIONS_DIR,
} from './defaults.js';

// ─────────────────────────────────────────────────────────────────────────────
// Type Guards
// ─────────────────────────────────────────────────────────────────────────────

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

// ─────────────────────────────────────────────────────────────────────────────
// Array Utilities
// ─────────────────────────────────────────────────────────────────────────────

export function ensureStringArray(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value.filter((item): item is string => typeof item === 'string' && item.trim().length > 0);
  }

  if (typeof value === 'string' && value.trim().length > 0) {
    return value
      .split(',')
      .map((token) => token.trim())
      .filter(Boolean);
  }

  return [];
}

export function ensureArray(value: unknown, fallback: string[]): string[] {
  const normalized = ensureStringArray(value);
  return normalized.length ? normalized : [...fallback];
}

// ─────────────────────────────────────────────────────────────────────────────
// Primitive Normalizers
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeOptionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
}

function normalizeString(value: unknown, fallback: string): string {
  return normalizeOptionalString(value) ?? fallback;
}

function normalizeBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

export function normalizeTextFormat(value: unknown, fallback: TextFormat): TextFormat {
  return isTextFormat(value) ? value : fallback;
}

export function normalizeConfigVersion(value: unknown): number {
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    return DEFAULT_CONFIG_VERSION;
  }
  return Math.floor(value);
}

/**
 * Trim keys and values and lower-case the locale names. Non-string values are dropped.
 */
export function normalizeTranslations(value: unknown): Record<string, string> {
  const result: Record<string, string> = {};
  if (!isRecord(value)) {
    return result;
  }
  for (const [locale, file] of Object.entries(value)) {
    const name = locale.trim().toLowerCase();
    if (name && typeof file === 'string') {
      result[name] = file.trim();
    }
  }
  return result;
}

// ─────────────────────────────────────────────────────────────────────────────
// Section Normalizers
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeParsingConfig(value: unknown): ParsingConfig {
  const raw = isRecord(value) ? value : {};
  const csv = isRecord(raw.csv) ? raw.csv : {};
  const tsv = isRecord(raw.tsv) ? raw.tsv : {};
  const json = isRecord(raw.json) ? raw.json : {};
  const arb = isRecord(raw.arb) ? raw.arb : {};

  return {
    recognizeReferences: normalizeBoolean(raw.recognizeReferences, DEFAULT_PARSING.recognizeReferences),
    // an empty marker is kept: it turns reference recognition off
    referenceMarker:
      typeof raw.referenceMarker === 'string' ? raw.referenceMarker.trim() : DEFAULT_PARSING.referenceMarker,
    treatEmptyValuesAsAbsent: normalizeBoolean(raw.treatEmptyValuesAsAbsent, DEFAULT_PARSING.treatEmptyValuesAsAbsent),
    descriptionColumn: normalizeString(raw.descriptionColumn, DEFAULT_PARSING.descriptionColumn),
    csv: {
      // not trimmed: a tab is a valid separator
      separator: typeof csv.separator === 'string' && csv.separator.length ? csv.separator : DEFAULT_PARSING.csv.separator,
      textFormat: normalizeTextFormat(csv.textFormat, DEFAULT_PARSING.csv.textFormat),
    },
    tsv: {
      quotedFields: normalizeBoolean(tsv.quotedFields, DEFAULT_PARSING.tsv.quotedFields),
      textFormat: normalizeTextFormat(tsv.textFormat, DEFAULT_PARSING.tsv.textFormat),
    },
    json: { textFormat: normalizeTextFormat(json.textFormat, DEFAULT_PARSING.json.textFormat) },
    arb: { textFormat: normalizeTextFormat(arb.textFormat, DEFAULT_PARSING.arb.textFormat) },
  };
}

export function normalizeConfig(parsed: Record<string, unknown> = {}): DotlexConfig {
  return {
    configVersion: normalizeConfigVersion(parsed.configVersion),
    defaultFile: normalizeOptionalString(parsed.defaultFile),
    defaultLocale: normalizeOptionalString(parsed.defaultLocale),
    translationsDir: normalizeString(parsed.translationsDir, DEFAULT_TRANSLATIONS_DIR),
    translations: normalizeTranslations(parsed.translations),
    localeSeparator:
      typeof parsed.localeSeparator === 'string' ? parsed.localeSeparator : DEFAULT_LOCALE_SEPARATOR,
    include: ensureArray(parsed.include, DEFAULT_INCLUDE),
    exclude: ensureArray(parsed.exclude, DEFAULT_EXCLUDE),
    parsing: normalizeParsingConfig(parsed.parsing),
  };
}
