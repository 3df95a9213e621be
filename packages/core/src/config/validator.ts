import { ConfigError } from '../errors.js';
import { DEFAULT_CONFIG_VERSION, DEFAULT_TRANSLATION_KEY } from './defaults.js';
import type { DotlexConfig } from './types.js';

export interface ConfigValidationIssue {
  field: string;
  message: string;
}

function containsControlCharacters(value: string): boolean {
  for (let index = 0; index < value.length; index += 1) {
    const code = value.charCodeAt(index);
    if (code < 0x20 || code === 0x7f) {
      return true;
    }
  }
  return false;
}

const LANGUAGE_TAG_PATTERN = /^[A-Za-z0-9]+(?:[-_][A-Za-z0-9]+)*$/;
const MAX_PATH_LIKE_LENGTH = 320;
const MAX_GLOB_LENGTH = 512;

export function isSafeLanguageTag(value: string): boolean {
  return LANGUAGE_TAG_PATTERN.test(value);
}

function validatePathLike(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
    return;
  }
  if (value.length > MAX_PATH_LIKE_LENGTH) {
    issues.push({ field, message: `must be shorter than ${MAX_PATH_LIKE_LENGTH} characters` });
    return;
  }
  if (containsControlCharacters(value)) {
    issues.push({ field, message: 'contains control characters' });
  }
}

function validateLanguage(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!isSafeLanguageTag(value)) {
    issues.push({ field, message: 'must be an alphanumeric language tag (letters, numbers, "-", "_")' });
  }
}

function validateStringList(field: string, values: string[], issues: ConfigValidationIssue[]) {
  values.forEach((entry, index) => {
    const targetField = `${field}[${index}]`;
    if (entry.length > MAX_GLOB_LENGTH) {
      issues.push({ field: targetField, message: `must be shorter than ${MAX_GLOB_LENGTH} characters` });
      return;
    }
    if (containsControlCharacters(entry)) {
      issues.push({ field: targetField, message: 'contains control characters' });
    }
  });
}

export function validateConfig(config: DotlexConfig): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];

  if (config.configVersion !== DEFAULT_CONFIG_VERSION) {
    issues.push({ field: 'configVersion', message: `unsupported version ${config.configVersion}` });
  }

  if (config.defaultFile !== undefined) {
    validatePathLike('defaultFile', config.defaultFile, issues);
  }
  if (config.defaultLocale !== undefined) {
    validateLanguage('defaultLocale', config.defaultLocale, issues);
  }
  validatePathLike('translationsDir', config.translationsDir, issues);

  for (const [locale, file] of Object.entries(config.translations)) {
    const field = `translations.${locale}`;
    if (locale !== DEFAULT_TRANSLATION_KEY) {
      validateLanguage(field, locale, issues);
    }
    validatePathLike(field, file, issues);
  }

  if (!config.localeSeparator || containsControlCharacters(config.localeSeparator)) {
    issues.push({ field: 'localeSeparator', message: 'must be a non-empty printable string' });
  }

  validateStringList('include', config.include, issues);
  validateStringList('exclude', config.exclude, issues);

  const { parsing } = config;
  if (parsing.csv.separator.length !== 1) {
    issues.push({ field: 'parsing.csv.separator', message: 'must be exactly one character' });
  } else if (parsing.csv.separator === '"') {
    issues.push({ field: 'parsing.csv.separator', message: 'must not be a double quote' });
  } else if (parsing.csv.separator === '\r' || parsing.csv.separator === '\n') {
    issues.push({ field: 'parsing.csv.separator', message: 'must not be a line break' });
  }
  if (containsControlCharacters(parsing.referenceMarker)) {
    issues.push({ field: 'parsing.referenceMarker', message: 'contains control characters' });
  }

  return issues;
}

export function assertConfigValid(config: DotlexConfig): void {
  const issues = validateConfig(config);
  if (!issues.length) {
    return;
  }

  const details = issues.map((issue) => `• ${issue.field}: ${issue.message}`).join('\n');
  throw new ConfigError(`Invalid dotlex configuration:\n${details}`);
}
