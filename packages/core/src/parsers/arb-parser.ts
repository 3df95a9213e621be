import { DocumentWalker, isDocumentObject, type DocumentObject } from '../document-walker.js';
import { parsePlaceholder, type Placeholder } from '../placeholders.js';
import { Translation } from '../translation.js';
import type { EntryAnnotations } from '../translation-entry.js';
import { readEntryValue } from '../value-reader.js';
import { BaseTranslationParser, commonParserOptions, type ParserOptions } from './base-parser.js';
import { decodeDocument } from './json-document.js';
import type { ConfigParser, ParserSettings } from './types.js';

const ARB_LOCALE = '@@locale';
const ARB_CONTEXT = '@@context';
const ARB_AUTHOR = '@@author';
const ARB_LAST_MODIFIED = '@@last_modified';
const ARB_CUSTOM_PREFIX = '@@x-';

type TextAnnotation = 'description' | 'type' | 'context' | 'sourceText' | 'screen' | 'video';

const METADATA_FIELDS = new Map<string, TextAnnotation>([
  ['description', 'description'],
  ['type', 'type'],
  ['context', 'context'],
  ['source_text', 'sourceText'],
  ['screen', 'screen'],
  ['video', 'video'],
]);

/**
 * Walks ARB documents: `@`-prefixed strings are document metadata, `@key`
 * objects describe the entry `key`, and `key@attr` names a target attribute.
 */
class ArbDocumentWalker extends DocumentWalker {
  protected override skipStringField(name: string): boolean {
    return name.startsWith('@');
  }

  protected override skipObjectField(name: string): boolean {
    return name === '@';
  }

  protected override visitStringField(name: string, value: string, translation: Translation, groupName: string): void {
    const at = name.indexOf('@');
    if (at > 0 && at < name.length - 1) {
      const key = this.qualify(groupName, name.slice(0, at));
      translation.add(readEntryValue(key, value, this.options, { target: name.slice(at + 1) }));
      return;
    }
    super.visitStringField(name, value, translation, groupName);
  }

  protected override visitObjectField(
    name: string,
    value: DocumentObject,
    translation: Translation,
    groupName: string
  ): void {
    if (!name.startsWith('@')) {
      super.visitObjectField(name, value, translation, groupName);
      return;
    }
    // metadata for a key that has no value is dropped
    translation.annotate(this.qualify(groupName, name.slice(1).trim()), readEntryMetadata(value));
  }
}

function readEntryMetadata(record: DocumentObject): EntryAnnotations {
  const annotations: { -readonly [K in keyof EntryAnnotations]: EntryAnnotations[K] } = {};

  for (const [rawName, value] of Object.entries(record)) {
    const name = rawName.trim().toLowerCase();
    const field = METADATA_FIELDS.get(name);
    if (field && typeof value === 'string') {
      annotations[field] = value;
      continue;
    }
    if (name === 'placeholders' && isDocumentObject(value)) {
      const placeholders: Placeholder[] = [];
      for (const [placeholderName, definition] of Object.entries(value)) {
        if (isDocumentObject(definition)) {
          placeholders.push(parsePlaceholder(placeholderName, definition));
        }
      }
      annotations.placeholders = placeholders;
    }
  }

  return annotations;
}

/**
 * Top-level string fields by trimmed name, the way the walker names fields.
 * The first field wins when two names trim to the same one.
 */
function documentStrings(document: DocumentObject): Map<string, string> {
  const strings = new Map<string, string>();
  for (const [rawName, value] of Object.entries(document)) {
    const name = rawName.trim();
    if (typeof value === 'string' && !strings.has(name)) {
      strings.set(name, value);
    }
  }
  return strings;
}

function readString(strings: Map<string, string>, name: string): string | undefined {
  return strings.get(name)?.trim();
}

function parseTimestamp(value: string | undefined): Date | undefined {
  if (!value) {
    return undefined;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? undefined : date;
}

/**
 * Application Resource Bundle files (`.arb`).
 */
export class ArbParser extends BaseTranslationParser implements ConfigParser {
  readonly id = 'arb';
  readonly name = 'ARB';
  readonly extensions = ['.arb'];

  constructor(options: ParserOptions = {}) {
    super(options, 'arb');
  }

  static fromSettings(settings: ParserSettings): ArbParser {
    return new ArbParser({ ...commonParserOptions(settings), textFormat: settings.arb?.textFormat });
  }

  loadTranslation(content: string): Translation | null {
    if (!content.trim()) {
      return null;
    }
    const document = decodeDocument(content);
    const strings = documentStrings(document);

    const translation = new Translation({
      locale: readString(strings, ARB_LOCALE),
      context: readString(strings, ARB_CONTEXT),
      author: readString(strings, ARB_AUTHOR),
      lastModified: parseTimestamp(readString(strings, ARB_LAST_MODIFIED)),
    });

    for (const [name, value] of strings) {
      if (name.startsWith(ARB_CUSTOM_PREFIX) && name.length > ARB_CUSTOM_PREFIX.length) {
        translation.customProperties.set(name.slice(ARB_CUSTOM_PREFIX.length), value);
      }
    }

    return new ArbDocumentWalker(this.valueOptions).walk(document, translation);
  }

  parseConfiguration(content: string): Record<string, unknown> {
    return decodeDocument(content);
  }
}
