import { unescapeString } from './escaping.js';
import { DEFAULT_TEMPLATE_SYNTAXES, isTemplated, type TemplateSyntaxTable } from './placeholders.js';
import { usesBackslashEscaping, type TextFormat } from './text-format.js';
import {
  createLiteralEntry,
  createReferenceEntry,
  type EntryAnnotations,
  type TranslationEntry,
} from './translation-entry.js';

export const DEFAULT_REFERENCE_MARKER = '@';

export interface ValueReaderOptions {
  textFormat: TextFormat;
  /** Values starting with `referenceMarker` become references (default true) */
  recognizeReferences?: boolean;
  referenceMarker?: string;
  templateSyntaxes?: Readonly<TemplateSyntaxTable>;
  /**
   * Decode backslash escapes in modes that use them (default true). Off for
   * values a JSON decoder has already unescaped.
   */
  decodeEscapes?: boolean;
}

/**
 * Turn a raw value into an entry: a reference when it starts with the marker,
 * otherwise a literal classified with the configured text format.
 */
export function readEntryValue(
  key: string,
  raw: string,
  options: ValueReaderOptions,
  annotations: EntryAnnotations = {}
): TranslationEntry {
  const marker = options.referenceMarker ?? DEFAULT_REFERENCE_MARKER;
  if ((options.recognizeReferences ?? true) && marker.length > 0 && raw.startsWith(marker)) {
    return createReferenceEntry(key, raw.slice(marker.length), annotations);
  }

  const templated = isTemplated(raw, options.textFormat, options.templateSyntaxes ?? DEFAULT_TEMPLATE_SYNTAXES);
  if ((options.decodeEscapes ?? true) && usesBackslashEscaping(options.textFormat)) {
    const text = unescapeString(raw);
    if (text !== raw) {
      return createLiteralEntry(key, text, { ...annotations, escapedText: raw, isTemplated: templated });
    }
  }
  return createLiteralEntry(key, raw, { ...annotations, isTemplated: templated });
}
