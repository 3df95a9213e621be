import { DocumentWalker } from '../document-walker.js';
import { Translation } from '../translation.js';
import { BaseTranslationParser, commonParserOptions, type ParserOptions } from './base-parser.js';
import { decodeDocument } from './json-document.js';
import type { ConfigParser, ParserSettings } from './types.js';

/**
 * Nested JSON objects whose string fields are entries and whose object fields
 * are groups. Uses `{0}` / `{name}` placeholders unless configured otherwise.
 */
export class JsonParser extends BaseTranslationParser implements ConfigParser {
  readonly id = 'json';
  readonly name = 'JSON';
  readonly extensions = ['.json'];

  constructor(options: ParserOptions = {}) {
    super(options, 'composite');
  }

  static fromSettings(settings: ParserSettings): JsonParser {
    return new JsonParser({ ...commonParserOptions(settings), textFormat: settings.json?.textFormat });
  }

  loadTranslation(content: string): Translation | null {
    if (!content.trim()) {
      return null;
    }
    const document = decodeDocument(content);
    // JSON.parse has already decoded the escapes
    return new DocumentWalker({ ...this.valueOptions, decodeEscapes: false }).walk(document, new Translation());
  }

  parseConfiguration(content: string): Record<string, unknown> {
    return decodeDocument(content);
  }
}
