import { UnsupportedFormatError } from '../errors.js';
import { ArbParser } from './arb-parser.js';
import { CsvParser } from './csv-parser.js';
import { JsonParser } from './json-parser.js';
import { TsvParser } from './tsv-parser.js';
import type { ConfigParser, ConfigParserFactory, ParserFactory, ParserSettings, TranslationParser } from './types.js';

const normalizeExtension = (extension: string): string => {
  const lowered = extension.trim().toLowerCase();
  return lowered.startsWith('.') ? lowered : `.${lowered}`;
};

/**
 * Maps file extensions to parser factories. The first registration of an
 * extension wins; later ones are ignored.
 */
export class FileFormatRegistry {
  private parsers = new Map<string, ParserFactory>();
  private configParsers = new Map<string, ConfigParserFactory>();

  /**
   * Register a translation parser factory.
   * @returns false when the extension was already taken
   */
  registerParser(extension: string, factory: ParserFactory): boolean {
    const key = normalizeExtension(extension);
    if (this.parsers.has(key)) {
      return false;
    }
    this.parsers.set(key, factory);
    return true;
  }

  registerConfigParser(extension: string, factory: ConfigParserFactory): boolean {
    const key = normalizeExtension(extension);
    if (this.configParsers.has(key)) {
      return false;
    }
    this.configParsers.set(key, factory);
    return true;
  }

  hasParser(extension: string): boolean {
    return this.parsers.has(normalizeExtension(extension));
  }

  /**
   * Create the parser for a file extension.
   * @throws UnsupportedFormatError when no parser is registered
   */
  getParser(extension: string, settings: ParserSettings = {}): TranslationParser {
    const factory = this.parsers.get(normalizeExtension(extension));
    if (!factory) {
      throw new UnsupportedFormatError(extension);
    }
    return factory(settings);
  }

  getConfigParser(extension: string): ConfigParser {
    const factory = this.configParsers.get(normalizeExtension(extension));
    if (!factory) {
      throw new UnsupportedFormatError(
        extension,
        `No configuration parser registered for the '${extension}' file extension`
      );
    }
    return factory();
  }

  /** Extensions with a translation parser, in registration order */
  getSupportedExtensions(): string[] {
    return Array.from(this.parsers.keys());
  }

  getSupportedConfigExtensions(): string[] {
    return Array.from(this.configParsers.keys());
  }

  clear(): void {
    this.parsers.clear();
    this.configParsers.clear();
  }
}

/**
 * Process-wide registry. Empty until `registerBuiltinFormats()` is called.
 */
export const fileFormats = new FileFormatRegistry();

/**
 * Register the CSV, TSV, JSON and ARB parsers. Already registered extensions
 * keep their parser.
 */
export function registerBuiltinFormats(registry: FileFormatRegistry = fileFormats): FileFormatRegistry {
  registry.registerParser('.csv', CsvParser.fromSettings);
  registry.registerParser('.tsv', TsvParser.fromSettings);
  registry.registerParser('.json', JsonParser.fromSettings);
  registry.registerParser('.arb', ArbParser.fromSettings);

  registry.registerConfigParser('.json', () => new JsonParser());
  registry.registerConfigParser('.jsoncfg', () => new JsonParser());
  registry.registerConfigParser('.arbcfg', () => new ArbParser());
  return registry;
}

export function resetFileFormats(): void {
  fileFormats.clear();
}

/**
 * Create a registry holding the built-in formats.
 */
export function createDefaultFileFormatRegistry(): FileFormatRegistry {
  return registerBuiltinFormats(new FileFormatRegistry());
}
