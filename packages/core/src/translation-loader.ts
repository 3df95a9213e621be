import fs from 'fs/promises';
import path from 'path';
import fg from 'fast-glob';
import { DEFAULT_TRANSLATION_KEY } from './config/defaults.js';
import type { DotlexConfig } from './config/types.js';
import { ConfigError, TranslationFileError } from './errors.js';
import type { TemplateSyntaxTable } from './placeholders.js';
import { createDefaultFileFormatRegistry, type FileFormatRegistry } from './parsers/registry.js';
import { TableParser } from './parsers/table-parser.js';
import type { LocaleMatcher, ParserSettings, TranslationParser } from './parsers/types.js';
import type { Translation } from './translation.js';
import type { TranslationTree } from './translation-tree.js';

export interface TranslationLoaderOptions {
  /** Directory the config file lives in; relative paths resolve against it */
  projectRoot: string;
  registry?: FileFormatRegistry;
  matchLocale?: LocaleMatcher;
  templateSyntaxes?: Partial<TemplateSyntaxTable>;
}

/**
 * Loads the translation files of one project, picking parsers by extension
 * and locale files by the configured naming rules.
 */
export class TranslationLoader {
  private readonly registry: FileFormatRegistry;
  private readonly projectRoot: string;
  private readonly settings: ParserSettings;

  constructor(private readonly config: DotlexConfig, options: TranslationLoaderOptions) {
    this.projectRoot = path.resolve(options.projectRoot);
    this.registry = options.registry ?? createDefaultFileFormatRegistry();
    this.settings = {
      ...config.parsing,
      matchLocale: options.matchLocale,
      templateSyntaxes: options.templateSyntaxes,
    };
  }

  get translationsRoot(): string {
    return path.resolve(this.projectRoot, this.config.translationsDir);
  }

  resolvePath(filePath: string): string {
    return path.resolve(this.translationsRoot, filePath);
  }

  getParser(filePath: string): TranslationParser {
    return this.registry.getParser(path.extname(filePath), this.settings);
  }

  /**
   * Read and parse one file.
   * @param locale Column to read from table files
   * @throws UnsupportedFormatError for extensions without a parser
   * @throws TranslationFileError when reading or parsing fails
   */
  async loadFile(filePath: string, locale?: string): Promise<Translation | null> {
    const resolved = this.resolvePath(filePath);
    const parser = this.getParser(resolved);
    const content = await this.readFile(resolved);

    let translation: Translation | null;
    try {
      translation = parser.loadTranslation(content, locale);
    } catch (error) {
      throw TranslationFileError.wrap(resolved, error);
    }

    if (translation) {
      translation.originalFile = resolved;
    }
    return translation;
  }

  async loadFileStructure(filePath: string): Promise<TranslationTree | null> {
    const resolved = this.resolvePath(filePath);
    const parser = this.getParser(resolved);
    const content = await this.readFile(resolved);

    try {
      return parser.loadStructure(content);
    } catch (error) {
      throw TranslationFileError.wrap(resolved, error);
    }
  }

  /**
   * Key tree of the default file.
   */
  async loadStructure(): Promise<TranslationTree> {
    const defaultFile = this.requireDefaultFile();
    const tree = await this.loadFileStructure(defaultFile);
    if (!tree) {
      throw new TranslationFileError(this.resolvePath(defaultFile), 'The file holds no translations');
    }
    return tree;
  }

  /**
   * Translation for a locale, or the default file's when no locale is given.
   * Looks at the `translations` map, then at locale-specific sibling files,
   * then at the columns of a table default file.
   * @returns null when nothing provides the locale
   */
  async loadTranslation(locale?: string): Promise<Translation | null> {
    const defaultFile = this.requireDefaultFile();
    const wanted = locale?.trim();
    if (!wanted) {
      return this.loadFile(defaultFile);
    }

    const mapped = this.lookupTranslationFile(wanted);
    if (mapped) {
      return this.loadFile(mapped, wanted);
    }

    const sibling = await this.findLocaleFile(wanted);
    if (sibling) {
      return this.loadFile(sibling, wanted);
    }

    if (this.getParser(defaultFile) instanceof TableParser) {
      return this.loadFile(defaultFile, wanted);
    }

    if (this.config.defaultLocale?.toLowerCase() === wanted.toLowerCase()) {
      return this.loadFile(defaultFile);
    }

    return null;
  }

  /**
   * File named for a locale in the `translations` map.
   */
  lookupTranslationFile(locale: string): string | undefined {
    const key = locale.trim().toLowerCase();
    if (key === DEFAULT_TRANSLATION_KEY) {
      return this.config.translations[DEFAULT_TRANSLATION_KEY] ?? this.config.defaultFile;
    }
    return this.config.translations[key];
  }

  /**
   * Sibling of the default file named `<base><separator><locale><ext>`,
   * matched case-insensitively. `de-AT` falls back to a `de` file.
   */
  async findLocaleFile(locale: string): Promise<string | null> {
    const defaultFile = this.requireDefaultFile();
    const extension = path.extname(defaultFile);
    const base = path.basename(defaultFile, extension);
    const directory = path.dirname(this.resolvePath(defaultFile));

    const candidates = [locale];
    const language = locale.split(/[-_]/)[0];
    if (language && language !== locale) {
      candidates.push(language);
    }

    for (const candidate of candidates) {
      const name = `${base}${this.config.localeSeparator}${candidate}${extension}`;
      const matches = await fg(fg.escapePath(name), {
        cwd: directory,
        onlyFiles: true,
        caseSensitiveMatch: false,
        deep: 1,
        absolute: true,
      });
      if (matches.length) {
        return matches.sort((a, b) => a.localeCompare(b))[0];
      }
    }

    return null;
  }

  /**
   * Files matched by the given patterns (the configured `include` by default)
   * that a registered parser can read, as absolute paths.
   */
  async resolveTranslationFiles(patterns: string[] = this.config.include): Promise<string[]> {
    const files = await fg(patterns, {
      cwd: this.projectRoot,
      ignore: this.config.exclude,
      onlyFiles: true,
      unique: true,
      absolute: true,
      suppressErrors: true,
    });

    return files
      .filter((file) => this.registry.hasParser(path.extname(file)))
      .sort((a, b) => a.localeCompare(b));
  }

  private requireDefaultFile(): string {
    const { defaultFile } = this.config;
    if (!defaultFile) {
      throw new ConfigError('No default translation file is configured (set "defaultFile")');
    }
    return defaultFile;
  }

  private async readFile(filePath: string): Promise<string> {
    try {
      return await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      throw TranslationFileError.wrap(filePath, error);
    }
  }
}
