import { createTemplateSyntaxes, type TemplateSyntaxTable } from '../placeholders.js';
import type { TextFormat } from '../text-format.js';
import type { Translation } from '../translation.js';
import { buildTranslationTree, type TranslationTree } from '../translation-tree.js';
import type { ValueReaderOptions } from '../value-reader.js';
import type { ParserSettings, TranslationParser } from './types.js';

export interface ParserOptions {
  textFormat?: TextFormat;
  recognizeReferences?: boolean;
  referenceMarker?: string;
  templateSyntaxes?: Partial<TemplateSyntaxTable>;
}

/**
 * Options shared by every format, taken from factory settings.
 */
export function commonParserOptions(settings: ParserSettings): ParserOptions {
  return {
    recognizeReferences: settings.recognizeReferences,
    referenceMarker: settings.referenceMarker,
    templateSyntaxes: settings.templateSyntaxes,
  };
}

export abstract class BaseTranslationParser implements TranslationParser {
  abstract readonly id: string;
  abstract readonly name: string;
  abstract readonly extensions: readonly string[];

  public readonly textFormat: TextFormat;
  protected readonly valueOptions: ValueReaderOptions;

  constructor(options: ParserOptions, defaultTextFormat: TextFormat) {
    this.textFormat = options.textFormat ?? defaultTextFormat;
    this.valueOptions = {
      textFormat: this.textFormat,
      recognizeReferences: options.recognizeReferences,
      referenceMarker: options.referenceMarker,
      templateSyntaxes: createTemplateSyntaxes(options.templateSyntaxes),
    };
  }

  canHandle(extension: string): boolean {
    return this.extensions.includes(extension.toLowerCase());
  }

  abstract loadTranslation(content: string, locale?: string): Translation | null;

  loadStructure(content: string): TranslationTree | null {
    const translation = this.loadTranslation(content);
    return translation ? buildTranslationTree(translation).tree : null;
  }
}
