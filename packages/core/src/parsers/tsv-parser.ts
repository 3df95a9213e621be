import { readDelimitedLine, type DelimitedLine } from '../table/delimited-reader.js';
import { commonParserOptions } from './base-parser.js';
import { TableParser, type TableParserOptions } from './table-parser.js';
import type { ParserSettings } from './types.js';

export interface TsvParserOptions extends TableParserOptions {
  /** Treat `"` at the start of a cell as a quote (default false) */
  quotedFields?: boolean;
}

export class TsvParser extends TableParser {
  readonly id = 'tsv';
  readonly name = 'TSV';
  readonly extensions = ['.tsv'];

  public readonly quotedFields: boolean;

  constructor(options: TsvParserOptions = {}) {
    super(options);
    this.quotedFields = options.quotedFields ?? false;
  }

  static fromSettings(settings: ParserSettings): TsvParser {
    return new TsvParser({
      ...commonParserOptions(settings),
      descriptionColumn: settings.descriptionColumn,
      treatEmptyValuesAsAbsent: settings.treatEmptyValuesAsAbsent,
      matchLocale: settings.matchLocale,
      quotedFields: settings.tsv?.quotedFields,
      textFormat: settings.tsv?.textFormat,
    });
  }

  protected readCells(content: string, offset: number, lineNumber: number): DelimitedLine {
    return readDelimitedLine(content, offset, lineNumber, '\t', this.quotedFields);
  }
}
