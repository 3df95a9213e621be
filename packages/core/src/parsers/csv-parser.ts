import { readDelimitedLine, type DelimitedLine } from '../table/delimited-reader.js';
import { commonParserOptions } from './base-parser.js';
import { TableParser, type TableParserOptions } from './table-parser.js';
import type { ParserSettings } from './types.js';

export interface CsvParserOptions extends TableParserOptions {
  /** Single-character field separator (default `,`) */
  separator?: string;
}

/**
 * Comma-separated tables. Cells may be quoted.
 */
export class CsvParser extends TableParser {
  readonly id = 'csv';
  readonly name = 'CSV';
  readonly extensions = ['.csv'];

  public readonly separator: string;

  constructor(options: CsvParserOptions = {}) {
    super(options);
    this.separator = options.separator ?? ',';
  }

  static fromSettings(settings: ParserSettings): CsvParser {
    return new CsvParser({
      ...commonParserOptions(settings),
      descriptionColumn: settings.descriptionColumn,
      treatEmptyValuesAsAbsent: settings.treatEmptyValuesAsAbsent,
      matchLocale: settings.matchLocale,
      separator: settings.csv?.separator,
      textFormat: settings.csv?.textFormat,
    });
  }

  protected readCells(content: string, offset: number, lineNumber: number): DelimitedLine {
    return readDelimitedLine(content, offset, lineNumber, this.separator, true);
  }
}
