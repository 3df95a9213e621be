import { MalformedInputError, type TextPosition } from '../errors.js';
import type { DelimitedLine } from '../table/delimited-reader.js';
import { Translation } from '../translation.js';
import { readEntryValue } from '../value-reader.js';
import { BaseTranslationParser, type ParserOptions } from './base-parser.js';
import type { LocaleMatcher } from './types.js';

export const DEFAULT_DESCRIPTION_COLUMN = 'Description';

export interface TableParserOptions extends ParserOptions {
  descriptionColumn?: string;
  treatEmptyValuesAsAbsent?: boolean;
  matchLocale?: LocaleMatcher;
}

interface TableHeader {
  columnCount: number;
  valueColumn: number;
  descriptionColumn: number;
  locale?: string;
}

/**
 * Reads tables whose first non-empty row holds column captions: the first
 * column holds keys and every other column one locale, except the
 * description column.
 */
export abstract class TableParser extends BaseTranslationParser {
  protected readonly descriptionColumn: string;
  protected readonly treatEmptyValuesAsAbsent: boolean;
  protected readonly matchLocale?: LocaleMatcher;

  constructor(options: TableParserOptions) {
    super(options, 'none');
    this.descriptionColumn = options.descriptionColumn ?? DEFAULT_DESCRIPTION_COLUMN;
    this.treatEmptyValuesAsAbsent = options.treatEmptyValuesAsAbsent ?? false;
    this.matchLocale = options.matchLocale;
  }

  /** Read one row of cells starting at `offset` */
  protected abstract readCells(content: string, offset: number, lineNumber: number): DelimitedLine;

  /**
   * Captions of the locale columns, in table order.
   */
  listLocales(content: string): string[] {
    const first = this.rows(content).next();
    if (first.done) {
      return [];
    }
    return first.value.fields
      .slice(1)
      .map((caption) => caption.trim())
      .filter((caption) => caption.length > 0 && !this.isDescriptionCaption(caption));
  }

  loadTranslation(content: string, locale?: string): Translation | null {
    if (!content) {
      return null;
    }

    let header: TableHeader | null = null;
    let translation: Translation | null = null;

    for (const row of this.rows(content)) {
      const position: TextPosition = {
        lineNumber: row.lineNumber,
        columnNumber: 1,
        startPosition: row.offset,
        endPosition: row.posAfterEnd,
      };

      if (!header) {
        header = this.readHeader(row.fields, locale, position);
        if (!header) {
          return null;
        }
        translation = new Translation({ locale: header.locale });
        continue;
      }

      const { fields } = row;
      const key = fields[0].trim();
      if (!key) {
        throw new MalformedInputError(`Empty key detected on line ${row.lineNumber}`, position);
      }
      if (fields.length < header.columnCount) {
        throw new MalformedInputError(
          `Insufficient number of columns detected on line ${row.lineNumber} ` +
            `(${header.columnCount} columns expected, ${fields.length} columns found)`,
          position
        );
      }

      const value = fields[header.valueColumn].trim();
      if (!value && this.treatEmptyValuesAsAbsent) {
        continue;
      }

      const description = header.descriptionColumn === -1 ? '' : fields[header.descriptionColumn].trim();
      const entry = readEntryValue(key, value, this.valueOptions, description ? { description } : {});
      translation?.add(entry, row.lineNumber);
    }

    return translation;
  }

  private readHeader(
    fields: string[],
    locale: string | undefined,
    position: TextPosition
  ): TableHeader | null {
    const captions = fields.map((field) => field.trim());
    let descriptionColumn = -1;
    const localeColumns: number[] = [];

    for (let i = 1; i < captions.length; i++) {
      const caption = captions[i];
      if (!caption) {
        if (captions.length > 2) {
          throw new MalformedInputError(
            'Multiple columns are provided, but the locale name is empty for at least one column. ' +
              'Locale names must be listed as column captions on the first non-empty line.',
            position
          );
        }
        localeColumns.push(i);
        continue;
      }
      if (descriptionColumn === -1 && this.isDescriptionCaption(caption)) {
        descriptionColumn = i;
      } else {
        localeColumns.push(i);
      }
    }

    const valueColumn = this.selectColumn(captions, localeColumns, locale);
    if (valueColumn === -1) {
      return null;
    }

    return {
      columnCount: captions.length,
      valueColumn,
      descriptionColumn,
      locale: captions[valueColumn] || locale,
    };
  }

  private selectColumn(captions: string[], localeColumns: number[], locale: string | undefined): number {
    if (localeColumns.length === 0) {
      return -1;
    }
    if (!locale) {
      return localeColumns[0];
    }

    const wanted = locale.toLowerCase();
    const exact = localeColumns.find((i) => captions[i].toLowerCase() === wanted);
    if (exact !== undefined) {
      return exact;
    }

    const matcher = this.matchLocale;
    if (matcher) {
      const matched = localeColumns.find((i) => matcher(captions[i], locale));
      if (matched !== undefined) {
        return matched;
      }
    }

    // `de-AT` falls back to a `de` column
    const language = wanted.split(/[-_]/)[0];
    if (language && language !== wanted) {
      const fallback = localeColumns.find((i) => captions[i].toLowerCase() === language);
      if (fallback !== undefined) {
        return fallback;
      }
    }

    return -1;
  }

  private isDescriptionCaption(caption: string): boolean {
    return caption.toLowerCase() === this.descriptionColumn.toLowerCase();
  }

  /**
   * Non-blank rows with the offset and line they start at.
   */
  private *rows(content: string): Generator<DelimitedLine & { offset: number; lineNumber: number }> {
    let offset = 0;
    let lineNumber = 1;

    while (offset < content.length) {
      const char = content[offset];
      if (char === '\r' || char === '\n') {
        offset += char === '\r' && content[offset + 1] === '\n' ? 2 : 1;
        lineNumber += 1;
        continue;
      }

      const row = this.readCells(content, offset, lineNumber);
      const start = offset;
      const startLine = lineNumber;
      offset = row.posAfterEnd;
      lineNumber = row.endLineNumber + 1;

      if (row.fields.length === 1 && !row.fields[0].trim()) {
        continue;
      }
      yield { ...row, offset: start, lineNumber: startLine };
    }
  }
}
