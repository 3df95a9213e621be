import { describe, expect, it } from 'vitest';
import { DuplicateKeyError, MalformedInputError } from '../errors.js';
import { CsvParser } from './csv-parser.js';

const TABLE = [
  'Key,en,de,Description',
  'greeting,Hello,Hallo,Shown on start',
  'farewell,"Bye, {0}",Tschüss,',
  '',
].join('\n');

function captureError(action: () => unknown): unknown {
  try {
    action();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('CsvParser', () => {
  it('reads the first locale column by default', () => {
    const translation = new CsvParser().loadTranslation(TABLE);

    expect(translation?.locale).toBe('en');
    expect(translation?.keys()).toEqual(['greeting', 'farewell']);
    expect(translation?.get('greeting')).toEqual({
      key: 'greeting',
      value: { kind: 'literal', text: 'Hello' },
      isTemplated: false,
      description: 'Shown on start',
    });
    expect(translation?.get('farewell')?.value).toEqual({ kind: 'literal', text: 'Bye, {0}' });
    expect(translation?.get('farewell')?.description).toBeUndefined();
  });

  it('selects a locale column by caption, ignoring case', () => {
    const translation = new CsvParser().loadTranslation(TABLE, 'DE');
    expect(translation?.locale).toBe('de');
    expect(translation?.get('greeting')?.value).toEqual({ kind: 'literal', text: 'Hallo' });
  });

  it('falls back to the language column', () => {
    expect(new CsvParser().loadTranslation(TABLE, 'de-AT')?.get('farewell')?.value).toEqual({
      kind: 'literal',
      text: 'Tschüss',
    });
  });

  it('returns null for a locale without a column', () => {
    expect(new CsvParser().loadTranslation(TABLE, 'fr')).toBeNull();
  });

  it('consults the locale matcher', () => {
    const parser = new CsvParser({ matchLocale: (caption, locale) => caption === 'en' && locale === 'english' });
    expect(parser.loadTranslation(TABLE, 'english')?.get('greeting')?.value).toEqual({
      kind: 'literal',
      text: 'Hello',
    });
  });

  it('classifies values with the configured text format', () => {
    const parser = new CsvParser({ textFormat: 'composite' });
    expect(parser.loadTranslation(TABLE)?.get('farewell')?.isTemplated).toBe(true);
    expect(new CsvParser().loadTranslation(TABLE)?.get('farewell')?.isTemplated).toBe(false);
  });

  it('keeps raw and decoded text with backslash escaping', () => {
    const parser = new CsvParser({ textFormat: 'backslash' });
    expect(parser.loadTranslation('Key,en\nmsg,Line\\nTwo\n')?.get('msg')?.value).toEqual({
      kind: 'literal',
      text: 'Line\nTwo',
      escapedText: 'Line\\nTwo',
    });
  });

  it('reads references', () => {
    expect(new CsvParser().loadTranslation('Key,en\nalias,@greeting\n')?.get('alias')?.value).toEqual({
      kind: 'reference',
      key: 'greeting',
    });
  });

  it('rejects an empty key', () => {
    const error = captureError(() => new CsvParser().loadTranslation('Key,en\n,Hello\n'));
    expect(error).toBeInstanceOf(MalformedInputError);
    expect(error).toMatchObject({ lineNumber: 2, message: 'Empty key detected on line 2' });
  });

  it('rejects rows with missing cells', () => {
    const error = captureError(() => new CsvParser().loadTranslation('Key,en,de\ngreeting,Hello\n'));
    expect(error).toMatchObject({
      lineNumber: 2,
      message: 'Insufficient number of columns detected on line 2 (3 columns expected, 2 columns found)',
    });
  });

  it('rejects an empty caption among several columns', () => {
    const error = captureError(() => new CsvParser().loadTranslation('Key,,de\na,b,c\n'));
    expect(error).toBeInstanceOf(MalformedInputError);
    expect(error).toMatchObject({ lineNumber: 1 });
  });

  it('reports duplicate keys with their line', () => {
    const error = captureError(() => new CsvParser().loadTranslation('Key,en\na,1\n\na,2\n'));
    expect(error).toBeInstanceOf(DuplicateKeyError);
    expect(error).toMatchObject({ key: 'a', lineNumber: 4 });
  });

  it('counts lines inside quoted cells', () => {
    const error = captureError(() => new CsvParser().loadTranslation('Key,en\na,"one\ntwo"\n,bad\n'));
    expect(error).toMatchObject({ lineNumber: 4 });
  });

  it('skips empty values when asked to', () => {
    const content = 'Key,en\na,\nb,x\n';
    expect(new CsvParser({ treatEmptyValuesAsAbsent: true }).loadTranslation(content)?.keys()).toEqual(['b']);
    expect(new CsvParser().loadTranslation(content)?.get('a')?.value).toEqual({ kind: 'literal', text: '' });
  });

  it('honours a custom separator', () => {
    const parser = new CsvParser({ separator: ';' });
    expect(parser.loadTranslation('Key;en\ngreeting;Hello, world\n')?.get('greeting')?.value).toEqual({
      kind: 'literal',
      text: 'Hello, world',
    });
  });

  it('returns null without locale columns or content', () => {
    expect(new CsvParser().loadTranslation('')).toBeNull();
    expect(new CsvParser().loadTranslation('\n\n')).toBeNull();
    expect(new CsvParser().loadTranslation('Key\na\n')).toBeNull();
  });

  it('lists locale captions', () => {
    expect(new CsvParser().listLocales(TABLE)).toEqual(['en', 'de']);
  });

  it('builds the key tree', () => {
    const tree = new CsvParser().loadStructure('Key,en\nmenu.file,File\nmenu.edit,Edit\n');
    expect(tree?.findNode('menu')?.keys.map((leaf) => leaf.key)).toEqual(['file', 'edit']);
  });

  it('handles its own extension only', () => {
    const parser = new CsvParser();
    expect(parser.canHandle('.CSV')).toBe(true);
    expect(parser.canHandle('.tsv')).toBe(false);
  });
});
