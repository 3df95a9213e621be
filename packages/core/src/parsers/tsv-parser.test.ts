import { describe, expect, it } from 'vitest';
import { TsvParser } from './tsv-parser.js';

const CONTENT = 'Key\ten\tDescription\nhello\t"quoted"\tA greeting\n';

describe('TsvParser', () => {
  it('reads quotes literally by default', () => {
    const entry = new TsvParser().loadTranslation(CONTENT)?.get('hello');
    expect(entry?.value).toEqual({ kind: 'literal', text: '"quoted"' });
    expect(entry?.description).toBe('A greeting');
  });

  it('unquotes cells when quoted fields are on', () => {
    expect(new TsvParser({ quotedFields: true }).loadTranslation(CONTENT)?.get('hello')?.value).toEqual({
      kind: 'literal',
      text: 'quoted',
    });
  });

  it('keeps commas inside cells', () => {
    expect(new TsvParser().loadTranslation('Key\ten\nlist\ta, b, c\n')?.get('list')?.value).toEqual({
      kind: 'literal',
      text: 'a, b, c',
    });
  });

  it('reads the description column by its configured caption', () => {
    const parser = new TsvParser({ descriptionColumn: 'Notes' });
    const translation = parser.loadTranslation('Key\tNotes\tfr\nhello\tGreeting\tBonjour\n');
    expect(translation?.locale).toBe('fr');
    expect(translation?.get('hello')).toMatchObject({
      value: { kind: 'literal', text: 'Bonjour' },
      description: 'Greeting',
    });
  });
});
