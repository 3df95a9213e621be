import { describe, expect, it } from 'vitest';
import { InvalidDocumentError, TranslationError } from '../errors.js';
import { JsonParser } from './json-parser.js';

describe('JsonParser', () => {
  it('loads nested groups as dotted keys', () => {
    const content = JSON.stringify({ greeting: 'Hello', nested: { bye: 'Bye {0}' } });
    const translation = new JsonParser().loadTranslation(content);

    expect(translation?.keys()).toEqual(['greeting', 'nested.bye']);
    expect(translation?.get('nested.bye')?.isTemplated).toBe(true);
  });

  it('treats doubled braces as literal text by default', () => {
    const translation = new JsonParser().loadTranslation('{"count":"{0} items","brace":"{{literal}}"}');
    expect(translation?.get('count')?.isTemplated).toBe(true);
    expect(translation?.get('brace')?.isTemplated).toBe(false);
  });

  it('keeps decoded string values as they are', () => {
    const content = JSON.stringify({ path: 'C:\\new folder', tab: 'a\tb' });
    const translation = new JsonParser().loadTranslation(content);

    expect(translation?.get('path')?.value).toEqual({ kind: 'literal', text: JSON.parse(content).path });
    expect(translation?.get('path')?.value).toEqual({ kind: 'literal', text: 'C:\\new folder' });
    expect(translation?.get('tab')?.value).toEqual({ kind: 'literal', text: 'a\tb' });
  });

  it('classifies with another text format', () => {
    const parser = new JsonParser({ textFormat: 'doubleCurly' });
    const translation = parser.loadTranslation('{"hi":"Hi {{ name }}","plain":"{0}"}');
    expect(translation?.get('hi')?.isTemplated).toBe(true);
    expect(translation?.get('plain')).toEqual({
      key: 'plain',
      value: { kind: 'literal', text: '{0}' },
      isTemplated: false,
    });
  });

  it('rejects documents whose root is not an object', () => {
    expect(() => new JsonParser().loadTranslation('[1, 2]')).toThrow(InvalidDocumentError);
    expect(() => new JsonParser().loadTranslation('[1, 2]')).toThrow('The document root must be an object');
  });

  it('raises a translation error for invalid JSON', () => {
    expect(() => new JsonParser().loadTranslation('{"a": }')).toThrow(TranslationError);
  });

  it('returns null for blank content', () => {
    expect(new JsonParser().loadTranslation('  \n')).toBeNull();
  });

  it('parses configuration objects', () => {
    expect(new JsonParser().parseConfiguration('{"defaultFile":"Strings.json"}')).toEqual({
      defaultFile: 'Strings.json',
    });
  });

  it('builds the key tree', () => {
    const tree = new JsonParser().loadStructure('{"menu":{"file":"File","edit":"Edit {0}"}}');
    const menu = tree?.findNode('MENU');
    expect(menu?.getLeaf('file')?.isTemplated).toBe(false);
    expect(menu?.getLeaf('edit')?.isTemplated).toBe(true);
  });
});
