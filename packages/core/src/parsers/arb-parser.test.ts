import { describe, expect, it } from 'vitest';
import { ArbParser } from './arb-parser.js';

const DOCUMENT = JSON.stringify({
  '@@locale': 'de',
  '@@context': 'app',
  '@@author': 'Test Author',
  '@@last_modified': '2024-05-01T10:00:00Z',
  '@@x-reviewer': 'qa',
  '@@x-': 'ignored',
  greeting: 'Hallo {name}',
  '@greeting': {
    description: 'Greets the user',
    type: 'text',
    context: 'home',
    source_text: 'Hello {name}',
    screen: 'main',
    video: 'intro',
    placeholders: {
      name: { type: 'String', example: 'Ann', maxLength: 10 },
    },
  },
  'title@html': '<b>Titel</b>',
  quoted: "'{not}' a placeholder",
  menu: {
    open: 'Öffnen',
    '@open': { description: 'Opens the menu' },
  },
  '@orphan': { description: 'No such key' },
});

describe('ArbParser', () => {
  it('reads document metadata', () => {
    const translation = new ArbParser().loadTranslation(DOCUMENT);

    expect(translation?.locale).toBe('de');
    expect(translation?.context).toBe('app');
    expect(translation?.author).toBe('Test Author');
    expect(translation?.lastModified).toEqual(new Date('2024-05-01T10:00:00Z'));
    expect(Array.from(translation?.customProperties ?? [])).toEqual([['reviewer', 'qa']]);
  });

  it('loads entries and skips metadata fields', () => {
    const translation = new ArbParser().loadTranslation(DOCUMENT);
    expect(translation?.keys()).toEqual(['greeting', 'title', 'quoted', 'menu.open']);
    expect(translation?.has('orphan')).toBe(false);
  });

  it('attaches entry metadata and placeholders', () => {
    const greeting = new ArbParser().loadTranslation(DOCUMENT)?.get('greeting');

    expect(greeting).toMatchObject({
      value: { kind: 'literal', text: 'Hallo {name}' },
      isTemplated: true,
      description: 'Greets the user',
      type: 'text',
      context: 'home',
      sourceText: 'Hello {name}',
      screen: 'main',
      video: 'intro',
    });
    expect(greeting?.placeholders).toEqual([
      {
        name: 'name',
        type: 'String',
        format: undefined,
        example: 'Ann',
        properties: { maxLength: '10' },
        optionalParameters: {},
      },
    ]);
  });

  it('annotates entries inside groups', () => {
    expect(new ArbParser().loadTranslation(DOCUMENT)?.get('menu.open')?.description).toBe('Opens the menu');
  });

  it('splits a target attribute from the key', () => {
    expect(new ArbParser().loadTranslation(DOCUMENT)?.get('title')).toEqual({
      key: 'title',
      value: { kind: 'literal', text: '<b>Titel</b>' },
      isTemplated: false,
      target: 'html',
    });
  });

  it('ignores quoted braces', () => {
    expect(new ArbParser().loadTranslation(DOCUMENT)?.get('quoted')?.isTemplated).toBe(false);
  });

  it('decodes escapes in composite mode', () => {
    const parser = new ArbParser({ textFormat: 'composite' });
    expect(parser.loadTranslation('{"msg":"x\\\\ny"}')?.get('msg')?.value).toEqual({
      kind: 'literal',
      text: 'x\ny',
      escapedText: 'x\\ny',
    });
  });

  it('reads metadata fields whose names carry spaces', () => {
    const translation = new ArbParser().loadTranslation('{" @@locale ":"fr","@@x-team ":"docs","title":"Titre"}');

    expect(translation?.locale).toBe('fr');
    expect(translation?.customProperties.get('team')).toBe('docs');
    expect(translation?.keys()).toEqual(['title']);
  });

  it('leaves an unparsable timestamp unset', () => {
    expect(new ArbParser().loadTranslation('{"@@last_modified":"yesterday"}')?.lastModified).toBeUndefined();
  });

  it('builds the key tree without metadata', () => {
    const tree = new ArbParser().loadStructure(DOCUMENT);
    expect(tree?.rootNode.keys.map((leaf) => leaf.key)).toEqual(['greeting', 'title', 'quoted']);
    expect(tree?.findNode('menu')?.getLeaf('open')).toBeDefined();
  });
});
