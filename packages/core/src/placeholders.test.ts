import { describe, expect, it } from 'vitest';
import { createTemplateSyntaxes, isTemplated, parsePlaceholder } from './placeholders.js';

describe('isTemplated', () => {
  it('finds ARB placeholders outside quotes', () => {
    expect(isTemplated('Hello {name}', 'arb')).toBe(true);
    expect(isTemplated("It''s {count}", 'arb')).toBe(true);
    expect(isTemplated("'{literal}' text", 'arb')).toBe(false);
    expect(isTemplated('Hello', 'arb')).toBe(false);
  });

  it('ignores quotes without ARB escaping', () => {
    expect(isTemplated("'{name}'", 'arbNoEscaping')).toBe(true);
  });

  it('treats doubled braces as literals in composite mode', () => {
    expect(isTemplated('{0} items', 'composite')).toBe(true);
    expect(isTemplated('{{literal}}', 'composite')).toBe(false);
    expect(isTemplated('{{{0}}}', 'composite')).toBe(true);
  });

  it('returns false for malformed braces', () => {
    expect(isTemplated('oops }', 'arb')).toBe(false);
    expect(isTemplated('{unclosed', 'composite')).toBe(false);
    expect(isTemplated("'{hanging", 'arb')).toBe(false);
  });

  it('matches token syntaxes', () => {
    expect(isTemplated('Hi {{ name }}', 'doubleCurly')).toBe(true);
    expect(isTemplated('Hi {name}', 'doubleCurly')).toBe(false);
    expect(isTemplated('%{count} left', 'percentCurly')).toBe(true);
    expect(isTemplated('%count left', 'percentCurly')).toBe(false);
  });

  it('never templates in modes without placeholders', () => {
    expect(isTemplated('{0}', 'none')).toBe(false);
    expect(isTemplated('{0}', 'backslash')).toBe(false);
    expect(isTemplated('', 'composite')).toBe(false);
  });

  it('uses replacement detectors', () => {
    const syntaxes = createTemplateSyntaxes({ none: (text) => text.includes('$') });
    expect(isTemplated('$user', 'none', syntaxes)).toBe(true);
    expect(isTemplated('{0}', 'composite', syntaxes)).toBe(true);
  });

  it('treats a throwing detector as not templated', () => {
    const syntaxes = createTemplateSyntaxes({
      arb: () => {
        throw new Error('broken detector');
      },
    });
    expect(isTemplated('{name}', 'arb', syntaxes)).toBe(false);
  });
});

describe('parsePlaceholder', () => {
  it('splits known attributes from other properties', () => {
    const placeholder = parsePlaceholder('  count ', {
      Type: 'int',
      FORMAT: 'compact',
      example: '5',
      description: 'Number of items',
      optional: true,
      max: 3,
      optionalParameters: { decimalDigits: '2', ignored: 4 },
      nested: { a: 1 },
    });

    expect(placeholder).toEqual({
      name: 'count',
      type: 'int',
      format: 'compact',
      example: '5',
      properties: { description: 'Number of items', optional: 'true', max: '3' },
      optionalParameters: { decimalDigits: '2' },
    });
  });
});
