import { describe, expect, it } from 'vitest';
import { DEFAULT_EXCLUDE, DEFAULT_INCLUDE, DEFAULT_PARSING } from './defaults.js';
import { normalizeConfig } from './normalizer.js';

describe('normalizeConfig', () => {
  it('applies defaults to an empty config', () => {
    expect(normalizeConfig({})).toEqual({
      configVersion: 1,
      defaultFile: undefined,
      defaultLocale: undefined,
      translationsDir: '.',
      translations: {},
      localeSeparator: '_',
      include: DEFAULT_INCLUDE,
      exclude: DEFAULT_EXCLUDE,
      parsing: DEFAULT_PARSING,
    });
  });

  it('lower-cases translation locales and drops non-string files', () => {
    const config = normalizeConfig({ translations: { ' DE ': ' Strings_de.json ', '*': 'Strings.json', fr: 3 } });
    expect(config.translations).toEqual({ de: 'Strings_de.json', '*': 'Strings.json' });
  });

  it('falls back to default text formats for unknown values', () => {
    const config = normalizeConfig({ parsing: { json: { textFormat: 'icu' }, arb: { textFormat: 'arbNoEscaping' } } });
    expect(config.parsing.json.textFormat).toBe('composite');
    expect(config.parsing.arb.textFormat).toBe('arbNoEscaping');
  });

  it('splits comma-separated include patterns', () => {
    expect(normalizeConfig({ include: 'a/*.json, b/*.csv' }).include).toEqual(['a/*.json', 'b/*.csv']);
  });

  it('keeps an empty reference marker', () => {
    expect(normalizeConfig({ parsing: { referenceMarker: '' } }).parsing.referenceMarker).toBe('');
  });
});
