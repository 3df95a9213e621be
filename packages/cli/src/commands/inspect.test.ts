import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterAll, afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Translation, TranslationFileError, createReferenceEntry } from '@dotlex/core';
import { CliError } from '../utils/errors.js';
import { runInspect, serializeTranslation } from './inspect.js';

const stripAnsi = (value: string) => value.replace(/\u001b\[[0-9;]*m/g, '');

const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

afterAll(() => {
  logSpy.mockRestore();
});

describe('inspect command', () => {
  let tmpDir: string;

  const printed = () => logSpy.mock.calls.map((call) => stripAnsi(String(call[0])));

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'dotlex-inspect-'));
    logSpy.mockClear();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('lists entries with references and templated markers', async () => {
    await fs.writeFile(
      path.join(tmpDir, 'Strings.json'),
      JSON.stringify({ greeting: 'Hello {0}', menu: { open: 'Open' }, alias: '@menu.open' })
    );

    const translation = await runInspect('Strings.json', { cwd: tmpDir });

    expect(translation.keys()).toEqual(['greeting', 'alias', 'menu.open']);
    expect(printed()).toEqual([
      'Strings.json',
      '  greeting "Hello {0}" [templated]',
      '  alias → menu.open',
      '  menu.open "Open"',
      '\n3 entries, 1 templated',
    ]);
  });

  it('reads the requested column of a CSV file', async () => {
    await fs.writeFile(path.join(tmpDir, 'Strings.csv'), 'Key,en,de\ntitle,Title,Titel\n');

    const translation = await runInspect('Strings.csv', { cwd: tmpDir, locale: 'de' });

    expect(translation.locale).toBe('de');
    expect(printed()[0]).toBe('Strings.csv · locale de');
    expect(printed()[1]).toBe('  title "Titel"');
  });

  it('prints JSON with metadata and custom properties', async () => {
    await fs.writeFile(
      path.join(tmpDir, 'app_en.arb'),
      JSON.stringify({
        '@@locale': 'en',
        '@@author': 'Test Author',
        '@@x-team': 'docs',
        title: 'Title',
        '@title': { description: 'Page title' },
      })
    );

    await runInspect('app_en.arb', { cwd: tmpDir, json: true });

    expect(logSpy).toHaveBeenCalledTimes(1);
    const output = JSON.parse(String(logSpy.mock.calls[0][0]));
    expect(output).toEqual({
      file: path.join(tmpDir, 'app_en.arb'),
      locale: 'en',
      author: 'Test Author',
      customProperties: { team: 'docs' },
      entries: [{ key: 'title', text: 'Title', isTemplated: false, description: 'Page title' }],
    });
  });

  it('fails when the requested column does not exist', async () => {
    await fs.writeFile(path.join(tmpDir, 'Strings.csv'), 'Key,en\ntitle,Title\n');

    await expect(runInspect('Strings.csv', { cwd: tmpDir, locale: 'fr' })).rejects.toThrow(
      new CliError("Strings.csv holds no locale 'fr'")
    );
  });

  it('surfaces parse errors with file and line', async () => {
    await fs.writeFile(path.join(tmpDir, 'Strings.csv'), 'Key,en\ntitle,"open\n');

    const error = await runInspect('Strings.csv', { cwd: tmpDir }).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(TranslationFileError);
    expect(error).toMatchObject({ lineNumber: 2, detail: 'Unclosed quote at 2:7' });
  });
});

describe('serializeTranslation', () => {
  it('omits the text of references', () => {
    const translation = new Translation({ locale: 'en', lastModified: new Date(Date.UTC(2024, 0, 2)) });
    translation.add(createReferenceEntry('copy', 'original'));

    expect(serializeTranslation(translation)).toEqual({
      locale: 'en',
      lastModified: '2024-01-02T00:00:00.000Z',
      customProperties: {},
      entries: [{ key: 'copy', reference: 'original', isTemplated: false }],
    });
  });
});
