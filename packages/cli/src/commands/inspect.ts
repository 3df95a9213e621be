import path from 'path';
import chalk from 'chalk';
import type { Command } from 'commander';
import type { Placeholder, Translation, TranslationEntry } from '@dotlex/core';
import { CliError, withErrorHandling } from '../utils/errors.js';
import { displayPath, loadProject } from '../utils/project.js';

interface InspectCommandOptions {
  config?: string;
  locale?: string;
  json?: boolean;
  cwd?: string;
}

export interface SerializedEntry {
  key: string;
  text?: string;
  reference?: string;
  isTemplated: boolean;
  target?: string;
  description?: string;
  type?: string;
  context?: string;
  sourceText?: string;
  screen?: string;
  video?: string;
  placeholders?: Placeholder[];
}

export interface SerializedTranslation {
  file?: string;
  locale?: string;
  context?: string;
  author?: string;
  lastModified?: string;
  customProperties: Record<string, string>;
  entries: SerializedEntry[];
}

function serializeEntry(entry: TranslationEntry): SerializedEntry {
  const { key, value, isTemplated, placeholders, ...annotations } = entry;
  const content = value.kind === 'literal' ? { text: value.text } : { reference: value.key };
  return {
    key,
    ...content,
    isTemplated,
    ...annotations,
    ...(placeholders ? { placeholders: [...placeholders] } : {}),
  };
}

export function serializeTranslation(translation: Translation): SerializedTranslation {
  return {
    file: translation.originalFile,
    locale: translation.locale,
    context: translation.context,
    author: translation.author,
    lastModified: translation.lastModified?.toISOString(),
    customProperties: Object.fromEntries(translation.customProperties),
    entries: translation.values().map(serializeEntry),
  };
}

function formatEntry(entry: TranslationEntry): string {
  const value =
    entry.value.kind === 'literal'
      ? JSON.stringify(entry.value.text)
      : chalk.magenta(`→ ${entry.value.key}`);
  const flags = entry.isTemplated ? chalk.yellow(' [templated]') : '';
  return `  ${chalk.bold(entry.key)} ${value}${flags}`;
}

function printTranslation(translation: Translation, cwd: string): void {
  const header = [
    translation.originalFile ? displayPath(translation.originalFile, cwd) : undefined,
    translation.locale ? `locale ${translation.locale}` : undefined,
  ].filter(Boolean);
  console.log(chalk.blue(header.join(' · ')));

  if (translation.context) console.log(chalk.gray(`Context: ${translation.context}`));
  if (translation.author) console.log(chalk.gray(`Author: ${translation.author}`));
  if (translation.lastModified) {
    console.log(chalk.gray(`Last modified: ${translation.lastModified.toISOString()}`));
  }
  for (const [name, value] of translation.customProperties) {
    console.log(chalk.gray(`${name}: ${value}`));
  }

  for (const entry of translation) {
    console.log(formatEntry(entry));
  }

  const templated = translation.values().filter((entry) => entry.isTemplated).length;
  console.log(
    chalk.green(
      `\n${translation.size} entr${translation.size === 1 ? 'y' : 'ies'}, ${templated} templated`
    )
  );
}

export function registerInspect(program: Command) {
  program
    .command('inspect <file>')
    .description('Parse one translation file and list its entries')
    .option('-c, --config <path>', 'Path to dotlex config file')
    .option('-l, --locale <locale>', 'Locale column to read from CSV/TSV files')
    .option('--json', 'Print the parsed translation as JSON', false)
    .action(
      withErrorHandling(async (file: string, options: InspectCommandOptions) => {
        await runInspect(file, options);
      })
    );
}

export async function runInspect(file: string, options: InspectCommandOptions = {}): Promise<Translation> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const { loader } = await loadProject({ config: options.config, cwd });

  const translation = await loader.loadFile(path.resolve(cwd, file), options.locale);
  if (!translation) {
    const what = options.locale ? `locale '${options.locale}'` : 'translations';
    throw new CliError(`${displayPath(path.resolve(cwd, file), cwd)} holds no ${what}`);
  }

  if (options.json) {
    console.log(JSON.stringify(serializeTranslation(translation), null, 2));
  } else {
    printTranslation(translation, cwd);
  }
  return translation;
}
