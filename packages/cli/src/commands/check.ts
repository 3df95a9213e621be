import path from 'path';
import chalk from 'chalk';
import type { Command } from 'commander';
import { TranslationError, TranslationFileError, buildTranslationTree } from '@dotlex/core';
import { withErrorHandling } from '../utils/errors.js';
import { CHECK_EXIT_CODES, GENERAL_EXIT_CODES, setExitCode } from '../utils/exit-codes.js';
import { displayPath, loadProject } from '../utils/project.js';

interface CheckCommandOptions {
  config?: string;
  json?: boolean;
  cwd?: string;
}

export interface CheckFailure {
  file: string;
  line?: number;
  message: string;
}

export interface CheckWarning {
  file: string;
  message: string;
}

export interface CheckReport {
  files: number;
  entries: number;
  failures: CheckFailure[];
  warnings: CheckWarning[];
  exitCode: number;
}

const collectPatterns = (value: string, previous: string[]) => [
  ...previous,
  ...value
    .split(',')
    .map((token) => token.trim())
    .filter(Boolean),
];

function toFailure(file: string, error: TranslationError): CheckFailure {
  if (error instanceof TranslationFileError) {
    return { file, line: error.lineNumber, message: error.detail };
  }
  return { file, message: error.message };
}

function printReport(report: CheckReport): void {
  for (const failure of report.failures) {
    const location = failure.line === undefined ? failure.file : `${failure.file}:${failure.line}`;
    console.log(chalk.red(`✖ ${location}: ${failure.message}`));
  }
  for (const warning of report.warnings) {
    console.log(chalk.yellow(`⚠ ${warning.file}: ${warning.message}`));
  }

  const summary = `Checked ${report.files} file${report.files === 1 ? '' : 's'} (${report.entries} entr${report.entries === 1 ? 'y' : 'ies'})`;
  if (report.failures.length) {
    console.log(chalk.red(`\n${summary}, ${report.failures.length} failed to parse`));
  } else {
    console.log(chalk.green(`\n${summary}, all parsed`));
  }
}

export function registerCheck(program: Command) {
  program
    .command('check [patterns...]')
    .description('Parse every matched translation file and report the ones that fail')
    .option('-c, --config <path>', 'Path to dotlex config file')
    .option('--include <patterns>', 'Additional glob patterns (comma-separated)', collectPatterns, [])
    .option('--json', 'Print the report as JSON', false)
    .action(
      withErrorHandling(async (patterns: string[], options: CheckCommandOptions & { include?: string[] }) => {
        const report = await runCheck([...patterns, ...(options.include ?? [])], options);
        setExitCode(report.exitCode);
      })
    );
}

/**
 * Parse each file and build its tree. Parse failures are collected rather
 * than thrown; keys that cannot be placed in a tree become warnings.
 * @param patterns Globs relative to the project root (the configured `include` when empty)
 */
export async function runCheck(patterns: string[] = [], options: CheckCommandOptions = {}): Promise<CheckReport> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  const { loader } = await loadProject({ config: options.config, cwd });

  const files = await loader.resolveTranslationFiles(patterns.length ? patterns : undefined);
  const report: CheckReport = {
    files: files.length,
    entries: 0,
    failures: [],
    warnings: [],
    exitCode: GENERAL_EXIT_CODES.SUCCESS,
  };

  for (const file of files) {
    const shown = displayPath(file, cwd);
    try {
      const translation = await loader.loadFile(file);
      if (!translation) {
        report.warnings.push({ file: shown, message: 'No translations found' });
        continue;
      }

      report.entries += translation.size;
      const { skipped } = buildTranslationTree(translation);
      for (const key of skipped) {
        report.warnings.push({ file: shown, message: `Key '${key}' has an empty segment and is left out of the tree` });
      }
    } catch (error) {
      if (!(error instanceof TranslationError)) {
        throw error;
      }
      report.failures.push(toFailure(shown, error));
    }
  }

  if (report.failures.length) {
    report.exitCode = CHECK_EXIT_CODES.PARSE_ERRORS;
  }

  if (options.json) {
    console.log(JSON.stringify(report, null, 2));
  } else if (!files.length) {
    console.log(chalk.yellow('No translation files matched.'));
  } else {
    printReport(report);
  }

  return report;
}
