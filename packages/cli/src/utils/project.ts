import path from 'path';
import chalk from 'chalk';
import {
  DEFAULT_CONFIG_FILENAME,
  TranslationLoader,
  fileFormats,
  loadConfigWithMeta,
  normalizeConfig,
  registerBuiltinFormats,
  resolveConfigPath,
  type DotlexConfig,
} from '@dotlex/core';

export interface ProjectOptions {
  config?: string;
  /** Directory the command runs in (defaults to process.cwd()) */
  cwd?: string;
}

export interface Project {
  config: DotlexConfig;
  projectRoot: string;
  /** Absent when the defaults are in use */
  configPath?: string;
  loader: TranslationLoader;
}

/**
 * Resolve the project a command operates on.
 *
 * An explicit `--config` must exist. Without one, `dotlex.config.json` is
 * searched upward from the working directory; when none is found the
 * defaults apply with the working directory as project root.
 */
export async function loadProject(options: ProjectOptions = {}): Promise<Project> {
  const cwd = path.resolve(options.cwd ?? process.cwd());
  registerBuiltinFormats(fileFormats);

  const configPath = options.config ?? (await resolveConfigPath(DEFAULT_CONFIG_FILENAME, cwd));
  if (!configPath) {
    const config = normalizeConfig({});
    return {
      config,
      projectRoot: cwd,
      loader: new TranslationLoader(config, { projectRoot: cwd, registry: fileFormats }),
    };
  }

  const result = await loadConfigWithMeta(configPath, { cwd, registry: fileFormats });
  if (result.projectRoot !== cwd) {
    console.log(chalk.gray(`Using config at ${path.relative(cwd, result.configPath) || result.configPath}`));
  }

  return {
    ...result,
    loader: new TranslationLoader(result.config, { projectRoot: result.projectRoot, registry: fileFormats }),
  };
}

/**
 * Path for display, relative to `cwd` when it lies inside it.
 */
export function displayPath(filePath: string, cwd: string): string {
  const relative = path.relative(cwd, filePath);
  return relative && !relative.startsWith('..') && !path.isAbsolute(relative) ? relative : filePath;
}
