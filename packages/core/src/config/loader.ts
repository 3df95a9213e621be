/**
 * Configuration file loading utilities
 */

import fs from 'fs/promises';
import path from 'path';
import { ConfigError } from '../errors.js';
import { createDefaultFileFormatRegistry, type FileFormatRegistry } from '../parsers/registry.js';
import type { DotlexConfig, LoadConfigResult } from './types.js';
import { normalizeConfig } from './normalizer.js';
import { assertConfigValid } from './validator.js';
import { DEFAULT_CONFIG_FILENAME } from './defaults.js';

export interface LoadConfigOptions {
  cwd?: string;
  /** Supplies the parser for the config file's extension (built-in formats by default) */
  registry?: FileFormatRegistry;
}

const errorCode = (error: unknown): unknown =>
  error instanceof Error && 'code' in error ? error.code : undefined;

// ─────────────────────────────────────────────────────────────────────────────
// File System Utilities
// ─────────────────────────────────────────────────────────────────────────────

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Search upward through directories for a file.
 */
export async function findUp(filename: string, cwd: string): Promise<string | null> {
  let currentDir = path.resolve(cwd);
  const maxDepth = 10;

  for (let depth = 0; depth < maxDepth; depth++) {
    const filePath = path.join(currentDir, filename);
    if (await exists(filePath)) {
      return filePath;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }

  return null;
}

// ─────────────────────────────────────────────────────────────────────────────
// Config Loading
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Read a config file and decode it with the parser registered for its extension.
 */
async function readConfigFile(resolvedPath: string, registry: FileFormatRegistry): Promise<Record<string, unknown>> {
  let fileContents: string;

  try {
    fileContents = await fs.readFile(resolvedPath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new ConfigError(`Config file not found at ${resolvedPath}.`, error);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Unable to read config file at ${resolvedPath}: ${message}`, error);
  }

  const parser = registry.getConfigParser(path.extname(resolvedPath));
  try {
    return parser.parseConfiguration(fileContents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file at ${resolvedPath} could not be parsed: ${message}`, error);
  }
}

/**
 * Resolve a config path the way `loadConfigWithMeta` does, without reading it.
 * Bare file names are searched upward from `cwd`.
 * @returns null when no such file exists
 */
export async function resolveConfigPath(
  configPath = DEFAULT_CONFIG_FILENAME,
  cwd = process.cwd()
): Promise<string | null> {
  if (path.isAbsolute(configPath)) {
    return (await exists(configPath)) ? configPath : null;
  }

  const cwdPath = path.resolve(cwd, configPath);
  if (await exists(cwdPath)) {
    return cwdPath;
  }
  if (path.basename(configPath) === configPath) {
    return findUp(configPath, cwd);
  }
  return null;
}

/**
 * Load config file with upward directory traversal.
 * @param configPath - Path to config file (relative or absolute)
 * @returns Config object and metadata about where it was found
 */
export async function loadConfigWithMeta(
  configPath = DEFAULT_CONFIG_FILENAME,
  options: LoadConfigOptions = {}
): Promise<LoadConfigResult> {
  const cwd = options.cwd ?? process.cwd();
  const resolvedPath = (await resolveConfigPath(configPath, cwd)) ?? path.resolve(cwd, configPath);

  const rawConfig = await readConfigFile(resolvedPath, options.registry ?? createDefaultFileFormatRegistry());
  const config = normalizeConfig(rawConfig);
  assertConfigValid(config);

  return {
    config,
    configPath: resolvedPath,
    projectRoot: path.dirname(resolvedPath),
  };
}

/**
 * Load config file (simplified API).
 */
export async function loadConfig(configPath = DEFAULT_CONFIG_FILENAME, options: LoadConfigOptions = {}): Promise<DotlexConfig> {
  const result = await loadConfigWithMeta(configPath, options);
  return result.config;
}
