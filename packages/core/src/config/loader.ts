/**
 * Configuration file loading utilities
 */

import fs from 'fs/promises';
import path from 'path';
import type { LoadConfigResult } from './types.js';
import { normalizeConfig } from './normalizer.js';
import { assertConfigValid } from './validator.js';
import { DEFAULT_CONFIG_FILENAME } from './defaults.js';
import { ConfigurationError } from '../errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// File System Utilities
// ─────────────────────────────────────────────────────────────────────────────

async function fileExists(filePath: string): Promise<boolean> {
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
async function findUp(filename: string, cwd: string): Promise<string | null> {
  let currentDir = cwd;
  const maxDepth = 10; // Prevent infinite loops

  for (let depth = 0; depth < maxDepth; depth += 1) {
    const filePath = path.join(currentDir, filename);
    if (await fileExists(filePath)) {
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

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Load and parse a config file from a specific path.
 */
async function readConfigFile(resolvedPath: string): Promise<unknown> {
  let fileContents: string;

  try {
    fileContents = await fs.readFile(resolvedPath, 'utf-8');
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new ConfigurationError(`Config file not found at ${resolvedPath}. Run "glot init" to create one.`);
    }
    throw new ConfigurationError(`Unable to read config file at ${resolvedPath}: ${describeError(error)}`);
  }

  try {
    return JSON.parse(fileContents);
  } catch (error) {
    throw new ConfigurationError(`Config file at ${resolvedPath} contains invalid JSON: ${describeError(error)}`);
  }
}

/**
 * Load config file with upward directory traversal.
 *
 * Without an explicit path, `.glotrc.json` is searched from `cwd` upward; when
 * none exists the defaults apply and the project root is `cwd`. A path that
 * was asked for by name must exist.
 */
export async function loadConfigWithMeta(
  configPath?: string,
  options?: { cwd?: string }
): Promise<LoadConfigResult> {
  const cwd = options?.cwd ?? process.cwd();
  let resolvedPath: string | null;

  if (configPath) {
    resolvedPath = path.resolve(cwd, configPath);
  } else {
    resolvedPath = await findUp(DEFAULT_CONFIG_FILENAME, cwd);
  }

  if (!resolvedPath) {
    const config = normalizeConfig({});
    assertConfigValid(config);
    return { config, configPath: null, projectRoot: cwd };
  }

  const config = normalizeConfig(await readConfigFile(resolvedPath));
  assertConfigValid(config);

  return {
    config,
    configPath: resolvedPath,
    projectRoot: path.dirname(resolvedPath),
  };
}
