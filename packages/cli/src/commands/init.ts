import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import inquirer from 'inquirer';
import type { Command } from 'commander';
import {
  DEFAULT_CONFIG_FILENAME,
  DEFAULT_INCLUDES,
  DEFAULT_MESSAGES_ROOT,
  DEFAULT_PRIMARY_LOCALE,
  assertConfigValid,
  isSafeLanguageTag,
  normalizeConfig,
  type GlotConfig,
} from '@glot/core';
import { CliError, withErrorHandling } from '../utils/errors.js';

/**
 * Parse a comma-separated list of glob patterns, respecting brace expansions.
 * Brace-expanded globs like `src/**\/*.{ts,tsx}` are kept as a single token.
 */
export function parseGlobList(value: string): string[] {
  const result: string[] = [];
  let current = '';
  let braceDepth = 0;

  for (const char of value) {
    if (char === '{') {
      braceDepth++;
      current += char;
    } else if (char === '}') {
      braceDepth = Math.max(0, braceDepth - 1);
      current += char;
    } else if (char === ',' && braceDepth === 0) {
      const trimmed = current.trim();
      if (trimmed) result.push(trimmed);
      current = '';
    } else {
      current += char;
    }
  }

  const trimmed = current.trim();
  if (trimmed) result.push(trimmed);
  return result;
}

export interface InitCommandOptions {
  yes?: boolean;
  /** Directory to initialize; the process's working directory by default. */
  cwd?: string;
}

interface InitAnswers {
  primaryLocale: string;
  messagesRoot: string;
  includes: string;
}

/** Locale ids of the `*.json` tables already in `messagesDir`, sorted. */
export async function detectLocales(messagesDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(messagesDir);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
  return entries
    .filter((entry) => entry.endsWith('.json'))
    .map((entry) => entry.slice(0, -'.json'.length))
    .sort();
}

function pickPrimaryLocale(detected: readonly string[]): string {
  if (detected.includes(DEFAULT_PRIMARY_LOCALE)) {
    return DEFAULT_PRIMARY_LOCALE;
  }
  return detected[0] ?? DEFAULT_PRIMARY_LOCALE;
}

async function promptForAnswers(defaults: InitAnswers): Promise<InitAnswers> {
  return inquirer.prompt<InitAnswers>([
    {
      type: 'input',
      name: 'primaryLocale',
      message: 'Primary locale (the table every other locale is compared against):',
      default: defaults.primaryLocale,
      validate: (input: string) => isSafeLanguageTag(input.trim()) || 'Enter a locale id such as en or pt-BR',
    },
    {
      type: 'input',
      name: 'messagesRoot',
      message: 'Directory holding <locale>.json tables:',
      default: defaults.messagesRoot,
    },
    {
      type: 'input',
      name: 'includes',
      message: 'Directories or globs to check (comma separated):',
      default: defaults.includes,
    },
  ]);
}

export async function runInit(options: InitCommandOptions = {}): Promise<GlotConfig> {
  const cwd = options.cwd ?? process.cwd();
  const configPath = path.join(cwd, DEFAULT_CONFIG_FILENAME);

  const detected = await detectLocales(path.join(cwd, DEFAULT_MESSAGES_ROOT));
  if (detected.length) {
    console.log(chalk.blue(`Detected locales: ${detected.join(', ')}`));
  }

  const defaults: InitAnswers = {
    primaryLocale: pickPrimaryLocale(detected),
    messagesRoot: DEFAULT_MESSAGES_ROOT,
    includes: DEFAULT_INCLUDES.join(', '),
  };
  const answers = options.yes ? defaults : await promptForAnswers(defaults);

  const config = normalizeConfig({
    primaryLocale: answers.primaryLocale,
    messagesRoot: answers.messagesRoot,
    includes: parseGlobList(answers.includes),
  });
  assertConfigValid(config);

  try {
    await fs.writeFile(configPath, `${JSON.stringify(config, null, 2)}\n`, { encoding: 'utf8', flag: 'wx' });
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'EEXIST') {
      throw new CliError(`${DEFAULT_CONFIG_FILENAME} already exists`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new CliError(`Failed to write configuration file: ${message}`);
  }

  console.log(chalk.green(`✓ Created ${DEFAULT_CONFIG_FILENAME}`));
  console.log(chalk.dim(`  Primary locale: ${config.primaryLocale}`));
  console.log(chalk.blue('\nRun "glot check" to verify your setup.'));
  return config;
}

export function registerInit(program: Command) {
  program
    .command('init')
    .description(`Create a ${DEFAULT_CONFIG_FILENAME} in the current directory`)
    .option('-y, --yes', 'Skip prompts and use defaults (non-interactive mode)', false)
    .action(
      withErrorHandling(async (commandOptions: InitCommandOptions) => {
        await runInit(commandOptions);
      })
    );
}
