import path from 'path';
import { performance } from 'perf_hooks';
import chalk from 'chalk';
import type { Command } from 'commander';
import { applyConfigOverrides, assertConfigValid, loadConfigWithMeta, type GlotConfig } from '@glot/core';

/** Flags every analysis command accepts. */
export interface CommonOptions {
  config?: string;
  primaryLocale?: string;
  sourceRoot?: string;
  messagesRoot?: string;
  verbose?: boolean;
  /** Directory the command runs in; the process's working directory by default. */
  cwd?: string;
}

export interface CommandContext {
  config: GlotConfig;
  projectRoot: string;
  configPath: string | null;
  verbose: boolean;
}

export function addCommonOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'Path to the glot config file (searched upward from the current directory by default)')
    .option('--primary-locale <locale>', 'Primary locale, overriding the config file')
    .option('--source-root <path>', 'Directory source includes resolve against, overriding the config file')
    .option('--messages-root <path>', 'Directory holding <locale>.json tables, overriding the config file')
    .option('-v, --verbose', 'Print the resolved config and timings to stderr', false);
}

export async function loadCommandContext(options: CommonOptions): Promise<CommandContext> {
  const cwd = options.cwd ?? process.cwd();
  const loaded = await loadConfigWithMeta(options.config, { cwd });
  const config = applyConfigOverrides(loaded.config, {
    primaryLocale: options.primaryLocale,
    sourceRoot: options.sourceRoot,
    messagesRoot: options.messagesRoot,
  });
  assertConfigValid(config);

  const verbose = Boolean(options.verbose);
  if (verbose) {
    const source = loaded.configPath ? path.relative(cwd, loaded.configPath) || loaded.configPath : 'defaults';
    console.error(chalk.gray(`Config: ${source}`));
    console.error(chalk.gray(`Project root: ${loaded.projectRoot}`));
    console.error(chalk.gray(JSON.stringify(config, null, 2)));
  }

  return { config, projectRoot: loaded.projectRoot, configPath: loaded.configPath, verbose };
}

/** Logs how long a step took when `--verbose` is on. */
export async function timed<T>(context: CommandContext, label: string, step: () => Promise<T>): Promise<T> {
  const started = performance.now();
  const result = await step();
  if (context.verbose) {
    console.error(chalk.gray(`${label} took ${Math.round(performance.now() - started)}ms`));
  }
  return result;
}
