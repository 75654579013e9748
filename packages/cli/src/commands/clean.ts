import chalk from 'chalk';
import type { Command } from 'commander';
import { applyKeyDeletions, checkWorkspace, type EditOutcome, type FindingKind } from '@glot/core';
import { addCommonOptions, loadCommandContext, timed, type CommonOptions } from '../utils/config.js';
import { finishOutcome, readTexts } from '../utils/edits.js';
import { CliError, withErrorHandling } from '../utils/errors.js';
import { plural } from '../utils/reporter.js';

export interface CleanCommandOptions extends CommonOptions {
  rule?: string[];
  apply?: boolean;
}

const CLEAN_RULES = {
  unused: 'unused-key',
  orphan: 'orphan-key',
} as const satisfies Record<string, FindingKind>;

type CleanRule = keyof typeof CLEAN_RULES;

function isCleanRule(value: string): value is CleanRule {
  return Object.prototype.hasOwnProperty.call(CLEAN_RULES, value);
}

const collectRules = (value: string, previous: string[] = []) => [
  ...previous,
  ...value
    .split(',')
    .map((token) => token.trim())
    .filter(Boolean),
];

export function parseCleanRules(rules: readonly string[] | undefined): FindingKind[] {
  const names = rules?.length ? rules : Object.keys(CLEAN_RULES);
  return Array.from(
    new Set(
      names.map((rule) => {
        if (!isCleanRule(rule)) {
          throw new CliError(`Unknown clean rule "${rule}". Expected unused or orphan`);
        }
        return CLEAN_RULES[rule];
      })
    )
  );
}

export function registerClean(program: Command) {
  const command = program
    .command('clean')
    .description('Delete unused keys from the primary table and orphan keys from replicas')
    .option('--rule <rule>', 'Rule to clean: unused | orphan (repeatable, default: both)', collectRules)
    .option('--apply', 'Delete the keys (default is a dry-run preview)', false);

  addCommonOptions(command).action(withErrorHandling(async (options: CleanCommandOptions) => runClean(options)));
}

export async function runClean(options: CleanCommandOptions): Promise<void> {
  const kinds = parseCleanRules(options.rule);
  const context = await loadCommandContext(options);
  const result = await timed(context, 'check', () =>
    checkWorkspace(context.config, context.projectRoot, { checks: [...kinds, 'unresolved-key'] })
  );

  // a file that was not analysed may use any key
  const parseErrors = result.findings.filter((finding) => finding.kind === 'parse-error');
  if (parseErrors.length) {
    throw new CliError(
      `Cannot clean: ${plural(parseErrors.length, 'file')} could not be parsed (${parseErrors
        .map((finding) => finding.filePath)
        .join(', ')}). Run "glot check" to see details.`
    );
  }

  const unresolved = result.findings.filter(
    (finding) => finding.kind === 'unresolved-key' && finding.reason !== 'unused-annotation' && !finding.suppressed
  );
  if (unresolved.length) {
    throw new CliError(
      `Cannot clean: ${plural(unresolved.length, 'unresolved key')} found. Annotate them with glot-message-keys ("glot fix") first.`
    );
  }

  const keysByTable = new Map<string, string[]>();
  for (const finding of result.findings) {
    if ((finding.kind === 'unused-key' || finding.kind === 'orphan-key') && kinds.includes(finding.kind)) {
      keysByTable.set(finding.filePath, [...(keysByTable.get(finding.filePath) ?? []), finding.key]);
    }
  }

  if (!keysByTable.size) {
    console.log(chalk.green('No unused or orphan keys to delete.'));
    return;
  }

  const originals = await readTexts(context.projectRoot, keysByTable.keys());
  const outcomes = [...keysByTable].map(([filePath, keys]) =>
    applyKeyDeletions(keys, [{ filePath, text: originals.get(filePath) ?? '' }])
  );
  const outcome: EditOutcome = {
    texts: new Map(outcomes.flatMap((entry) => [...entry.texts])),
    conflicts: outcomes.flatMap((entry) => entry.conflicts),
    applied: outcomes.reduce((total, entry) => total + entry.applied, 0),
  };

  await finishOutcome(outcome, originals, context.projectRoot, {
    apply: Boolean(options.apply),
    noun: 'key',
    verb: { done: 'Deleted', pending: 'Would delete' },
  });
}
