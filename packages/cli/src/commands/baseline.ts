import type { Command } from 'commander';
import { applySuppressions, checkWorkspace, isSuppressibleCategory, type SuppressibleCategory } from '@glot/core';
import { addCommonOptions, loadCommandContext, timed, type CommonOptions } from '../utils/config.js';
import { finishOutcome, readTexts } from '../utils/edits.js';
import { CliError, withErrorHandling } from '../utils/errors.js';

export interface BaselineCommandOptions extends CommonOptions {
  rule?: string[];
  apply?: boolean;
}

const collectRules = (value: string, previous: string[] = []) => [
  ...previous,
  ...value
    .split(',')
    .map((token) => token.trim())
    .filter(Boolean),
];

export function parseRules(rules: readonly string[] | undefined): SuppressibleCategory[] {
  if (!rules?.length) {
    return ['hardcoded', 'untranslated'];
  }
  return Array.from(
    new Set(
      rules.map((rule) => {
        if (!isSuppressibleCategory(rule)) {
          throw new CliError(`Unknown baseline rule "${rule}". Expected hardcoded or untranslated`);
        }
        return rule;
      })
    )
  );
}

export function registerBaseline(program: Command) {
  const command = program
    .command('baseline')
    .description('Suppress every current hardcoded or untranslated finding with glot-disable-next-line comments')
    .option('--rule <rule>', 'Rule to baseline: hardcoded | untranslated (repeatable, default: both)', collectRules)
    .option('--apply', 'Write the comments (default is a dry-run preview)', false);

  addCommonOptions(command).action(
    withErrorHandling(async (options: BaselineCommandOptions) => runBaseline(options))
  );
}

export async function runBaseline(options: BaselineCommandOptions): Promise<void> {
  const rules = parseRules(options.rule);
  const context = await loadCommandContext(options);
  const result = await timed(context, 'check', () =>
    checkWorkspace(context.config, context.projectRoot, { checks: rules })
  );

  const targets = result.findings.filter(
    (finding) => !finding.suppressed && (finding.kind === 'hardcoded' || finding.kind === 'untranslated')
  );
  const files = targets.flatMap((finding) =>
    finding.kind === 'untranslated' ? finding.usages.map((usage) => usage.filePath) : [finding.filePath]
  );
  const originals = await readTexts(context.projectRoot, files);

  await finishOutcome(applySuppressions(targets, originals), originals, context.projectRoot, {
    apply: Boolean(options.apply),
    noun: 'suppression comment',
    verb: { done: 'Inserted', pending: 'Would insert' },
  });
}
