import chalk from 'chalk';
import type { Command } from 'commander';
import { applyAnnotations, checkWorkspace, type UnresolvedKeyFinding } from '@glot/core';
import { addCommonOptions, loadCommandContext, timed, type CommonOptions } from '../utils/config.js';
import { finishOutcome, readTexts } from '../utils/edits.js';
import { withErrorHandling } from '../utils/errors.js';

export interface FixCommandOptions extends CommonOptions {
  apply?: boolean;
}

export function registerFix(program: Command) {
  const command = program
    .command('fix')
    .description('Annotate dynamic template keys with glot-message-keys comments')
    .option('--apply', 'Write the comments (default is a dry-run preview)', false);

  addCommonOptions(command).action(withErrorHandling(async (options: FixCommandOptions) => runFix(options)));
}

export async function runFix(options: FixCommandOptions): Promise<void> {
  const context = await loadCommandContext(options);
  const result = await timed(context, 'check', () =>
    checkWorkspace(context.config, context.projectRoot, { checks: ['unresolved-key'] })
  );

  const unresolved = result.findings.filter(
    (finding): finding is UnresolvedKeyFinding =>
      finding.kind === 'unresolved-key' && finding.reason !== 'unused-annotation'
  );

  if (!unresolved.length) {
    console.log(chalk.green('No unresolved dynamic keys to annotate.'));
    return;
  }

  const originals = await readTexts(context.projectRoot, unresolved.map((finding) => finding.filePath));
  const outcome = applyAnnotations(unresolved, new Map(), originals);

  await finishOutcome(outcome, originals, context.projectRoot, {
    apply: Boolean(options.apply),
    noun: 'glot-message-keys annotation',
    verb: { done: 'Inserted', pending: 'Would insert' },
  });

  if (options.apply && outcome.applied > 0) {
    console.log(chalk.gray('Review the inserted key patterns; they match every key of that shape in the primary table.'));
  }
}
