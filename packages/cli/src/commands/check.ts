import type { Command } from 'commander';
import { CHECK_NAMES, checkWorkspace, isCheckName, summarize, type FindingKind } from '@glot/core';
import { addCommonOptions, loadCommandContext, timed, type CommonOptions } from '../utils/config.js';
import { CliError, withErrorHandling } from '../utils/errors.js';
import { EXIT_CODES, setExitCode } from '../utils/exit-codes.js';
import { printFindings, printSummary } from '../utils/reporter.js';

export interface CheckCommandOptions extends CommonOptions {
  json?: boolean;
  showSuppressed?: boolean;
}

export function parseCheckNames(names: readonly string[]): FindingKind[] | undefined {
  if (!names.length) {
    return undefined;
  }
  return names.map((name) => {
    if (!isCheckName(name)) {
      throw new CliError(`Unknown check "${name}". Expected one of: ${Object.keys(CHECK_NAMES).join(', ')}`);
    }
    return CHECK_NAMES[name];
  });
}

export function registerCheck(program: Command) {
  const command = program
    .command('check')
    .description('Report hardcoded text, key problems and locale drift')
    .argument('[checks...]', `Checks to run: ${Object.keys(CHECK_NAMES).join(' | ')} (default: all)`)
    .option('--json', 'Print findings as JSON', false)
    .option('--show-suppressed', 'Also list findings hidden by glot-disable comments', false);

  addCommonOptions(command).action(
    withErrorHandling(async (checks: string[], options: CheckCommandOptions) => runCheckCommand(checks, options))
  );
}

export async function runCheckCommand(checkNames: readonly string[], options: CheckCommandOptions): Promise<void> {
  const checks = parseCheckNames(checkNames);
  const context = await loadCommandContext(options);
  const result = await timed(context, 'check', () =>
    checkWorkspace(context.config, context.projectRoot, { checks })
  );

  const summary = summarize(result.findings);
  const visible = options.showSuppressed ? result.findings : result.findings.filter((finding) => !finding.suppressed);

  if (options.json) {
    console.log(JSON.stringify({ findings: visible, summary }, null, 2));
  } else {
    printFindings(visible);
    printSummary(summary, result);
  }

  if (summary.bySeverity.error > 0) {
    setExitCode(EXIT_CODES.FINDINGS);
  }
}
