import chalk from 'chalk';
import type { Finding, FindingSummary, KeyUsageSite } from '@glot/core';

const MAX_USAGES_SHOWN = 3;

export function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

function usagesOf(finding: Finding): readonly KeyUsageSite[] {
  return finding.kind === 'missing-key' || finding.kind === 'untranslated' ? finding.usages : [];
}

/**
 * Lines for one finding:
 *
 *   error[hardcoded]: Hardcoded text "Submit"
 *     --> src/components/Button.tsx:3:13
 */
export function formatFinding(finding: Finding): string[] {
  const label = `${finding.severity}[${finding.kind}]`;
  const head = `${finding.severity === 'error' ? chalk.red(label) : chalk.yellow(label)}: ${finding.message}`;
  const lines = [
    finding.suppressed ? `${head} ${chalk.gray('(suppressed)')}` : head,
    `  ${chalk.blue('-->')} ${finding.filePath}:${finding.span.start.line}:${finding.span.start.column}`,
  ];

  const usages = usagesOf(finding);
  // missing-key is already located at its first usage
  const listed = finding.kind === 'missing-key' ? usages.slice(1) : usages;
  listed.slice(0, MAX_USAGES_SHOWN).forEach((usage) => {
    lines.push(`  ${chalk.blue('=')} used at ${usage.filePath}:${usage.line}:${usage.column}`);
  });
  if (listed.length > MAX_USAGES_SHOWN) {
    lines.push(chalk.gray(`  (and ${listed.length - MAX_USAGES_SHOWN} more)`));
  }
  return lines;
}

export function printFindings(findings: readonly Finding[]): void {
  findings.forEach((finding, index) => {
    if (index > 0) {
      console.log('');
    }
    formatFinding(finding).forEach((line) => console.log(line));
  });
}

export function formatSummary(summary: FindingSummary): string[] {
  const { error, warning } = summary.bySeverity;
  const lines = [
    `${chalk.red('✘')} ${plural(summary.total, 'problem')} (${chalk.red(plural(error, 'error'))}, ${chalk.yellow(
      plural(warning, 'warning')
    )})`,
  ];
  const kinds = Object.entries(summary.byKind).map(([kind, count]) => `${kind}: ${count}`);
  if (kinds.length) {
    lines.push(chalk.gray(`  ${kinds.join(', ')}`));
  }
  return lines;
}

export function formatSuccess(sourceCount: number, localeCount: number): string {
  return `${chalk.green('✓')} ${chalk.green(
    `No issues found in ${plural(sourceCount, 'source file')} and ${plural(localeCount, 'locale file')}`
  )}`;
}

/** The summary block after a finding list, or the success line when clean. */
export function printSummary(summary: FindingSummary, counts: { sourceCount: number; localeCount: number }): void {
  if (summary.total === 0) {
    console.log(formatSuccess(counts.sourceCount, counts.localeCount));
  } else {
    console.log('');
    formatSummary(summary).forEach((line) => console.log(line));
  }
  if (summary.suppressed > 0) {
    console.log(chalk.gray(`${plural(summary.suppressed, 'finding')} suppressed by glot-disable comments`));
  }
}
