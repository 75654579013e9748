/**
 * CLI presentation layer for edit previews.
 * Core diff building logic is in packages/core/src/diff-utils.ts.
 */

import path from 'path';
import chalk from 'chalk';
import { buildFileDiffs, type EditOutcome, type FileDiffEntry } from '@glot/core';

/** Diffs for every file an edit outcome would rewrite. */
export function diffsForOutcome(
  outcome: EditOutcome,
  originals: ReadonlyMap<string, string>,
  projectRoot: string
): FileDiffEntry[] {
  return buildFileDiffs(
    [...outcome.texts].map(([filePath, modified]) => ({
      path: path.resolve(projectRoot, filePath),
      original: originals.get(filePath) ?? '',
      modified,
    })),
    projectRoot
  );
}

export function printFileDiffs(diffs: readonly FileDiffEntry[]): void {
  if (!diffs.length) {
    console.log(chalk.gray('No changes to preview.'));
    return;
  }

  diffs.forEach((entry) => {
    console.log(chalk.yellow(`\n--- ${entry.relativePath} (${entry.changes} line${entry.changes === 1 ? '' : 's'})`));
    for (const line of entry.diff.trimEnd().split('\n')) {
      if (line.startsWith('+') && !line.startsWith('+++')) {
        console.log(chalk.green(line));
      } else if (line.startsWith('-') && !line.startsWith('---')) {
        console.log(chalk.red(line));
      } else {
        console.log(line);
      }
    }
  });
}
