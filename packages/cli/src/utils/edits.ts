import fs from 'fs/promises';
import path from 'path';
import chalk from 'chalk';
import { EditQueue, writeFileAtomic, type EditConflict, type EditOutcome } from '@glot/core';
import { diffsForOutcome, printFileDiffs } from './diff-utils.js';
import { EXIT_CODES, setExitCode } from './exit-codes.js';
import { plural } from './reporter.js';

const queue = new EditQueue();

/** Reads project-relative files once, keyed by the same relative path. */
export async function readTexts(projectRoot: string, filePaths: Iterable<string>): Promise<Map<string, string>> {
  const unique = [...new Set(filePaths)].sort();
  const entries = await Promise.all(
    unique.map(async (filePath) => [filePath, await fs.readFile(path.resolve(projectRoot, filePath), 'utf8')] as const)
  );
  return new Map(entries);
}

/**
 * Writes every changed file of an outcome. Writes to one path are serialized
 * through a shared queue; different paths are written concurrently.
 */
export async function writeOutcome(outcome: EditOutcome, projectRoot: string): Promise<number> {
  await Promise.all(
    [...outcome.texts].map(([filePath, text]) => {
      const absolute = path.resolve(projectRoot, filePath);
      return queue.run(absolute, () => writeFileAtomic(absolute, text));
    })
  );
  return outcome.texts.size;
}

export function printConflicts(conflicts: readonly EditConflict[]): void {
  if (!conflicts.length) {
    return;
  }
  console.error(chalk.yellow(`\n${plural(conflicts.length, 'edit')} could not be applied:`));
  for (const conflict of conflicts) {
    console.error(chalk.yellow(`  • ${conflict.filePath} (${conflict.target}): ${conflict.message}`));
  }
}

export interface OutcomeReport {
  readonly apply: boolean;
  /** What one applied change is, e.g. "suppression comment". */
  readonly noun: string;
  readonly verb: { readonly done: string; readonly pending: string };
}

/**
 * Dry run: prints a diff per file and what would change. With `apply`:
 * writes the files. Either way conflicts are listed and fail the command.
 */
export async function finishOutcome(
  outcome: EditOutcome,
  originals: ReadonlyMap<string, string>,
  projectRoot: string,
  report: OutcomeReport
): Promise<void> {
  const changes = plural(outcome.applied, report.noun);
  if (report.apply) {
    const written = await writeOutcome(outcome, projectRoot);
    console.log(chalk.green(`${report.verb.done} ${changes} in ${plural(written, 'file')}.`));
  } else {
    printFileDiffs(diffsForOutcome(outcome, originals, projectRoot));
    console.log(chalk.yellow(`${report.verb.pending} ${changes} in ${plural(outcome.texts.size, 'file')}.`));
    if (outcome.applied > 0) {
      console.log(`Run with ${chalk.cyan('--apply')} to write these changes.`);
    }
  }

  printConflicts(outcome.conflicts);
  if (outcome.conflicts.length) {
    setExitCode(EXIT_CODES.FINDINGS);
  }
}
