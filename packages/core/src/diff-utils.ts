import { createPatch } from 'diff';
import path from 'path';

export interface FileDiffEntry {
  path: string;
  relativePath: string;
  diff: string;
  /** Added plus removed lines. */
  changes: number;
}

export interface FileChange {
  path: string;
  original: string;
  modified: string;
}

/**
 * Create a unified diff for one rewritten file.
 */
export function createUnifiedDiff(
  filePath: string,
  originalContent: string,
  newContent: string,
  workspaceRoot: string
): FileDiffEntry | null {
  if (originalContent === newContent) {
    return null;
  }

  const relativePath = (path.relative(workspaceRoot, filePath) || filePath).split(path.sep).join('/');
  const diff = createPatch(relativePath, originalContent, newContent);

  let changes = 0;
  for (const line of diff.split('\n')) {
    if ((line.startsWith('+') || line.startsWith('-')) && !line.startsWith('+++') && !line.startsWith('---')) {
      changes++;
    }
  }

  return {
    path: filePath,
    relativePath,
    diff,
    changes,
  };
}

/**
 * Build diffs for every changed file, ordered by relative path.
 */
export function buildFileDiffs(fileChanges: readonly FileChange[], workspaceRoot: string): FileDiffEntry[] {
  const diffs: FileDiffEntry[] = [];

  for (const change of fileChanges) {
    const diff = createUnifiedDiff(change.path, change.original, change.modified, workspaceRoot);
    if (diff) {
      diffs.push(diff);
    }
  }

  return diffs.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
}
