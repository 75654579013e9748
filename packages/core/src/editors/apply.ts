import { EditConflictError } from '../errors.js';
import type { Finding, UnresolvedKeyFinding } from '../findings.js';
import { findKeyPath, parseJsonDocument } from '../parsers/json-document.js';
import {
  insertAnnotations,
  insertSuppressions,
  type AnnotationTarget,
  type CommentEditResult,
  type SuppressionTarget,
} from './comment-editor.js';
import { deleteKeys } from './json-editor.js';

export interface EditConflict {
  readonly filePath: string;
  /** The line or key that could not be edited. */
  readonly target: string;
  readonly message: string;
}

export interface EditOutcome {
  /** New text for every file that changed. */
  readonly texts: Map<string, string>;
  readonly conflicts: EditConflict[];
  /** Comments inserted or extended, or keys deleted. */
  readonly applied: number;
}

export interface TableText {
  readonly filePath: string;
  readonly text: string;
}

/** Stable identity of a finding, used to key caller-supplied annotation guesses. */
export function findingId(finding: Finding): string {
  return `${finding.kind}:${finding.filePath}:${finding.span.start.line}:${finding.span.start.column}`;
}

function groupByFile<T>(entries: readonly (readonly [string, T])[]): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const [filePath, entry] of entries) {
    groups.set(filePath, [...(groups.get(filePath) ?? []), entry]);
  }
  return groups;
}

function conflictFrom(filePath: string, error: unknown): EditConflict {
  if (error instanceof EditConflictError) {
    return { filePath, target: error.target ?? filePath, message: error.message };
  }
  throw error;
}

/**
 * Runs one comment edit per file. A conflict discards that file's edit and
 * leaves the other files untouched.
 */
function editEachFile<T>(
  groups: ReadonlyMap<string, T[]>,
  texts: ReadonlyMap<string, string>,
  edit: (text: string, targets: T[]) => CommentEditResult,
  initial: EditConflict[] = []
): EditOutcome {
  const changed = new Map<string, string>();
  const conflicts = [...initial];
  let applied = 0;

  for (const [filePath, targets] of [...groups].sort((a, b) => a[0].localeCompare(b[0]))) {
    const text = texts.get(filePath);
    if (text === undefined) {
      conflicts.push({ filePath, target: filePath, message: `No text supplied for ${filePath}` });
      continue;
    }
    try {
      const result = edit(text, targets);
      if (result.text !== text) {
        changed.set(filePath, result.text);
      }
      applied += result.applied;
    } catch (error) {
      conflicts.push(conflictFrom(filePath, error));
    }
  }

  return { texts: changed, conflicts, applied };
}

// ─────────────────────────────────────────────────────────────────────────────
// Suppressions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Suppresses unsuppressed `hardcoded` findings on their own line, and
 * `untranslated` findings at every source line that uses the key.
 * Other kinds are ignored.
 */
export function applySuppressions(findings: readonly Finding[], texts: ReadonlyMap<string, string>): EditOutcome {
  const entries: [string, SuppressionTarget][] = [];

  for (const finding of findings) {
    if (finding.suppressed) {
      continue;
    }
    if (finding.kind === 'hardcoded') {
      entries.push([
        finding.filePath,
        {
          line: finding.span.start.line,
          category: 'hardcoded',
          commentStyle: finding.commentStyle,
          expectedText: finding.text,
        },
      ]);
    } else if (finding.kind === 'untranslated') {
      for (const usage of finding.usages) {
        entries.push([
          usage.filePath,
          { line: usage.line, category: 'untranslated', commentStyle: usage.commentStyle, expectedText: usage.callText },
        ]);
      }
    }
  }

  return editEachFile(groupByFile(entries), texts, insertSuppressions);
}

// ─────────────────────────────────────────────────────────────────────────────
// Annotations
// ─────────────────────────────────────────────────────────────────────────────

/** Keys written when the caller has no better guess: the template's glob form. */
export function defaultAnnotationKeys(finding: UnresolvedKeyFinding): string[] | null {
  if (finding.reason !== 'template' || finding.namespace === null || !finding.pattern) {
    return null;
  }
  return [finding.namespace ? `.${finding.pattern}` : finding.pattern];
}

/**
 * Annotates unresolved dynamic calls with `glot-message-keys`. `guesses` maps
 * a `findingId` to the keys to write; calls with neither a guess nor a
 * template to fall back on are reported as conflicts.
 */
export function applyAnnotations(
  findings: readonly Finding[],
  guesses: ReadonlyMap<string, readonly string[]>,
  texts: ReadonlyMap<string, string>
): EditOutcome {
  const entries: [string, AnnotationTarget][] = [];
  const skipped: EditConflict[] = [];

  for (const finding of findings) {
    if (finding.kind !== 'unresolved-key' || finding.reason === 'unused-annotation') {
      continue;
    }
    const guess = guesses.get(findingId(finding));
    const keys = guess?.length ? [...guess] : defaultAnnotationKeys(finding);
    if (!keys) {
      skipped.push({
        filePath: finding.filePath,
        target: `line ${finding.span.start.line}`,
        message: `No keys to annotate ${finding.expression} with`,
      });
      continue;
    }
    entries.push([
      finding.filePath,
      { line: finding.span.start.line, keys, commentStyle: finding.commentStyle, expectedText: finding.callText },
    ]);
  }

  return editEachFile(groupByFile(entries), texts, insertAnnotations, skipped);
}

// ─────────────────────────────────────────────────────────────────────────────
// Key Deletion
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Deletes keys from each table that holds them. A table either takes every
 * deletion or keeps its original text and reports a conflict.
 */
export function applyKeyDeletions(keys: readonly string[], tables: readonly TableText[]): EditOutcome {
  const changed = new Map<string, string>();
  const conflicts: EditConflict[] = [];
  let applied = 0;

  for (const table of tables) {
    const parsed = parseJsonDocument(table.text);
    if (!parsed.ok) {
      conflicts.push({
        filePath: table.filePath,
        target: table.filePath,
        message: `Locale file is not valid JSON: ${parsed.message}`,
      });
      continue;
    }
    const present = keys.filter((key) => findKeyPath(parsed.document.root, key) !== null);
    if (!present.length) {
      continue;
    }
    try {
      changed.set(table.filePath, deleteKeys(table.text, present));
      applied += present.length;
    } catch (error) {
      conflicts.push(conflictFrom(table.filePath, error));
    }
  }

  return { texts: changed, conflicts, applied };
}
