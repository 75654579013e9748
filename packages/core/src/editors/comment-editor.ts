import MagicString from 'magic-string';
import { parseDirective, MAX_COMMENT_CHAIN_LINES } from '../directives.js';
import { EditConflictError } from '../errors.js';
import type { CommentStyle, SuppressibleCategory } from '../findings.js';
import { detectEol, leadingWhitespace, splitLines, type TextLine } from '../utils/text-lines.js';

export interface SuppressionTarget {
  readonly line: number;
  readonly category: SuppressibleCategory;
  readonly commentStyle: CommentStyle;
  /** Text the line must still contain; a mismatch is an edit conflict. */
  readonly expectedText?: string;
}

export interface AnnotationTarget {
  readonly line: number;
  readonly keys: readonly string[];
  readonly commentStyle: CommentStyle;
  readonly expectedText?: string;
}

export interface CommentEditResult {
  readonly text: string;
  /** Lines that received a new or extended comment. */
  readonly applied: number;
}

const NEXT_LINE_DIRECTIVE = 'glot-disable-next-line';
const COMMENT_LINE_PATTERN = /^\s*(?:\/\/|\/\*|\{\s*\/\*|\*)/;

function renderComment(style: CommentStyle, body: string): string {
  return style === 'jsx' ? `{/* ${body} */}` : `// ${body}`;
}

function quoteKey(key: string, line: number): string {
  if (key.includes('"') || key.includes('*/')) {
    throw new EditConflictError(`Key ${JSON.stringify(key)} cannot be written into a comment`, `line ${line}`);
  }
  return `"${key}"`;
}

/**
 * Comment lines stacked directly above `line`, nearest first, up to the
 * same limit the directive tracker skips.
 */
function commentLinesAbove(lines: readonly TextLine[], line: number): TextLine[] {
  const stacked: TextLine[] = [];
  for (let index = line - 2; index >= 0 && stacked.length < MAX_COMMENT_CHAIN_LINES; index -= 1) {
    const candidate = lines[index];
    if (!COMMENT_LINE_PATTERN.test(candidate.content)) {
      break;
    }
    stacked.push(candidate);
  }
  return stacked;
}

function targetLine(lines: readonly TextLine[], line: number, expectedText: string | undefined): TextLine {
  const target = lines[line - 1];
  if (!target || line < 1) {
    throw new EditConflictError(`Line ${line} is past the end of the file`, `line ${line}`);
  }
  const expected = expectedText?.split('\n', 1)[0].trim().replace(/\\/g, '');
  // escapes differ between decoded literals and source text
  if (expected && !target.content.replace(/\\/g, '').includes(expected)) {
    throw new EditConflictError(`Line ${line} no longer contains "${expected}"`, `line ${line}`);
  }
  return target;
}

/** Offset inside a next-line directive where another category can be appended. */
function categoryInsertOffset(line: TextLine): number | null {
  const nameIndex = line.content.indexOf(NEXT_LINE_DIRECTIVE);
  if (nameIndex < 0) {
    return null;
  }
  const listStart = nameIndex + NEXT_LINE_DIRECTIVE.length;
  const rest = line.content.slice(listStart);
  const ends = [rest.indexOf(' -- '), rest.indexOf('*/')].filter((index) => index >= 0);
  let end = listStart + (ends.length ? Math.min(...ends) : rest.length);
  while (end > listStart && /\s/.test(line.content[end - 1])) {
    end -= 1;
  }
  return line.start + end;
}

// ─────────────────────────────────────────────────────────────────────────────
// Suppressions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Puts a `glot-disable-next-line <category>` comment above every target line.
 *
 * A next-line directive already above the line that covers the category
 * means nothing to do. One directly above that names other categories is
 * extended in place. Running twice gives the same text as running once.
 */
export function insertSuppressions(text: string, targets: readonly SuppressionTarget[]): CommentEditResult {
  const lines = splitLines(text);
  const eol = detectEol(text);
  const magic = new MagicString(text);
  let applied = 0;

  const byLine = new Map<number, SuppressionTarget[]>();
  for (const target of targets) {
    byLine.set(target.line, [...(byLine.get(target.line) ?? []), target]);
  }

  for (const [line, lineTargets] of [...byLine].sort((a, b) => a[0] - b[0])) {
    const [first] = lineTargets;
    const target = targetLine(lines, line, first.expectedText);
    lineTargets.slice(1).forEach((other) => targetLine(lines, line, other.expectedText));

    const above = commentLinesAbove(lines, line);
    const existing = above.map((comment) => ({ comment, directive: parseDirective(comment.content) }));
    const covered = new Set<SuppressibleCategory>();
    for (const { directive } of existing) {
      if (directive?.type !== 'disable-next-line') {
        continue;
      }
      if (directive.categories === 'all') {
        lineTargets.forEach((entry) => covered.add(entry.category));
      } else {
        directive.categories.forEach((category) => covered.add(category));
      }
    }

    const needed = Array.from(new Set(lineTargets.map((entry) => entry.category))).filter(
      (category) => !covered.has(category)
    );
    if (!needed.length) {
      continue;
    }

    const nearest = existing[0];
    const insertAt = nearest?.directive?.type === 'disable-next-line' ? categoryInsertOffset(nearest.comment) : null;
    if (insertAt !== null) {
      magic.appendLeft(insertAt, ` ${needed.join(' ')}`);
    } else {
      const indent = leadingWhitespace(target.content);
      const comment = renderComment(first.commentStyle, `${NEXT_LINE_DIRECTIVE} ${needed.join(' ')}`);
      magic.appendLeft(target.start, `${indent}${comment}${eol}`);
    }
    applied += 1;
  }

  return { text: magic.toString(), applied };
}

// ─────────────────────────────────────────────────────────────────────────────
// Annotations
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Puts a `glot-message-keys "k1" "k2"` comment above every target line that
 * is not annotated already, either above or at the end of the line.
 */
export function insertAnnotations(text: string, targets: readonly AnnotationTarget[]): CommentEditResult {
  const lines = splitLines(text);
  const eol = detectEol(text);
  const magic = new MagicString(text);
  const done = new Set<number>();
  let applied = 0;

  for (const entry of [...targets].sort((a, b) => a.line - b.line)) {
    const target = targetLine(lines, entry.line, entry.expectedText);
    if (done.has(entry.line) || !entry.keys.length) {
      continue;
    }
    done.add(entry.line);

    const annotated =
      target.content.includes('glot-message-keys') ||
      commentLinesAbove(lines, entry.line).some(
        (comment) => parseDirective(comment.content)?.type === 'message-keys'
      );
    if (annotated) {
      continue;
    }

    const indent = leadingWhitespace(target.content);
    const body = `glot-message-keys ${entry.keys.map((key) => quoteKey(key, entry.line)).join(' ')}`;
    magic.appendLeft(target.start, `${indent}${renderComment(entry.commentStyle, body)}${eol}`);
    applied += 1;
  }

  return { text: magic.toString(), applied };
}
