/**
 * Directive comments and the per-file suppression state they produce.
 *
 * Grammar (line or block comments, including JSX `{/* ... *\/}`):
 *
 *   glot-disable-next-line [category ...]
 *   glot-disable [category ...]
 *   glot-enable
 *   glot-message-keys "key" ["key" ...]
 *
 * Categories are case-insensitive; unknown names are ignored and a directive
 * that names no known category applies to all of them.
 */

import {
  SUPPRESSIBLE_CATEGORIES,
  isSuppressibleCategory,
  type Span,
  type SuppressibleCategory,
} from './findings.js';

/** Comment-only lines skipped when looking for the line a directive targets. */
export const MAX_COMMENT_CHAIN_LINES = 10;

export interface CommentToken {
  /** Raw comment text including its delimiters. */
  readonly text: string;
  readonly pos: number;
  readonly end: number;
  readonly line: number;
  readonly endLine: number;
  readonly span: Span;
}

export type CategorySelection = 'all' | readonly SuppressibleCategory[];

export type Directive =
  | { readonly type: 'disable-next-line'; readonly categories: CategorySelection }
  | { readonly type: 'disable'; readonly categories: CategorySelection }
  | { readonly type: 'enable' }
  | { readonly type: 'message-keys'; readonly keys: readonly string[] };

const DIRECTIVE_PATTERN = /^glot-(disable-next-line|disable|enable|message-keys)(?=\s|$)([\s\S]*)$/;

function commentBody(raw: string): string {
  let body = raw.trim();
  if (body.startsWith('{') && body.endsWith('}')) {
    body = body.slice(1, -1).trim();
  }
  if (body.startsWith('//')) {
    body = body.slice(2);
  } else if (body.startsWith('/*')) {
    body = body.endsWith('*/') ? body.slice(2, -2) : body.slice(2);
  }
  return body.trim().replace(/^\*+\s*/, '');
}

function parseCategories(rest: string): CategorySelection {
  // anything after ` -- ` is a free-form reason
  const [list] = rest.split(/\s--\s/, 1);
  const names = list
    .split(/[\s,]+/)
    .map((name) => name.trim().toLowerCase())
    .filter(isSuppressibleCategory);
  const unique = Array.from(new Set(names));
  return unique.length ? unique : 'all';
}

/**
 * Recognizes a directive in a comment's raw text, `null` for ordinary comments
 * and for `glot-message-keys` without a quoted key.
 */
export function parseDirective(commentText: string): Directive | null {
  const match = DIRECTIVE_PATTERN.exec(commentBody(commentText));
  if (!match) {
    return null;
  }
  const [, name, rest] = match;
  switch (name) {
    case 'disable-next-line':
      return { type: 'disable-next-line', categories: parseCategories(rest) };
    case 'disable':
      return { type: 'disable', categories: parseCategories(rest) };
    case 'enable':
      return { type: 'enable' };
    default: {
      const keys = Array.from(rest.matchAll(/"([^"]*)"/g), (entry) => entry[1].trim()).filter(Boolean);
      return keys.length ? { type: 'message-keys', keys } : null;
    }
  }
}

export function selectionCovers(selection: CategorySelection, category: SuppressibleCategory): boolean {
  return selection === 'all' || selection.includes(category);
}

export function formatCategories(selection: CategorySelection): string {
  return selection === 'all' ? '' : selection.join(' ');
}

// ─────────────────────────────────────────────────────────────────────────────
// Line Classification
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Lines that hold nothing but comments (a JSX `{/* *\/}` wrapper included).
 * Blank lines are not comment-only, so they break a directive chain.
 */
export function collectCommentOnlyLines(text: string, comments: readonly CommentToken[]): Set<number> {
  let masked = '';
  let cursor = 0;
  const sorted = [...comments].sort((a, b) => a.pos - b.pos);
  for (const comment of sorted) {
    if (comment.pos < cursor) {
      continue;
    }
    masked += text.slice(cursor, comment.pos);
    masked += text.slice(comment.pos, comment.end).replace(/[^\r\n]/g, ' ');
    cursor = comment.end;
  }
  masked += text.slice(cursor);

  const result = new Set<number>();
  const originalLines = text.split('\n');
  masked.split('\n').forEach((line, index) => {
    const stripped = line.replace(/\s+/g, '');
    if (originalLines[index].trim() && (stripped === '' || stripped === '{}')) {
      result.add(index + 1);
    }
  });
  return result;
}

/** The first line after `line` that is not comment-only, within the chain limit. */
export function nextCodeLine(line: number, commentOnlyLines: ReadonlySet<number>): number {
  let next = line + 1;
  const limit = line + MAX_COMMENT_CHAIN_LINES;
  while (commentOnlyLines.has(next) && next < limit) {
    next += 1;
  }
  return next;
}

// ─────────────────────────────────────────────────────────────────────────────
// Directive State
// ─────────────────────────────────────────────────────────────────────────────

export type DirectiveEvent =
  | {
      readonly type: 'next-line';
      readonly line: number;
      readonly targetLine: number;
      readonly categories: CategorySelection;
    }
  | { readonly type: 'block-start'; readonly line: number; readonly categories: CategorySelection }
  | { readonly type: 'block-end'; readonly line: number };

export interface KeyAnnotation {
  readonly keys: readonly string[];
  /** Line of the comment itself. */
  readonly line: number;
  /** Line whose dynamic call the annotation applies to. */
  readonly targetLine: number;
  readonly span: Span;
}

interface SuppressedRange {
  readonly start: number;
  readonly end: number;
  readonly categories: CategorySelection;
}

/**
 * Suppression state for one file, built from its comments after the walk.
 *
 * Blocks form a stack: `glot-enable` closes the most recently opened block
 * and is a no-op when none is open. A block left open runs to end of file.
 * Overlapping blocks and next-line directives add up.
 */
export class DirectiveState {
  private readonly nextLines = new Map<number, Set<SuppressibleCategory>>();
  private readonly ranges: SuppressedRange[] = [];

  private constructor(
    public readonly events: readonly DirectiveEvent[],
    public readonly annotations: readonly KeyAnnotation[]
  ) {
    const open: Array<{ line: number; categories: CategorySelection }> = [];
    for (const event of events) {
      switch (event.type) {
        case 'next-line': {
          const categories = this.nextLines.get(event.targetLine) ?? new Set<SuppressibleCategory>();
          expandSelection(event.categories).forEach((category) => categories.add(category));
          this.nextLines.set(event.targetLine, categories);
          break;
        }
        case 'block-start':
          open.push({ line: event.line, categories: event.categories });
          break;
        case 'block-end': {
          const block = open.pop();
          if (block) {
            this.ranges.push({ start: block.line, end: event.line - 1, categories: block.categories });
          }
          break;
        }
      }
    }
    for (const block of open) {
      this.ranges.push({ start: block.line, end: Number.POSITIVE_INFINITY, categories: block.categories });
    }
  }

  static fromComments(comments: readonly CommentToken[], commentOnlyLines: ReadonlySet<number>): DirectiveState {
    const events: DirectiveEvent[] = [];
    const annotations: KeyAnnotation[] = [];

    for (const comment of [...comments].sort((a, b) => a.pos - b.pos)) {
      const directive = parseDirective(comment.text);
      if (!directive) {
        continue;
      }
      switch (directive.type) {
        case 'disable-next-line':
          events.push({
            type: 'next-line',
            line: comment.line,
            targetLine: nextCodeLine(comment.endLine, commentOnlyLines),
            categories: directive.categories,
          });
          break;
        case 'disable':
          events.push({ type: 'block-start', line: comment.line, categories: directive.categories });
          break;
        case 'enable':
          events.push({ type: 'block-end', line: comment.line });
          break;
        case 'message-keys':
          annotations.push({
            keys: directive.keys,
            line: comment.line,
            // a trailing annotation applies to its own line
            targetLine: commentOnlyLines.has(comment.line)
              ? nextCodeLine(comment.endLine, commentOnlyLines)
              : comment.line,
            span: comment.span,
          });
          break;
      }
    }

    return new DirectiveState(events, annotations);
  }

  static empty(): DirectiveState {
    return new DirectiveState([], []);
  }

  isSuppressed(line: number, category: SuppressibleCategory): boolean {
    if (this.nextLines.get(line)?.has(category)) {
      return true;
    }
    return this.ranges.some(
      (range) => line >= range.start && line <= range.end && selectionCovers(range.categories, category)
    );
  }
}

function expandSelection(selection: CategorySelection): readonly SuppressibleCategory[] {
  return selection === 'all' ? SUPPRESSIBLE_CATEGORIES : selection;
}
