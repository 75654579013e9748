/**
 * Finding model shared by the checker, the editors and every consumer.
 *
 * Findings are immutable records. Suppression is a flag decided at emission
 * time, so baseline tooling can still see what a directive hides.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Positions
// ─────────────────────────────────────────────────────────────────────────────

/** 1-based line and column. */
export interface Position {
  readonly line: number;
  readonly column: number;
}

/** Half-open range: `end` points just past the last character. */
export interface Span {
  readonly start: Position;
  readonly end: Position;
}

export type CommentStyle = 'js' | 'jsx';

// ─────────────────────────────────────────────────────────────────────────────
// Kinds and Severity
// ─────────────────────────────────────────────────────────────────────────────

export const FINDING_KINDS = [
  'parse-error',
  'hardcoded',
  'missing-key',
  'unresolved-key',
  'unused-key',
  'orphan-key',
  'replica-lag',
  'type-mismatch',
  'untranslated',
] as const;

export type FindingKind = (typeof FINDING_KINDS)[number];

export type Severity = 'error' | 'warning';

export const SEVERITY_BY_KIND: Readonly<Record<FindingKind, Severity>> = {
  'parse-error': 'error',
  hardcoded: 'error',
  'missing-key': 'error',
  'unresolved-key': 'warning',
  'unused-key': 'warning',
  'orphan-key': 'warning',
  'replica-lag': 'error',
  'type-mismatch': 'error',
  untranslated: 'warning',
};

/** Categories a `glot-disable*` directive can name. */
export const SUPPRESSIBLE_CATEGORIES = ['hardcoded', 'untranslated'] as const;

export type SuppressibleCategory = (typeof SUPPRESSIBLE_CATEGORIES)[number];

export function isSuppressibleCategory(value: string): value is SuppressibleCategory {
  return (SUPPRESSIBLE_CATEGORIES as readonly string[]).includes(value);
}

export function isFindingKind(value: string): value is FindingKind {
  return (FINDING_KINDS as readonly string[]).includes(value);
}

export type LocaleValueType = 'string' | 'number' | 'boolean' | 'null' | 'array';

// ─────────────────────────────────────────────────────────────────────────────
// Finding Records
// ─────────────────────────────────────────────────────────────────────────────

interface FindingBase {
  readonly severity: Severity;
  readonly filePath: string;
  readonly span: Span;
  readonly message: string;
  readonly suppressed: boolean;
}

/** A source location where a resolved key is referenced. */
export interface KeyUsageSite {
  readonly filePath: string;
  readonly line: number;
  readonly column: number;
  readonly commentStyle: CommentStyle;
  /** First line of the call's source text; edits check the line still holds it. */
  readonly callText?: string;
}

export interface ParseErrorFinding extends FindingBase {
  readonly kind: 'parse-error';
  readonly origin: 'source' | 'locale';
}

export interface HardcodedFinding extends FindingBase {
  readonly kind: 'hardcoded';
  readonly text: string;
  readonly commentStyle: CommentStyle;
}

export interface MissingKeyFinding extends FindingBase {
  readonly kind: 'missing-key';
  readonly key: string;
  readonly usages: readonly KeyUsageSite[];
}

/**
 * `template` and `opaque` describe the key argument; `namespace` means the
 * translator was bound to a non-literal namespace; `unused-annotation` is a
 * `glot-message-keys` comment that attached to no dynamic call.
 */
export type UnresolvedReason = 'template' | 'opaque' | 'namespace' | 'unused-annotation';

export interface UnresolvedKeyFinding extends FindingBase {
  readonly kind: 'unresolved-key';
  readonly reason: UnresolvedReason;
  /** Source text of the key argument, first line only. */
  readonly expression: string;
  /** Glob form of a template key (`roles.*.name`), when there is one. */
  readonly pattern?: string;
  readonly namespace: string | null;
  readonly commentStyle: CommentStyle;
  /** First line of the unresolved call's source text. */
  readonly callText?: string;
}

export interface UnusedKeyFinding extends FindingBase {
  readonly kind: 'unused-key';
  readonly key: string;
  readonly locale: string;
}

export interface OrphanKeyFinding extends FindingBase {
  readonly kind: 'orphan-key';
  readonly key: string;
  readonly locale: string;
}

export interface ReplicaLagFinding extends FindingBase {
  readonly kind: 'replica-lag';
  readonly key: string;
  /** The replica that lacks the key; the span points into the primary table. */
  readonly locale: string;
}

export interface TypeMismatchFinding extends FindingBase {
  readonly kind: 'type-mismatch';
  readonly key: string;
  readonly locale: string;
  readonly expectedType: LocaleValueType;
  readonly actualType: LocaleValueType;
}

export interface UntranslatedFinding extends FindingBase {
  readonly kind: 'untranslated';
  readonly key: string;
  readonly locale: string;
  readonly value: string;
  readonly usages: readonly KeyUsageSite[];
}

export type Finding =
  | ParseErrorFinding
  | HardcodedFinding
  | MissingKeyFinding
  | UnresolvedKeyFinding
  | UnusedKeyFinding
  | OrphanKeyFinding
  | ReplicaLagFinding
  | TypeMismatchFinding
  | UntranslatedFinding;

export type FindingOf<K extends FindingKind> = Extract<Finding, { kind: K }>;

export function isFindingOfKind<K extends FindingKind>(finding: Finding, kind: K): finding is FindingOf<K> {
  return finding.kind === kind;
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

export function pointSpan(line: number, column: number, length = 0): Span {
  return { start: { line, column }, end: { line, column: column + length } };
}

export function compareFindings(a: Finding, b: Finding): number {
  return (
    a.filePath.localeCompare(b.filePath) ||
    a.span.start.line - b.span.start.line ||
    a.span.start.column - b.span.start.column ||
    FINDING_KINDS.indexOf(a.kind) - FINDING_KINDS.indexOf(b.kind) ||
    a.message.localeCompare(b.message)
  );
}

export function sortFindings(findings: readonly Finding[]): Finding[] {
  return [...findings].sort(compareFindings);
}
