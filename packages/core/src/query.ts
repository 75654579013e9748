import { FINDING_KINDS, type Finding, type FindingKind, type Severity } from './findings.js';

/**
 * Read-side helpers for consumers that page through or group a finding list.
 * Input order is kept, so a sorted list stays sorted.
 */

export interface PageRequest {
  readonly offset?: number;
  readonly limit?: number;
}

export interface Page<T> {
  readonly items: T[];
  readonly total: number;
  readonly offset: number;
  readonly limit: number;
  readonly hasMore: boolean;
}

export const DEFAULT_PAGE_SIZE = 50;

function clampInteger(value: number | undefined, fallback: number, min: number): number {
  if (value === undefined || !Number.isFinite(value)) {
    return fallback;
  }
  return Math.max(min, Math.floor(value));
}

export function paginate<T>(items: readonly T[], request: PageRequest = {}): Page<T> {
  const offset = clampInteger(request.offset, 0, 0);
  const limit = clampInteger(request.limit, DEFAULT_PAGE_SIZE, 1);
  return {
    items: items.slice(offset, offset + limit),
    total: items.length,
    offset,
    limit,
    hasMore: offset + limit < items.length,
  };
}

/** Kinds appear in their canonical order; kinds with no findings are left out. */
export function groupByKind(findings: readonly Finding[]): Partial<Record<FindingKind, Finding[]>> {
  const groups: Partial<Record<FindingKind, Finding[]>> = {};
  for (const kind of FINDING_KINDS) {
    const matching = findings.filter((finding) => finding.kind === kind);
    if (matching.length) {
      groups[kind] = matching;
    }
  }
  return groups;
}

export interface FindingSummary {
  readonly total: number;
  readonly suppressed: number;
  readonly bySeverity: Record<Severity, number>;
  /** Unsuppressed findings per kind. */
  readonly byKind: Partial<Record<FindingKind, number>>;
}

/**
 * Counts unsuppressed findings by severity and kind. Suppressed findings
 * only show up in `suppressed`.
 */
export function summarize(findings: readonly Finding[]): FindingSummary {
  const bySeverity: Record<Severity, number> = { error: 0, warning: 0 };
  const byKind: Partial<Record<FindingKind, number>> = {};
  let suppressed = 0;

  for (const finding of findings) {
    if (finding.suppressed) {
      suppressed += 1;
      continue;
    }
    bySeverity[finding.severity] += 1;
    byKind[finding.kind] = (byKind[finding.kind] ?? 0) + 1;
  }

  return { total: findings.length - suppressed, suppressed, bySeverity, byKind };
}
