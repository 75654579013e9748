import {
  SEVERITY_BY_KIND,
  compareFindings,
  pointSpan,
  type Finding,
  type KeyUsageSite,
  type LocaleValueType,
  type Span,
} from './findings.js';
import type { KeyUsage } from './file-checker.js';
import type { LocaleEntry, LocaleTable } from './locale-table.js';
import { isTranslatableText } from './text-filters.js';

export interface CrossCheckInput {
  readonly primary: LocaleTable;
  readonly replicas: readonly LocaleTable[];
  /** Usages from every parsed source file. */
  readonly usages: readonly KeyUsage[];
  readonly ignoreTexts: ReadonlySet<string>;
}

/**
 * The pass that runs once every file has been checked: set algebra between
 * the union of used keys and the locale tables.
 *
 * A table that failed to parse contributes one `parse-error` and nothing
 * else. When the primary table is unreadable no key comparison happens.
 */
export function crossCheck(input: CrossCheckInput): Finding[] {
  const { primary, replicas } = input;
  const findings: Finding[] = [];

  for (const table of [primary, ...replicas]) {
    if (table.failure) {
      findings.push({
        kind: 'parse-error',
        origin: 'locale',
        severity: SEVERITY_BY_KIND['parse-error'],
        filePath: table.filePath,
        span: table.failure.span,
        message: `Failed to parse locale file: ${table.failure.message}`,
        suppressed: false,
      });
    }
  }

  if (primary.failure) {
    return findings;
  }

  const usagesByKey = groupUsages(input.usages);

  findings.push(...missingKeys(primary, usagesByKey));
  findings.push(...unusedKeys(primary, usagesByKey));

  for (const replica of replicas) {
    if (replica.failure) {
      continue;
    }
    findings.push(...compareReplica(primary, replica, usagesByKey, input.ignoreTexts));
  }

  return findings;
}

// ─────────────────────────────────────────────────────────────────────────────
// Usage Index
// ─────────────────────────────────────────────────────────────────────────────

function groupUsages(usages: readonly KeyUsage[]): Map<string, KeyUsage[]> {
  const byKey = new Map<string, KeyUsage[]>();
  for (const usage of usages) {
    const list = byKey.get(usage.key);
    if (list) {
      list.push(usage);
    } else {
      byKey.set(usage.key, [usage]);
    }
  }
  for (const list of byKey.values()) {
    list.sort(compareUsages);
  }
  return byKey;
}

function compareUsages(a: KeyUsageSite, b: KeyUsageSite): number {
  return a.filePath.localeCompare(b.filePath) || a.line - b.line || a.column - b.column;
}

function toSites(usages: readonly KeyUsage[]): KeyUsageSite[] {
  return usages.map(({ filePath, line, column, commentStyle, callText }) => ({
    filePath,
    line,
    column,
    commentStyle,
    ...(callText === undefined ? {} : { callText }),
  }));
}

// ─────────────────────────────────────────────────────────────────────────────
// Primary Table Checks
// ─────────────────────────────────────────────────────────────────────────────

function missingKeys(primary: LocaleTable, usagesByKey: ReadonlyMap<string, readonly KeyUsage[]>): Finding[] {
  const findings: Finding[] = [];
  for (const [key, usages] of usagesByKey) {
    const [first] = usages;
    if (!first || primary.entries.has(key)) {
      continue;
    }
    findings.push({
      kind: 'missing-key',
      severity: SEVERITY_BY_KIND['missing-key'],
      filePath: first.filePath,
      span: pointSpan(first.line, first.column),
      message: `Key "${key}" is missing from the primary locale (${primary.locale})`,
      suppressed: false,
      key,
      usages: toSites(usages),
    });
  }
  return findings;
}

function unusedKeys(primary: LocaleTable, usagesByKey: ReadonlyMap<string, readonly KeyUsage[]>): Finding[] {
  const findings: Finding[] = [];
  for (const entry of primary.entries.values()) {
    if (usagesByKey.has(entry.key)) {
      continue;
    }
    findings.push({
      kind: 'unused-key',
      severity: SEVERITY_BY_KIND['unused-key'],
      filePath: primary.filePath,
      span: entrySpan(entry),
      message: `Key "${entry.key}" is not used in any source file`,
      suppressed: false,
      key: entry.key,
      locale: primary.locale,
    });
  }
  return findings;
}

// ─────────────────────────────────────────────────────────────────────────────
// Replica Checks
// ─────────────────────────────────────────────────────────────────────────────

function compareReplica(
  primary: LocaleTable,
  replica: LocaleTable,
  usagesByKey: ReadonlyMap<string, readonly KeyUsage[]>,
  ignoreTexts: ReadonlySet<string>
): Finding[] {
  const findings: Finding[] = [];

  for (const entry of replica.entries.values()) {
    if (primary.entries.has(entry.key)) {
      continue;
    }
    findings.push({
      kind: 'orphan-key',
      severity: SEVERITY_BY_KIND['orphan-key'],
      filePath: replica.filePath,
      span: entrySpan(entry),
      message: `Key "${entry.key}" exists in ${replica.locale} but not in the primary locale (${primary.locale})`,
      suppressed: false,
      key: entry.key,
      locale: replica.locale,
    });
  }

  for (const expected of primary.entries.values()) {
    const actual = replica.entries.get(expected.key);
    if (!actual) {
      findings.push({
        kind: 'replica-lag',
        severity: SEVERITY_BY_KIND['replica-lag'],
        filePath: primary.filePath,
        span: entrySpan(expected),
        message: `Key "${expected.key}" is missing from locale ${replica.locale}`,
        suppressed: false,
        key: expected.key,
        locale: replica.locale,
      });
      continue;
    }

    if (expected.type !== actual.type) {
      findings.push({
        kind: 'type-mismatch',
        severity: SEVERITY_BY_KIND['type-mismatch'],
        filePath: replica.filePath,
        span: entrySpan(actual),
        message: `Key "${expected.key}" is ${describeType(expected.type)} in ${primary.locale} but ${describeType(actual.type)} in ${replica.locale}`,
        suppressed: false,
        key: expected.key,
        locale: replica.locale,
        expectedType: expected.type,
        actualType: actual.type,
      });
      continue;
    }

    if (expected.type === 'string' && expected.value === actual.value && isTranslatableText(actual.value, ignoreTexts)) {
      const usages = usagesByKey.get(expected.key) ?? [];
      findings.push({
        kind: 'untranslated',
        severity: SEVERITY_BY_KIND.untranslated,
        filePath: replica.filePath,
        span: entrySpan(actual),
        message: `Key "${expected.key}" in ${replica.locale} is identical to ${primary.locale}: "${actual.value}"`,
        suppressed: usages.length > 0 && usages.every((usage) => usage.suppressedUntranslated),
        key: expected.key,
        locale: replica.locale,
        value: actual.value,
        usages: toSites(usages),
      });
    }
  }

  return findings.sort(compareFindings);
}

function entrySpan(entry: LocaleEntry): Span {
  return pointSpan(entry.position.line, entry.position.column);
}

function describeType(type: LocaleValueType): string {
  switch (type) {
    case 'array':
      return 'an array';
    case 'null':
      return 'null';
    default:
      return `a ${type}`;
  }
}
