import os from 'os';
import pLimit from 'p-limit';
import type { GlotConfig } from './config/index.js';
import { crossCheck } from './cross-checker.js';
import { ConfigurationError } from './errors.js';
import { checkFile, type FileCheckOptions, type SourceInput } from './file-checker.js';
import { sortFindings, type Finding, type FindingKind } from './findings.js';
import { loadLocaleTable, type LocaleInput, type LocaleTable } from './locale-table.js';
import { loadWorkspace } from './workspace.js';

/** Names accepted by `glot check [checks...]`. */
export const CHECK_NAMES = {
  hardcoded: 'hardcoded',
  missing: 'missing-key',
  unresolved: 'unresolved-key',
  unused: 'unused-key',
  orphan: 'orphan-key',
  lag: 'replica-lag',
  'type-mismatch': 'type-mismatch',
  untranslated: 'untranslated',
} as const satisfies Record<string, FindingKind>;

export type CheckName = keyof typeof CHECK_NAMES;

export function isCheckName(value: string): value is CheckName {
  return Object.prototype.hasOwnProperty.call(CHECK_NAMES, value);
}

export interface CheckInput {
  readonly config: GlotConfig;
  readonly sources: readonly SourceInput[];
  readonly locales: readonly LocaleInput[];
}

export interface CheckRunOptions {
  /** Kinds to emit. Parse errors are always emitted. Defaults to every kind. */
  readonly checks?: readonly FindingKind[];
}

export interface CheckResult {
  /** Sorted by file, line, column and kind. Suppressed findings included. */
  readonly findings: Finding[];
  readonly usedKeys: ReadonlySet<string>;
  readonly sourceCount: number;
  readonly localeCount: number;
}

/**
 * Runs the per-file pass over a bounded pool, waits for every file, then runs
 * the cross-file pass. Output order never depends on scheduling.
 */
export async function runCheck(input: CheckInput, options: CheckRunOptions = {}): Promise<CheckResult> {
  const { config } = input;
  const { primary, replicas } = selectTables(config, input.locales.map(loadLocaleTable));

  const fileOptions: FileCheckOptions = {
    checkedAttributes: new Set(config.checkedAttributes),
    ignoreTexts: new Set(config.ignoreTexts),
    knownKeys: [...primary.entries.keys()],
    translationHooks: config.translationHooks,
  };

  const limit = pLimit(config.concurrency ?? os.availableParallelism());
  const results = await Promise.all(input.sources.map((source) => limit(async () => checkFile(source, fileOptions))));

  const usages = results.flatMap((result) => result.usages);
  const findings = [
    ...results.flatMap((result) => result.findings),
    ...crossCheck({ primary, replicas, usages, ignoreTexts: fileOptions.ignoreTexts }),
  ];

  const wanted = options.checks ? new Set<FindingKind>(['parse-error', ...options.checks]) : null;

  return {
    findings: sortFindings(wanted ? findings.filter((finding) => wanted.has(finding.kind)) : findings),
    usedKeys: new Set(usages.map((usage) => usage.key)),
    sourceCount: input.sources.length,
    localeCount: input.locales.length,
  };
}

/**
 * Discovery plus `runCheck` for a project on disk.
 */
export async function checkWorkspace(
  config: GlotConfig,
  projectRoot: string,
  options: CheckRunOptions = {}
): Promise<CheckResult> {
  const workspace = await loadWorkspace(config, projectRoot);
  return runCheck({ config, ...workspace }, options);
}

function selectTables(
  config: GlotConfig,
  tables: readonly LocaleTable[]
): { primary: LocaleTable; replicas: LocaleTable[] } {
  const byLocale = new Map(tables.map((table) => [table.locale, table]));
  const primary = byLocale.get(config.primaryLocale);
  if (!primary) {
    throw new ConfigurationError(`Primary locale table for ${config.primaryLocale} was not supplied`);
  }

  if (!config.replicaLocales) {
    return { primary, replicas: tables.filter((table) => table !== primary) };
  }

  const replicas: LocaleTable[] = [];
  const missing: string[] = [];
  for (const locale of config.replicaLocales) {
    const table = byLocale.get(locale);
    if (table) {
      replicas.push(table);
    } else {
      missing.push(locale);
    }
  }
  if (missing.length) {
    throw new ConfigurationError('Replica locale tables were not supplied', missing);
  }
  return { primary, replicas };
}
