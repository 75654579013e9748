import { describe, it, expect } from 'vitest';
import { crossCheck } from './cross-checker.js';
import type { KeyUsage } from './file-checker.js';
import { sortFindings, type Finding } from './findings.js';
import { loadLocaleTable } from './locale-table.js';

function table(locale: string, contents: unknown) {
  const text = typeof contents === 'string' ? contents : `${JSON.stringify(contents, null, 2)}\n`;
  return loadLocaleTable({ locale, filePath: `/messages/${locale}.json`, text });
}

function usage(key: string, filePath = 'src/a.tsx', line = 1, suppressedUntranslated = false): KeyUsage {
  return { key, filePath, line, column: 1, commentStyle: 'js', suppressedUntranslated };
}

function kindsAndKeys(findings: readonly Finding[]) {
  return sortFindings(findings).map((finding) => [finding.kind, 'key' in finding ? finding.key : null]);
}

const noIgnores = new Set<string>();

describe('crossCheck', () => {
  it('reports a replica value identical to the primary as untranslated', () => {
    const findings = crossCheck({
      primary: table('en', { common: { button: 'Submit' } }),
      replicas: [table('fr', { common: { button: 'Submit' } })],
      usages: [usage('common.button')],
      ignoreTexts: noIgnores,
    });

    expect(findings).toEqual([
      {
        kind: 'untranslated',
        severity: 'warning',
        filePath: '/messages/fr.json',
        span: { start: { line: 3, column: 5 }, end: { line: 3, column: 5 } },
        message: 'Key "common.button" in fr is identical to en: "Submit"',
        suppressed: false,
        key: 'common.button',
        locale: 'fr',
        value: 'Submit',
        usages: [{ filePath: 'src/a.tsx', line: 1, column: 1, commentStyle: 'js' }],
      },
    ]);
  });

  it('reports primary keys no source references as unused', () => {
    const findings = crossCheck({
      primary: table('en', { legacy: { unused_old_key: 'x' } }),
      replicas: [],
      usages: [],
      ignoreTexts: noIgnores,
    });

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      kind: 'unused-key',
      severity: 'warning',
      filePath: '/messages/en.json',
      span: { start: { line: 3, column: 5 } },
      message: 'Key "legacy.unused_old_key" is not used in any source file',
      key: 'legacy.unused_old_key',
      locale: 'en',
    });
  });

  it('locates a missing key at its first usage', () => {
    const findings = crossCheck({
      primary: table('en', {}),
      replicas: [],
      usages: [usage('nav.home', 'src/b.tsx', 2), usage('nav.home', 'src/a.tsx', 7)],
      ignoreTexts: noIgnores,
    });

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({
      kind: 'missing-key',
      severity: 'error',
      filePath: 'src/a.tsx',
      span: { start: { line: 7, column: 1 } },
      message: 'Key "nav.home" is missing from the primary locale (en)',
    });
    if (findings[0].kind === 'missing-key') {
      expect(findings[0].usages.map((site) => site.filePath)).toEqual(['src/a.tsx', 'src/b.tsx']);
    }
  });

  it('matches used keys against leaves exactly', () => {
    const findings = crossCheck({
      primary: table('en', { common: { button: 'Submit' } }),
      replicas: [],
      usages: [usage('common')],
      ignoreTexts: noIgnores,
    });

    expect(kindsAndKeys(findings)).toEqual([
      ['unused-key', 'common.button'],
      ['missing-key', 'common'],
    ]);
  });

  it('compares every replica key against the primary', () => {
    const findings = crossCheck({
      primary: table('en', { title: 'Home', tags: ['a', 'b'], only: 'Primary only' }),
      replicas: [table('de', { title: 'Startseite', tags: 'a, b', extra: 'Extra' })],
      usages: [usage('title'), usage('tags'), usage('only')],
      ignoreTexts: noIgnores,
    });

    expect(kindsAndKeys(findings)).toEqual([
      ['type-mismatch', 'tags'],
      ['orphan-key', 'extra'],
      ['replica-lag', 'only'],
    ]);
    expect(sortFindings(findings).map((finding) => finding.message)).toEqual([
      'Key "tags" is an array in en but a string in de',
      'Key "extra" exists in de but not in the primary locale (en)',
      'Key "only" is missing from locale de',
    ]);
  });

  it('reports a type mismatch instead of an untranslated value', () => {
    const findings = crossCheck({
      primary: table('en', { count: '5 items' }),
      replicas: [table('fr', '{\n  "count": null\n}\n')],
      usages: [usage('count')],
      ignoreTexts: noIgnores,
    });

    expect(kindsAndKeys(findings)).toEqual([['type-mismatch', 'count']]);
    expect(findings[0].message).toBe('Key "count" is a string in en but null in fr');
  });

  it('suppresses untranslated only when every usage is suppressed', () => {
    const run = (usages: KeyUsage[]) =>
      crossCheck({
        primary: table('en', { brand: 'Acme Cloud' }),
        replicas: [table('fr', { brand: 'Acme Cloud' })],
        usages,
        ignoreTexts: noIgnores,
      }).filter((finding) => finding.kind === 'untranslated');

    expect(run([usage('brand', 'src/a.tsx', 1, true), usage('brand', 'src/b.tsx', 4, true)])[0].suppressed).toBe(true);
    expect(run([usage('brand', 'src/a.tsx', 1, true), usage('brand', 'src/b.tsx', 4, false)])[0].suppressed).toBe(false);
    expect(run([])[0].suppressed).toBe(false);
  });

  it('skips ignored and non-alphabetic identical values', () => {
    const findings = crossCheck({
      primary: table('en', { ok: 'OK', code: '404' }),
      replicas: [table('fr', { ok: 'OK', code: '404' })],
      usages: [usage('ok'), usage('code')],
      ignoreTexts: new Set(['OK']),
    });

    expect(findings).toEqual([]);
  });

  it('only reports the parse error when the primary table is malformed', () => {
    const findings = crossCheck({
      primary: table('en', '{ "title": }'),
      replicas: [table('fr', { title: 'Accueil' })],
      usages: [usage('title')],
      ignoreTexts: noIgnores,
    });

    expect(findings).toHaveLength(1);
    expect(findings[0]).toMatchObject({ kind: 'parse-error', origin: 'locale', filePath: '/messages/en.json' });
  });

  it('skips a malformed replica and still checks the primary', () => {
    const findings = crossCheck({
      primary: table('en', { title: 'Home', stale: 'Stale' }),
      replicas: [table('fr', '{ "title": "Accueil", }')],
      usages: [usage('title')],
      ignoreTexts: noIgnores,
    });

    expect(kindsAndKeys(findings)).toEqual([
      ['unused-key', 'stale'],
      ['parse-error', null],
    ]);
  });

  it('never reports a key as both missing and unused', () => {
    const primary = table('en', { a: 'A', b: { c: 'C' }, d: 'D' });
    const usageSets = [[], ['a'], ['a', 'x'], ['b', 'y.z'], ['b.c', 'd', 'a', 'q']];

    for (const keys of usageSets) {
      const findings = crossCheck({ primary, replicas: [], usages: keys.map((key) => usage(key)), ignoreTexts: noIgnores });
      const missing = new Set(findings.flatMap((finding) => (finding.kind === 'missing-key' ? [finding.key] : [])));
      const unused = findings.flatMap((finding) => (finding.kind === 'unused-key' ? [finding.key] : []));

      expect(unused.filter((key) => missing.has(key))).toEqual([]);
      expect([...missing].sort()).toEqual(keys.filter((key) => !['a', 'b.c', 'd'].includes(key)).sort());
      expect(unused.sort()).toEqual(['a', 'b.c', 'd'].filter((key) => !keys.includes(key)));
    }
  });
});
