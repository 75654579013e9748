import fs from 'fs/promises';
import path from 'path';
import fg from 'fast-glob';
import type { GlotConfig } from './config/index.js';
import { ALWAYS_IGNORED, SOURCE_EXTENSIONS, TEST_FILE_PATTERNS } from './config/defaults.js';
import { ConfigurationError } from './errors.js';
import type { SourceInput } from './file-checker.js';
import type { LocaleInput } from './locale-table.js';

export interface LocaleFileRef {
  readonly locale: string;
  /** Relative to the project root, `/`-separated. */
  readonly filePath: string;
}

export interface LocaleFiles {
  readonly primary: LocaleFileRef;
  readonly replicas: readonly LocaleFileRef[];
}

export interface Workspace {
  readonly sources: SourceInput[];
  /** Primary table first, then replicas in configured order. */
  readonly locales: LocaleInput[];
}

const GLOB_CHARACTERS = /[*?]/;
const SOURCE_FILE_PATTERN = new RegExp(`\\.(?:${SOURCE_EXTENSIONS.join('|')})$`);

function toPosix(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

/**
 * A directory entry scans everything beneath it; entries such as
 * `src/app/[locale]` contain glob syntax only by accident, so they are escaped.
 */
function includeToPattern(entry: string): string {
  const trimmed = entry.replace(/\/+$/, '');
  if (GLOB_CHARACTERS.test(trimmed)) {
    return trimmed;
  }
  if (SOURCE_FILE_PATTERN.test(trimmed)) {
    return fg.escapePath(trimmed);
  }
  const base = trimmed === '.' || trimmed === '' ? '' : `${fg.escapePath(trimmed)}/`;
  return `${base}**/*.{${SOURCE_EXTENSIONS.join(',')}}`;
}

// ─────────────────────────────────────────────────────────────────────────────
// Discovery
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Source files under `sourceRoot` matched by `includes`, relative to the
 * project root, sorted.
 */
export async function discoverSourceFiles(config: GlotConfig, projectRoot: string): Promise<string[]> {
  const sourceRoot = path.resolve(projectRoot, config.sourceRoot);
  const ignore = [...ALWAYS_IGNORED, ...config.ignores, ...(config.ignoreTestFiles ? TEST_FILE_PATTERNS : [])];

  const files = await fg(config.includes.map(includeToPattern), {
    cwd: sourceRoot,
    ignore,
    onlyFiles: true,
    unique: true,
    followSymbolicLinks: true,
    absolute: true,
  });

  const relative = new Set(files.map((file) => toPosix(path.relative(projectRoot, file))));
  return [...relative].sort((a, b) => a.localeCompare(b));
}

/**
 * One table per `<locale>.json` in `messagesRoot`. The primary table and
 * every explicitly configured replica must exist.
 */
export async function discoverLocaleFiles(config: GlotConfig, projectRoot: string): Promise<LocaleFiles> {
  const messagesRoot = path.resolve(projectRoot, config.messagesRoot);

  let isDirectory = false;
  try {
    isDirectory = (await fs.stat(messagesRoot)).isDirectory();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Messages directory ${config.messagesRoot} cannot be read: ${reason}`);
  }
  if (!isDirectory) {
    throw new ConfigurationError(`Messages root ${config.messagesRoot} is not a directory`);
  }

  const files = await fg('*.json', { cwd: messagesRoot, onlyFiles: true });
  const byLocale = new Map<string, LocaleFileRef>();
  for (const file of files.sort((a, b) => a.localeCompare(b))) {
    const locale = path.basename(file, '.json');
    byLocale.set(locale, { locale, filePath: toPosix(path.relative(projectRoot, path.join(messagesRoot, file))) });
  }

  const primary = byLocale.get(config.primaryLocale);
  if (!primary) {
    throw new ConfigurationError(
      `Primary locale table ${config.primaryLocale}.json not found in ${config.messagesRoot}`
    );
  }

  const replicaIds = config.replicaLocales ?? [...byLocale.keys()].filter((locale) => locale !== config.primaryLocale);
  const missing = replicaIds.filter((locale) => !byLocale.has(locale));
  if (missing.length) {
    throw new ConfigurationError(
      `Replica locale tables not found in ${config.messagesRoot}`,
      missing.map((locale) => `${locale}.json`)
    );
  }

  const replicas = replicaIds.flatMap((locale) => {
    const ref = byLocale.get(locale);
    return ref ? [ref] : [];
  });

  return { primary, replicas };
}

// ─────────────────────────────────────────────────────────────────────────────
// Loading
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Reads every source and locale file once. Any read failure aborts the run.
 */
export async function loadWorkspace(config: GlotConfig, projectRoot: string): Promise<Workspace> {
  const [sourcePaths, localeFiles] = await Promise.all([
    discoverSourceFiles(config, projectRoot),
    discoverLocaleFiles(config, projectRoot),
  ]);

  const read = (filePath: string) => fs.readFile(path.resolve(projectRoot, filePath), 'utf8');

  const sources = await Promise.all(
    sourcePaths.map(async (filePath): Promise<SourceInput> => ({ filePath, text: await read(filePath) }))
  );
  const locales = await Promise.all(
    [localeFiles.primary, ...localeFiles.replicas].map(
      async ({ locale, filePath }): Promise<LocaleInput> => ({ locale, filePath, text: await read(filePath) })
    )
  );

  return { sources, locales };
}
