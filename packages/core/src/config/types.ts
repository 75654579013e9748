/**
 * Configuration type definitions for glot
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export interface GlotConfig {
  /** Locale every other table is judged against. */
  primaryLocale: string;
  /**
   * Replica locales to check. When omitted every other `*.json` file in
   * `messagesRoot` is a replica.
   */
  replicaLocales?: string[];
  /** Directory holding one `<locale>.json` per locale, relative to the project root. */
  messagesRoot: string;
  /** Directory `includes` and `ignores` are resolved against. */
  sourceRoot: string;
  /** Directories or glob patterns to scan. */
  includes: string[];
  /** Glob patterns to skip. */
  ignores: string[];
  /** JSX attribute names whose literal values count as rendered text. */
  checkedAttributes: string[];
  /** Exact texts never reported as hardcoded or untranslated. */
  ignoreTexts: string[];
  /** Skip `*.test.*`, `*.spec.*` and `__tests__/` files. */
  ignoreTestFiles: boolean;
  /** Worker pool size for the per-file pass. Defaults to available cores. */
  concurrency?: number;
  /** Functions that bind a translator (`const t = useTranslations('ns')`). */
  translationHooks: string[];
}

/** Flags that take precedence over the config file. */
export interface ConfigOverrides {
  primaryLocale?: string;
  sourceRoot?: string;
  messagesRoot?: string;
}

// ─────────────────────────────────────────────────────────────────────────────
// Load Result
// ─────────────────────────────────────────────────────────────────────────────

export interface LoadConfigResult {
  config: GlotConfig;
  /** Absolute path of the file that was read, `null` when defaults were used. */
  configPath: string | null;
  /** Directory relative paths in the config resolve against. */
  projectRoot: string;
}
