/**
 * Default configuration values for glot
 */

// ─────────────────────────────────────────────────────────────────────────────
// File Pattern Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_INCLUDES = ['src/app/[locale]', 'src/components', 'app/[locale]', 'components'];

export const DEFAULT_IGNORES: string[] = [];

/** Always skipped, whatever the config says. */
export const ALWAYS_IGNORED = ['**/node_modules/**', '**/*.d.ts'];

export const TEST_FILE_PATTERNS = ['**/*.test.*', '**/*.spec.*', '**/__tests__/**'];

export const SOURCE_EXTENSIONS = ['ts', 'tsx', 'js', 'jsx'];

// ─────────────────────────────────────────────────────────────────────────────
// Checker Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_CHECKED_ATTRIBUTES = [
  'placeholder',
  'title',
  'alt',
  'aria-label',
  'aria-description',
  'aria-placeholder',
  'aria-roledescription',
  'aria-valuetext',
];

export const DEFAULT_TRANSLATION_HOOKS = ['useTranslations', 'getTranslations'];

// ─────────────────────────────────────────────────────────────────────────────
// Other Defaults
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_PRIMARY_LOCALE = 'en';
export const DEFAULT_MESSAGES_ROOT = './messages';
export const DEFAULT_SOURCE_ROOT = './';
export const DEFAULT_CONFIG_FILENAME = '.glotrc.json';
