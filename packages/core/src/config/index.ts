/**
 * Configuration module for glot
 *
 * This module handles loading, parsing, and normalizing configuration files.
 */

export type { GlotConfig, ConfigOverrides, LoadConfigResult } from './types.js';

export {
  DEFAULT_INCLUDES,
  DEFAULT_IGNORES,
  DEFAULT_CHECKED_ATTRIBUTES,
  DEFAULT_TRANSLATION_HOOKS,
  DEFAULT_PRIMARY_LOCALE,
  DEFAULT_MESSAGES_ROOT,
  DEFAULT_SOURCE_ROOT,
  DEFAULT_CONFIG_FILENAME,
} from './defaults.js';

export {
  ensureStringArray,
  ensureUniqueStrings,
  normalizePositiveInteger,
  normalizeConfig,
  applyConfigOverrides,
} from './normalizer.js';

export { validateConfig, assertConfigValid, isSafeLanguageTag } from './validator.js';
export type { ConfigValidationIssue } from './validator.js';

export { loadConfigWithMeta } from './loader.js';
