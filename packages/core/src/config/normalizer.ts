/**
 * Configuration normalization utilities
 *
 * These functions take raw/unknown input and return properly typed values,
 * applying defaults where necessary.
 */

import type { ConfigOverrides, GlotConfig } from './types.js';
import {
  DEFAULT_CHECKED_ATTRIBUTES,
  DEFAULT_IGNORES,
  DEFAULT_INCLUDES,
  DEFAULT_MESSAGES_ROOT,
  DEFAULT_PRIMARY_LOCALE,
  DEFAULT_SOURCE_ROOT,
  DEFAULT_TRANSLATION_HOOKS,
} from './defaults.js';

// ─────────────────────────────────────────────────────────────────────────────
// Array Utilities
// ─────────────────────────────────────────────────────────────────────────────

export function ensureStringArray(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string => typeof item === 'string' && item.trim().length > 0)
      .map((item) => item.trim());
  }

  if (typeof value === 'string' && value.trim().length > 0) {
    return value
      .split(',')
      .map((token) => token.trim())
      .filter(Boolean);
  }

  return [];
}

export function ensureUniqueStrings(value: unknown): string[] {
  return Array.from(new Set(ensureStringArray(value)));
}

function withFallback(value: unknown, fallback: readonly string[]): string[] {
  const normalized = ensureUniqueStrings(value);
  return value === undefined ? [...fallback] : normalized;
}

// ─────────────────────────────────────────────────────────────────────────────
// Primitive Normalizers
// ─────────────────────────────────────────────────────────────────────────────

export function normalizePositiveInteger(value: unknown): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 1) {
    return undefined;
  }
  return Math.floor(value);
}

export function normalizeString(value: unknown, fallback: string): string {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    if (trimmed.length) {
      return trimmed;
    }
  }
  return fallback;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ─────────────────────────────────────────────────────────────────────────────
// Config Normalization
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Builds a complete config from whatever the file held. Unknown fields are
 * dropped, and `messagesDir` is accepted as an alias of `messagesRoot`.
 */
export function normalizeConfig(raw: unknown = {}): GlotConfig {
  const source = isRecord(raw) ? raw : {};
  const replicas = source.replicaLocales === undefined ? undefined : ensureUniqueStrings(source.replicaLocales);
  const concurrency = normalizePositiveInteger(source.concurrency);

  return {
    primaryLocale: normalizeString(source.primaryLocale, DEFAULT_PRIMARY_LOCALE),
    ...(replicas ? { replicaLocales: replicas } : {}),
    messagesRoot: normalizeString(source.messagesRoot ?? source.messagesDir, DEFAULT_MESSAGES_ROOT),
    sourceRoot: normalizeString(source.sourceRoot, DEFAULT_SOURCE_ROOT),
    includes: withFallback(source.includes, DEFAULT_INCLUDES),
    ignores: withFallback(source.ignores, DEFAULT_IGNORES),
    checkedAttributes: withFallback(source.checkedAttributes, DEFAULT_CHECKED_ATTRIBUTES),
    ignoreTexts: ensureUniqueStrings(source.ignoreTexts),
    ignoreTestFiles: typeof source.ignoreTestFiles === 'boolean' ? source.ignoreTestFiles : true,
    ...(concurrency ? { concurrency } : {}),
    translationHooks: withFallback(source.translationHooks, DEFAULT_TRANSLATION_HOOKS),
  };
}

/**
 * Command-line flags win over the file. Blank overrides are ignored.
 */
export function applyConfigOverrides(config: GlotConfig, overrides: ConfigOverrides = {}): GlotConfig {
  return {
    ...config,
    primaryLocale: normalizeString(overrides.primaryLocale, config.primaryLocale),
    sourceRoot: normalizeString(overrides.sourceRoot, config.sourceRoot),
    messagesRoot: normalizeString(overrides.messagesRoot, config.messagesRoot),
  };
}
