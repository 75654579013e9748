import { ConfigurationError } from '../errors.js';
import type { GlotConfig } from './types.js';

export interface ConfigValidationIssue {
  field: string;
  message: string;
}

function containsControlCharacters(value: string): boolean {
  for (let index = 0; index < value.length; index += 1) {
    const code = value.charCodeAt(index);
    if (code < 0x20 || code === 0x7f) {
      return true;
    }
  }
  return false;
}

const LANGUAGE_TAG_PATTERN = /^[A-Za-z0-9]+(?:[-_][A-Za-z0-9]+)*$/;
const IDENTIFIER_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
const MAX_PATH_LIKE_LENGTH = 320;
const MAX_GLOB_LENGTH = 512;

export function isSafeLanguageTag(value: string): boolean {
  return LANGUAGE_TAG_PATTERN.test(value);
}

function validatePathLike(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
    return;
  }
  if (value.length > MAX_PATH_LIKE_LENGTH) {
    issues.push({ field, message: `must be shorter than ${MAX_PATH_LIKE_LENGTH} characters` });
    return;
  }
  if (containsControlCharacters(value)) {
    issues.push({ field, message: 'contains control characters' });
  }
}

function validateLanguage(field: string, value: string, issues: ConfigValidationIssue[]) {
  if (!value.trim()) {
    issues.push({ field, message: 'must not be empty' });
    return;
  }
  if (!isSafeLanguageTag(value)) {
    issues.push({ field, message: 'must be an alphanumeric language tag (letters, numbers, "-", "_")' });
  }
}

function validateStringList(field: string, values: readonly string[], issues: ConfigValidationIssue[]) {
  values.forEach((entry, index) => {
    const targetField = `${field}[${index}]`;
    if (!entry.trim()) {
      issues.push({ field: targetField, message: 'must not be empty' });
      return;
    }
    if (entry.length > MAX_GLOB_LENGTH) {
      issues.push({ field: targetField, message: `must be shorter than ${MAX_GLOB_LENGTH} characters` });
      return;
    }
    if (containsControlCharacters(entry)) {
      issues.push({ field: targetField, message: 'contains control characters' });
    }
  });
}

export function validateConfig(config: GlotConfig): ConfigValidationIssue[] {
  const issues: ConfigValidationIssue[] = [];

  validateLanguage('primaryLocale', config.primaryLocale, issues);
  config.replicaLocales?.forEach((locale, index) => {
    const field = `replicaLocales[${index}]`;
    validateLanguage(field, locale, issues);
    if (locale === config.primaryLocale) {
      issues.push({ field, message: 'must differ from primaryLocale' });
    }
  });

  validatePathLike('messagesRoot', config.messagesRoot, issues);
  validatePathLike('sourceRoot', config.sourceRoot, issues);
  validateStringList('includes', config.includes, issues);
  validateStringList('ignores', config.ignores, issues);

  config.translationHooks.forEach((hook, index) => {
    if (!IDENTIFIER_PATTERN.test(hook)) {
      issues.push({ field: `translationHooks[${index}]`, message: 'must be a valid JavaScript identifier' });
    }
  });

  if (!config.includes.length) {
    issues.push({ field: 'includes', message: 'must name at least one directory or pattern' });
  }

  return issues;
}

export function assertConfigValid(config: GlotConfig): void {
  const issues = validateConfig(config);
  if (!issues.length) {
    return;
  }

  throw new ConfigurationError(
    'Invalid glot configuration',
    issues.map((issue) => `${issue.field}: ${issue.message}`)
  );
}
