import { describe, it, expect } from 'vitest';
import { applyConfigOverrides, ensureStringArray, normalizeConfig } from './normalizer.js';
import { DEFAULT_CHECKED_ATTRIBUTES, DEFAULT_INCLUDES } from './defaults.js';

describe('normalizeConfig', () => {
  it('fills every field with defaults', () => {
    expect(normalizeConfig({})).toEqual({
      primaryLocale: 'en',
      messagesRoot: './messages',
      sourceRoot: './',
      includes: DEFAULT_INCLUDES,
      ignores: [],
      checkedAttributes: DEFAULT_CHECKED_ATTRIBUTES,
      ignoreTexts: [],
      ignoreTestFiles: true,
      translationHooks: ['useTranslations', 'getTranslations'],
    });
  });

  it('treats anything but an object as an empty config', () => {
    expect(normalizeConfig(['en'])).toEqual(normalizeConfig({}));
    expect(normalizeConfig(null)).toEqual(normalizeConfig({}));
  });

  it('accepts messagesDir as an alias and prefers messagesRoot', () => {
    expect(normalizeConfig({ messagesDir: 'locales' }).messagesRoot).toBe('locales');
    expect(normalizeConfig({ messagesDir: 'locales', messagesRoot: 'i18n' }).messagesRoot).toBe('i18n');
  });

  it('trims and de-duplicates string lists', () => {
    const config = normalizeConfig({ replicaLocales: [' fr ', 'de', 'fr', 3], ignoreTexts: ['OK', 'OK', ''] });
    expect(config.replicaLocales).toEqual(['fr', 'de']);
    expect(config.ignoreTexts).toEqual(['OK']);
  });

  it('keeps an explicit empty replica list', () => {
    expect(normalizeConfig({ replicaLocales: [] }).replicaLocales).toEqual([]);
    expect(normalizeConfig({}).replicaLocales).toBeUndefined();
  });

  it('drops invalid concurrency and non-boolean flags', () => {
    const config = normalizeConfig({ concurrency: 0, ignoreTestFiles: 'no' });
    expect(config.concurrency).toBeUndefined();
    expect(config.ignoreTestFiles).toBe(true);
    expect(normalizeConfig({ concurrency: 3.7 }).concurrency).toBe(3);
  });
});

describe('ensureStringArray', () => {
  it('splits comma-separated strings', () => {
    expect(ensureStringArray('fr, de ,,es')).toEqual(['fr', 'de', 'es']);
  });
});

describe('applyConfigOverrides', () => {
  it('lets flags win over the file and ignores blank flags', () => {
    const config = normalizeConfig({ primaryLocale: 'en', messagesRoot: 'messages' });
    const overridden = applyConfigOverrides(config, { primaryLocale: 'de', messagesRoot: '  ' });
    expect(overridden.primaryLocale).toBe('de');
    expect(overridden.messagesRoot).toBe('messages');
    expect(overridden.sourceRoot).toBe('./');
  });
});
