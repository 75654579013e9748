import { describe, it, expect } from 'vitest';
import { loadLocaleTable } from './locale-table.js';

function load(text: string, locale = 'en') {
  return loadLocaleTable({ locale, filePath: `/messages/${locale}.json`, text });
}

describe('loadLocaleTable', () => {
  it('flattens nested objects into dot-joined paths in document order', () => {
    const table = load('{\n  "common": {\n    "submit": "Submit",\n    "cancel": "Cancel"\n  },\n  "title": "Home"\n}\n');

    expect([...table.entries.keys()]).toEqual(['common.submit', 'common.cancel', 'title']);
    expect(table.entries.get('common.cancel')).toEqual({
      key: 'common.cancel',
      value: 'Cancel',
      type: 'string',
      position: { line: 4, column: 5 },
    });
    expect(table.failure).toBeNull();
  });

  it('tags non-string leaves with their JSON type', () => {
    const table = load('{"count": -3, "on": true, "none": null, "tags": ["a", "b"]}');

    expect(table.entries.get('count')).toMatchObject({ type: 'number', value: '-3' });
    expect(table.entries.get('on')).toMatchObject({ type: 'boolean', value: 'true' });
    expect(table.entries.get('none')).toMatchObject({ type: 'null', value: 'null' });
    expect(table.entries.get('tags')).toMatchObject({ type: 'array', value: '["a", "b"]' });
  });

  it('expands arrays of objects by index', () => {
    const table = load('{"steps": [{"title": "One"}, {"title": "Two"}]}');

    expect([...table.entries.keys()]).toEqual(['steps.0.title', 'steps.1.title']);
    expect(table.entries.get('steps.1.title')?.value).toBe('Two');
  });

  it('keeps dotted member names as part of the path', () => {
    const table = load('{"auth": {"login.title": "Sign in"}}');
    expect(table.entries.get('auth.login.title')?.value).toBe('Sign in');
  });

  it('reports malformed JSON as a failure with no entries', () => {
    const table = load('{\n  "a": "x",\n}');

    expect(table.entries.size).toBe(0);
    expect(table.document).toBeNull();
    expect(table.failure?.message).toMatch(/JSON/);
  });

  it('rejects a top-level value that is not an object', () => {
    const table = load('["a"]');
    expect(table.failure?.message).toBe('Locale file must contain a JSON object at the top level');
  });
});
