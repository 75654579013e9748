import { describe, expect, it } from 'vitest';
import { findKeyPath, parseJsonDocument, type JsonDocument } from './json-document.js';

function parse(text: string): JsonDocument {
  const result = parseJsonDocument(text);
  if (!result.ok) {
    throw new Error(result.message);
  }
  return result.document;
}

describe('parseJsonDocument', () => {
  it('keeps the source offsets of members and values', () => {
    const text = '{\n  "nav": {\n    "home": "Home"\n  }\n}\n';
    const { root } = parse(text);

    const [nav] = root.members;
    expect(nav.key).toBe('nav');
    expect(text.slice(nav.start, nav.end)).toBe('"nav": {\n    "home": "Home"\n  }');
    expect(nav.value.kind).toBe('object');
    expect(root.start).toBe(0);
    expect(root.end).toBe(text.length - 1);
  });

  it('decodes strings and keeps other scalars as source text', () => {
    const { root } = parse('{"a": "tab\\there", "b": -1.5, "c": true, "d": null, "e": [1, "x"]}');

    expect(root.members.map((member) => [member.key, member.value.kind])).toEqual([
      ['a', 'string'],
      ['b', 'number'],
      ['c', 'boolean'],
      ['d', 'null'],
      ['e', 'array'],
    ]);
    const [a, b] = root.members;
    expect(a.value.kind === 'string' && a.value.value).toBe('tab\there');
    expect(b.value.kind === 'number' && b.value.value).toBe('-1.5');
  });

  it('rejects invalid JSON with the reported offset', () => {
    const result = parseJsonDocument('{"a": 1,}');

    expect(result.ok).toBe(false);
    expect(!result.ok && result.offset).toBe(8);
  });

  it('counts a byte order mark in the reported offset', () => {
    const result = parseJsonDocument('\uFEFF{"a": 1,}');

    expect(result.ok).toBe(false);
    expect(!result.ok && result.offset).toBe(9);
  });

  it('rejects a top-level value that is not an object', () => {
    expect(parseJsonDocument('["en"]')).toEqual({
      ok: false,
      message: 'Locale file must contain a JSON object at the top level',
      offset: 0,
    });
  });
});

describe('findKeyPath', () => {
  it('follows nested members and array indexes', () => {
    const { root } = parse('{"list": [{"title": "One"}, {"title": "Two"}]}');

    const steps = findKeyPath(root, 'list.1.title');

    expect(steps?.map((step) => ('member' in step ? step.member.key : step.index))).toEqual(['list', 1, 'title']);
  });

  it('resolves dotted member names', () => {
    const { root } = parse('{"a": {"x": "nested"}, "a.b": "flat"}');

    expect(findKeyPath(root, 'a.b')?.map((step) => ('member' in step ? step.member.key : step.index))).toEqual([
      'a.b',
    ]);
    expect(findKeyPath(root, 'a.x')).toHaveLength(2);
  });

  it('uses the last of duplicate keys', () => {
    const text = '{"k": "first", "k": "second"}';
    const { root } = parse(text);

    const [step] = findKeyPath(root, 'k') ?? [];

    expect(step && 'member' in step && text.slice(step.member.start, step.member.end)).toBe('"k": "second"');
  });

  it('returns null for absent keys', () => {
    const { root } = parse('{"a": {"b": "c"}}');
    expect(findKeyPath(root, 'a.c')).toBeNull();
    expect(findKeyPath(root, 'a.b.c')).toBeNull();
  });
});
