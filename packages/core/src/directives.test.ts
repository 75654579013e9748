import { describe, it, expect } from 'vitest';
import {
  collectCommentOnlyLines,
  DirectiveState,
  nextCodeLine,
  parseDirective,
  type CommentToken,
} from './directives.js';
import { pointSpan } from './findings.js';
import { resolveKeys } from './key-resolver.js';
import { parseSource } from './parsers/source-parser.js';

function stateFor(text: string): DirectiveState {
  const unit = parseSource('Fixture.tsx', text);
  if (!unit.ok) {
    throw new Error(unit.failure.message);
  }
  const { comments } = resolveKeys(unit.sourceFile, { checkedAttributes: new Set(), ignoreTexts: new Set() });
  return DirectiveState.fromComments(comments, collectCommentOnlyLines(text, comments));
}

function tokenFor(source: string, fragment: string): CommentToken {
  const pos = source.indexOf(fragment);
  return { text: fragment, pos, end: pos + fragment.length, line: 0, endLine: 0, span: pointSpan(0, 0) };
}

describe('parseDirective', () => {
  it('reads categories from line and block comments', () => {
    expect(parseDirective('// glot-disable-next-line hardcoded')).toEqual({
      type: 'disable-next-line',
      categories: ['hardcoded'],
    });
    expect(parseDirective('/* glot-disable HARDCODED, untranslated -- legacy page */')).toEqual({
      type: 'disable',
      categories: ['hardcoded', 'untranslated'],
    });
    expect(parseDirective('/** glot-disable */')).toEqual({ type: 'disable', categories: 'all' });
  });

  it('treats a directive without known categories as covering all of them', () => {
    expect(parseDirective('{/* glot-disable-next-line */}')).toEqual({ type: 'disable-next-line', categories: 'all' });
    expect(parseDirective('// glot-disable-next-line spelling')).toEqual({
      type: 'disable-next-line',
      categories: 'all',
    });
  });

  it('collects quoted keys for message-keys annotations', () => {
    expect(parseDirective('// glot-message-keys "a.b" "c.*"')).toEqual({ type: 'message-keys', keys: ['a.b', 'c.*'] });
    expect(parseDirective('// glot-message-keys')).toBeNull();
  });

  it('ignores ordinary comments and near misses', () => {
    expect(parseDirective('// glot-enable')).toEqual({ type: 'enable' });
    expect(parseDirective('// glot-disabled')).toBeNull();
    expect(parseDirective('// see glot-disable')).toBeNull();
    expect(parseDirective('// just a note')).toBeNull();
  });
});

describe('collectCommentOnlyLines', () => {
  it('marks lines holding nothing but comments and never blank lines', () => {
    const source = 'const a = 1; // trailing\n// note\n\n/* a\n   b */\n';
    const comments = ['// trailing', '// note', '/* a\n   b */'].map((fragment) => tokenFor(source, fragment));

    expect([...collectCommentOnlyLines(source, comments)].sort((a, b) => a - b)).toEqual([2, 4, 5]);
  });

  it('stops the comment chain after the limit', () => {
    const lines = new Set(Array.from({ length: 19 }, (_, index) => index + 2));
    expect(nextCodeLine(1, lines)).toBe(11);
    expect(nextCodeLine(1, new Set([2]))).toBe(3);
  });
});

describe('DirectiveState', () => {
  it('suppresses only the named category on the next line', () => {
    const state = stateFor('// glot-disable-next-line hardcoded\nconst a = 1;\nconst b = 2;\n');

    expect(state.isSuppressed(2, 'hardcoded')).toBe(true);
    expect(state.isSuppressed(2, 'untranslated')).toBe(false);
    expect(state.isSuppressed(3, 'hardcoded')).toBe(false);
  });

  it('skips comment-only lines between the directive and the code', () => {
    const state = stateFor('// glot-disable-next-line hardcoded\n// unrelated note\nconst a = 1;\n');

    expect(state.events[0]).toEqual({ type: 'next-line', line: 1, targetLine: 3, categories: ['hardcoded'] });
    expect(state.isSuppressed(3, 'hardcoded')).toBe(true);
  });

  it('does not reach across a blank line', () => {
    const state = stateFor('// glot-disable-next-line hardcoded\n\nconst a = 1;\n');

    expect(state.isSuppressed(3, 'hardcoded')).toBe(false);
  });

  it('covers the lines between disable and enable', () => {
    const state = stateFor(
      ['const a = 1;', '// glot-disable hardcoded', 'const b = 2;', '// glot-enable', 'const c = 3;', ''].join('\n')
    );

    expect(state.isSuppressed(1, 'hardcoded')).toBe(false);
    expect(state.isSuppressed(3, 'hardcoded')).toBe(true);
    expect(state.isSuppressed(5, 'hardcoded')).toBe(false);
  });

  it('closes the most recent block first', () => {
    const state = stateFor(
      [
        '// glot-disable untranslated',
        '// glot-disable hardcoded',
        'const a = 1;',
        '// glot-enable',
        'const b = 2;',
        '// glot-enable',
        'const c = 3;',
        '',
      ].join('\n')
    );

    expect(state.isSuppressed(3, 'hardcoded')).toBe(true);
    expect(state.isSuppressed(5, 'hardcoded')).toBe(false);
    expect(state.isSuppressed(5, 'untranslated')).toBe(true);
    expect(state.isSuppressed(7, 'untranslated')).toBe(false);
  });

  it('runs an unclosed block to the end of the file', () => {
    const state = stateFor('// glot-disable\nconst a = 1;\nconst b = 2;\n');

    expect(state.isSuppressed(3, 'hardcoded')).toBe(true);
    expect(state.isSuppressed(3, 'untranslated')).toBe(true);
  });

  it('treats enable without an open block as a no-op', () => {
    const state = stateFor('// glot-enable\nconst a = 1;\n');

    expect(state.events).toEqual([{ type: 'block-end', line: 1 }]);
    expect(state.isSuppressed(2, 'hardcoded')).toBe(false);
  });

  it('adds a next-line directive to an enclosing block', () => {
    const state = stateFor(
      [
        '// glot-disable untranslated',
        '// glot-disable-next-line hardcoded',
        'const a = 1;',
        'const b = 2;',
        '// glot-enable',
        '',
      ].join('\n')
    );

    expect(state.isSuppressed(3, 'hardcoded')).toBe(true);
    expect(state.isSuppressed(3, 'untranslated')).toBe(true);
    expect(state.isSuppressed(4, 'hardcoded')).toBe(false);
    expect(state.isSuppressed(4, 'untranslated')).toBe(true);
  });

  it('reads directives written as JSX comments', () => {
    const state = stateFor(
      [
        'export const Page = () => (',
        '  <div>',
        '    {/* glot-disable-next-line */}',
        '    <h1>Legacy Header</h1>',
        '  </div>',
        ');',
        '',
      ].join('\n')
    );

    expect(state.isSuppressed(4, 'hardcoded')).toBe(true);
    expect(state.isSuppressed(5, 'hardcoded')).toBe(false);
  });

  it('targets annotations at the next code line or at their own line when trailing', () => {
    const state = stateFor(
      ['// glot-message-keys "a.b"', 'const x = 1;', 'const y = 2; // glot-message-keys "c.d"', ''].join('\n')
    );

    expect(state.annotations.map(({ keys, line, targetLine }) => ({ keys, line, targetLine }))).toEqual([
      { keys: ['a.b'], line: 1, targetLine: 2 },
      { keys: ['c.d'], line: 3, targetLine: 3 },
    ]);
  });

  it('is empty without comments', () => {
    expect(DirectiveState.empty().isSuppressed(1, 'hardcoded')).toBe(false);
  });
});
