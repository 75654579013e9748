import { describe, it, expect } from 'vitest';
import { effectiveKey, resolveKeys, type ResolverOptions } from './key-resolver.js';
import { parseSource } from './parsers/source-parser.js';

const defaults: ResolverOptions = {
  checkedAttributes: new Set(['placeholder', 'title']),
  ignoreTexts: new Set(),
};

function resolve(text: string, options: Partial<ResolverOptions> = {}) {
  const unit = parseSource('Component.tsx', text);
  if (!unit.ok) {
    throw new Error(unit.failure.message);
  }
  return resolveKeys(unit.sourceFile, { ...defaults, ...options });
}

describe('resolveKeys', () => {
  describe('translation calls', () => {
    it('binds the hook namespace to calls of the translator', () => {
      const { calls } = resolve(
        [
          "import { useTranslations } from 'next-intl';",
          '',
          'export function Header() {',
          "  const t = useTranslations('nav');",
          "  return <h1>{t('title')}</h1>;",
          '}',
          '',
        ].join('\n')
      );

      expect(calls).toHaveLength(1);
      expect(calls[0].namespace).toBe('nav');
      expect(calls[0].key).toEqual({ kind: 'static', value: 'title' });
      expect(calls[0].span.start).toEqual({ line: 5, column: 15 });
      expect(calls[0].commentStyle).toBe('js');
    });

    it('reads namespaces from awaited getTranslations with an options object', () => {
      const { calls } = resolve(
        [
          'export default async function Page() {',
          "  const t = await getTranslations({ locale: 'en', namespace: 'Auth' });",
          "  return t('login');",
          '}',
        ].join('\n')
      );

      expect(calls.map((call) => effectiveKey(call.namespace, call.key.kind === 'static' ? call.key.value : ''))).toEqual(
        ['Auth.login']
      );
    });

    it('binds an empty namespace when the hook has no argument', () => {
      const { calls } = resolve("const t = useTranslations();\nt('common.save');\n");

      expect(calls[0].namespace).toBe('');
      expect(effectiveKey('', 'common.save')).toBe('common.save');
    });

    it('marks a non-literal namespace as unknown', () => {
      const { calls } = resolve("const t = useTranslations(scope);\nt('title');\n");

      expect(calls[0].namespace).toBeNull();
    });

    it('respects shadowing by parameters and inner declarations', () => {
      const { calls } = resolve(
        [
          "const t = useTranslations('a');",
          'function inner(t: (k: string) => string) {',
          "  return t('x');",
          '}',
          'function other() {',
          '  const t = (k: string) => k;',
          "  return t('z');",
          '}',
          "t('y');",
          '',
        ].join('\n')
      );

      expect(calls.map((call) => call.key)).toEqual([{ kind: 'static', value: 'y' }]);
    });

    it('recognizes translator methods and ignores other members', () => {
      const { calls } = resolve(
        [
          "const t = useTranslations('legal');",
          "t.rich('terms');",
          "t.raw('sections');",
          "t.has('footer');",
          "t.other('ignored');",
          '',
        ].join('\n')
      );

      expect(calls.map((call) => call.key)).toEqual([
        { kind: 'static', value: 'terms' },
        { kind: 'static', value: 'sections' },
        { kind: 'static', value: 'footer' },
      ]);
    });

    it('classifies template and opaque keys', () => {
      const { calls } = resolve(
        ["const t = useTranslations('dynamic');", 't(`roles.${role}.name`);', 't(labelKey);', ''].join('\n')
      );

      expect(calls[0].key).toEqual({
        kind: 'template',
        segments: [
          { type: 'literal', value: 'roles.' },
          { type: 'placeholder', expression: 'role' },
          { type: 'literal', value: '.name' },
        ],
        pattern: 'roles.*.name',
      });
      expect(calls[0].argumentText).toBe('`roles.${role}.name`');
      expect(calls[1].key).toEqual({ kind: 'opaque', text: 'labelKey' });
    });

    it('accepts custom hook names', () => {
      const { calls } = resolve("const t = useMessages('x');\nt('y');\n", { translationHooks: ['useMessages'] });

      expect(calls).toHaveLength(1);
      expect(calls[0].namespace).toBe('x');
    });
  });

  describe('hardcoded text', () => {
    const view = [
      'export const View = ({ open }: { open: boolean }) => (',
      '  <section>',
      '    <p>  Hello   world  </p>',
      "    <p>{open ? 'Open now' : 'Closed'}</p>",
      "    <style>{'.a { color: red }'}</style>",
      '    <span>42 %</span>',
      '    <input placeholder="Search" id="query-box" />',
      '  </section>',
      ');',
      '',
    ].join('\n');

    it('collects rendered literals and checked attribute values', () => {
      const { candidates } = resolve(view);

      expect(candidates.map((candidate) => candidate.text)).toEqual(['Hello   world', 'Open now', 'Closed', 'Search']);
    });

    it('starts the span at the first non-whitespace character', () => {
      const [hello] = resolve(view).candidates;

      expect(hello.span).toEqual({ start: { line: 3, column: 10 }, end: { line: 3, column: 23 } });
      expect(hello.commentStyle).toBe('jsx');
    });

    it('skips texts on the ignore list', () => {
      const { candidates } = resolve(view, { ignoreTexts: new Set(['Closed']) });

      expect(candidates.map((candidate) => candidate.text)).toEqual(['Hello   world', 'Open now', 'Search']);
    });
  });

  describe('comments', () => {
    it('collects every comment once in source order', () => {
      const { comments } = resolve('// first\nconst a = 1; // trailing\n/* block */\nexport {};\n');

      expect(comments.map((comment) => [comment.text, comment.line])).toEqual([
        ['// first', 1],
        ['// trailing', 2],
        ['/* block */', 3],
      ]);
    });

    it('finds comments inside empty JSX expressions and at the end of the file', () => {
      const { comments } = resolve('export const A = () => <div>{/* note */}</div>;\n// tail\n');

      expect(comments.map((comment) => comment.text)).toEqual(['/* note */', '// tail']);
    });
  });
});
