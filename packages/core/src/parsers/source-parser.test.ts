import { describe, expect, it } from 'vitest';
import { parseSource } from './source-parser.js';

describe('parseSource', () => {
  it('parses TSX', () => {
    const unit = parseSource('src/App.tsx', 'export const App = () => <main>Hello</main>;\n');

    expect(unit.ok).toBe(true);
    expect(unit.ok && unit.sourceFile.getStatements()).toHaveLength(1);
  });

  it('reports the first syntax error as a failure', () => {
    const unit = parseSource('src/Broken.tsx', 'export const ok = 1;\nconst = ;\n');

    expect(unit.ok).toBe(false);
    if (!unit.ok) {
      expect(unit.failure.span.start.line).toBe(2);
      expect(unit.failure.message.length).toBeGreaterThan(0);
    }
  });

  it('does not accept JSX in a .ts file', () => {
    expect(parseSource('src/util.ts', 'export const a = <b>c</b>;\n').ok).toBe(false);
  });

  it('keeps units independent', () => {
    parseSource('src/Same.tsx', 'const = ;\n');
    expect(parseSource('src/Same.tsx', 'export {};\n').ok).toBe(true);
  });
});
