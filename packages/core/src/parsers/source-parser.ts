import { ts, type SourceFile } from 'ts-morph';
import { createSourceProject } from '../project-factory.js';
import type { Span } from '../findings.js';

export interface ParseFailure {
  readonly span: Span;
  readonly message: string;
}

export type SourceUnit =
  | {
      readonly ok: true;
      readonly filePath: string;
      readonly text: string;
      readonly sourceFile: SourceFile;
    }
  | {
      readonly ok: false;
      readonly filePath: string;
      readonly text: string;
      readonly failure: ParseFailure;
    };

/**
 * Parses one source file into a ts-morph tree. The script kind follows the
 * extension, so JSX is only legal in `.tsx`, `.jsx` and `.js` files.
 *
 * The first syntactic diagnostic, if any, turns the unit into a failure.
 */
export function parseSource(filePath: string, text: string): SourceUnit {
  const project = createSourceProject();
  const sourceFile = project.createSourceFile(filePath, text, { overwrite: true });
  const [diagnostic] = project.getProgram().getSyntacticDiagnostics(sourceFile);

  if (!diagnostic) {
    return { ok: true, filePath, text, sourceFile };
  }

  const startOffset = diagnostic.getStart() ?? 0;
  const endOffset = Math.min(text.length, startOffset + (diagnostic.getLength() ?? 0));
  const start = sourceFile.getLineAndColumnAtPos(startOffset);
  const end = sourceFile.getLineAndColumnAtPos(endOffset);

  return {
    ok: false,
    filePath,
    text,
    failure: {
      span: { start, end },
      message: ts.flattenDiagnosticMessageText(diagnostic.compilerObject.messageText, '\n'),
    },
  };
}
