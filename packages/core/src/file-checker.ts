import {
  SEVERITY_BY_KIND,
  type Finding,
  type HardcodedFinding,
  type KeyUsageSite,
  type UnresolvedKeyFinding,
  type UnresolvedReason,
} from './findings.js';
import { parseSource } from './parsers/source-parser.js';
import { collectCommentOnlyLines, DirectiveState, type KeyAnnotation } from './directives.js';
import { effectiveKey, resolveKeys, type TranslationCall } from './key-resolver.js';
import { expandKeyPattern } from './utils/key-patterns.js';

export interface SourceInput {
  readonly filePath: string;
  readonly text: string;
}

/** One resolved key referenced at one call site. */
export interface KeyUsage extends KeyUsageSite {
  readonly key: string;
  /** The call's line is covered by an `untranslated` suppression. */
  readonly suppressedUntranslated: boolean;
}

export interface FileCheckOptions {
  readonly checkedAttributes: ReadonlySet<string>;
  readonly ignoreTexts: ReadonlySet<string>;
  /** Primary-table keys that `*` patterns in annotations expand against. */
  readonly knownKeys?: readonly string[];
  readonly translationHooks?: readonly string[];
}

export interface FileCheckResult {
  readonly filePath: string;
  readonly parsed: boolean;
  readonly findings: readonly Finding[];
  /** Resolved usages in source order; their keys form the file's used-key set. */
  readonly usages: readonly KeyUsage[];
  readonly calls: readonly TranslationCall[];
}

/**
 * Per-file pass: parse, walk, apply the file's directives. Holds no state
 * between calls, so files can be checked in any order or in parallel.
 */
export function checkFile(input: SourceInput, options: FileCheckOptions): FileCheckResult {
  const { filePath, text } = input;
  const unit = parseSource(filePath, text);

  if (!unit.ok) {
    return {
      filePath,
      parsed: false,
      findings: [
        {
          kind: 'parse-error',
          origin: 'source',
          severity: SEVERITY_BY_KIND['parse-error'],
          filePath,
          span: unit.failure.span,
          message: `Failed to parse source file: ${unit.failure.message}`,
          suppressed: false,
        },
      ],
      usages: [],
      calls: [],
    };
  }

  const resolved = resolveKeys(unit.sourceFile, options);
  const directives = DirectiveState.fromComments(resolved.comments, collectCommentOnlyLines(text, resolved.comments));
  const findings: Finding[] = [];
  const usages: KeyUsage[] = [];

  for (const candidate of resolved.candidates) {
    const finding: HardcodedFinding = {
      kind: 'hardcoded',
      severity: SEVERITY_BY_KIND.hardcoded,
      filePath,
      span: candidate.span,
      message: `Hardcoded text "${candidate.text}"`,
      suppressed: directives.isSuppressed(candidate.span.start.line, 'hardcoded'),
      text: candidate.text,
      commentStyle: candidate.commentStyle,
    };
    findings.push(finding);
  }

  const pairs = pairAnnotations(resolved.calls, directives.annotations);
  const knownKeys = options.knownKeys ?? [];

  const addUsage = (call: TranslationCall, key: string) => {
    const { line, column } = call.span.start;
    usages.push({
      key,
      filePath,
      line,
      column,
      commentStyle: call.commentStyle,
      callText: call.callText,
      suppressedUntranslated: directives.isSuppressed(line, 'untranslated'),
    });
  };

  for (const call of resolved.calls) {
    if (call.key.kind === 'static' && call.namespace !== null) {
      addUsage(call, effectiveKey(call.namespace, call.key.value));
      continue;
    }

    const annotation = pairs.get(call);
    if (annotation) {
      for (const raw of annotation.keys) {
        const base = raw.startsWith('.') ? effectiveKey(call.namespace, raw.slice(1)) : raw;
        expandKeyPattern(base, knownKeys).forEach((key) => addUsage(call, key));
      }
      continue;
    }

    findings.push(unresolvedFinding(filePath, call));
  }

  for (const annotation of directives.annotations) {
    if (![...pairs.values()].includes(annotation)) {
      findings.push({
        kind: 'unresolved-key',
        severity: SEVERITY_BY_KIND['unresolved-key'],
        filePath,
        span: annotation.span,
        message: 'Unused glot-message-keys annotation',
        suppressed: false,
        reason: 'unused-annotation',
        expression: annotation.keys.map((key) => `"${key}"`).join(' '),
        namespace: null,
        commentStyle: 'js',
      });
    }
  }

  return { filePath, parsed: true, findings, usages, calls: resolved.calls };
}

/**
 * Each annotation attaches to the first not-yet-annotated dynamic call that
 * starts on its target line.
 */
function pairAnnotations(
  calls: readonly TranslationCall[],
  annotations: readonly KeyAnnotation[]
): Map<TranslationCall, KeyAnnotation> {
  const pairs = new Map<TranslationCall, KeyAnnotation>();
  for (const annotation of annotations) {
    const call = calls.find(
      (candidate) =>
        isDynamic(candidate) && candidate.span.start.line === annotation.targetLine && !pairs.has(candidate)
    );
    if (call) {
      pairs.set(call, annotation);
    }
  }
  return pairs;
}

function isDynamic(call: TranslationCall): boolean {
  return call.key.kind !== 'static' || call.namespace === null;
}

function unresolvedFinding(filePath: string, call: TranslationCall): UnresolvedKeyFinding {
  const reason: UnresolvedReason =
    call.namespace === null ? 'namespace' : call.key.kind === 'template' ? 'template' : 'opaque';
  const message =
    reason === 'namespace'
      ? 'Translator namespace is not a string literal; keys cannot be resolved'
      : `Dynamic translation key ${call.argumentText || '(none)'} cannot be resolved`;

  return {
    kind: 'unresolved-key',
    severity: SEVERITY_BY_KIND['unresolved-key'],
    filePath,
    span: call.span,
    message,
    suppressed: false,
    reason,
    expression: call.argumentText,
    ...(call.key.kind === 'template' ? { pattern: call.key.pattern } : {}),
    namespace: call.namespace,
    commentStyle: call.commentStyle,
    callText: call.callText,
  };
}
