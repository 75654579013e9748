import type { LocaleValueType, Position } from './findings.js';
import type { ParseFailure } from './parsers/source-parser.js';
import {
  parseJsonDocument,
  type JsonDocument,
  type JsonObjectNode,
  type JsonValueNode,
} from './parsers/json-document.js';
import { computeLineStarts, positionAt } from './utils/text-lines.js';

export interface LocaleInput {
  readonly locale: string;
  readonly filePath: string;
  readonly text: string;
}

export interface LocaleEntry {
  readonly key: string;
  /** Decoded string, or the JSON source text for non-string leaves. */
  readonly value: string;
  readonly type: LocaleValueType;
  readonly position: Position;
}

export interface LocaleTable {
  readonly locale: string;
  readonly filePath: string;
  readonly text: string;
  /** Flattened leaves in document order. Empty when the file failed to parse. */
  readonly entries: ReadonlyMap<string, LocaleEntry>;
  readonly document: JsonDocument | null;
  readonly failure: ParseFailure | null;
}

/**
 * Parses a locale file and flattens it into dot-joined key paths.
 *
 * - nested objects join with `.`
 * - an array of primitives is one leaf tagged `array`
 * - an array holding objects expands by index (`items.0.title`)
 */
export function loadLocaleTable(input: LocaleInput): LocaleTable {
  const result = parseJsonDocument(input.text);
  const lineStarts = computeLineStarts(input.text);

  if (!result.ok) {
    const position = positionAt(lineStarts, result.offset);
    return {
      ...input,
      entries: new Map(),
      document: null,
      failure: { span: { start: position, end: position }, message: result.message },
    };
  }

  const entries = new Map<string, LocaleEntry>();
  const record = (key: string, node: JsonValueNode, type: LocaleValueType, offset: number) => {
    const value = type === 'array' ? input.text.slice(node.start, node.end) : scalarValue(node);
    entries.set(key, { key, value, type, position: positionAt(lineStarts, offset) });
  };

  const visitValue = (key: string, node: JsonValueNode, offset: number): void => {
    switch (node.kind) {
      case 'object':
        visitObject(node, key);
        return;
      case 'array':
        if (node.elements.some((element) => element.kind === 'object')) {
          node.elements.forEach((element, index) => visitValue(`${key}.${index}`, element, element.start));
        } else {
          record(key, node, 'array', offset);
        }
        return;
      default:
        record(key, node, node.kind, offset);
    }
  };

  const visitObject = (node: JsonObjectNode, prefix: string): void => {
    for (const member of node.members) {
      const key = prefix ? `${prefix}.${member.key}` : member.key;
      visitValue(key, member.value, member.start);
    }
  };

  visitObject(result.document.root, '');

  return { ...input, entries, document: result.document, failure: null };
}

function scalarValue(node: JsonValueNode): string {
  return node.kind === 'object' || node.kind === 'array' ? '' : node.value;
}
