import MagicString from 'magic-string';
import { EditConflictError } from '../errors.js';
import {
  findKeyPath,
  parseJsonDocument,
  type JsonDocument,
  type JsonObjectNode,
  type JsonPathStep,
  type JsonRange,
} from '../parsers/json-document.js';
import { detectEol, leadingWhitespace } from '../utils/text-lines.js';

export type JsonLeafValue = string | number | boolean | null;

const DEFAULT_INDENT = '  ';

function parseOrConflict(text: string): JsonDocument {
  const result = parseJsonDocument(text);
  if (!result.ok) {
    throw new EditConflictError(`Locale file is not valid JSON: ${result.message}`);
  }
  return result.document;
}

/** Whitespace before `offset` when nothing else precedes it on its line. */
function indentationAt(text: string, offset: number): string | null {
  const lineStart = text.lastIndexOf('\n', offset - 1) + 1;
  const before = text.slice(lineStart, offset);
  return before.trim() === '' ? leadingWhitespace(before) : null;
}

function detectIndentUnit(document: JsonDocument): string {
  const [first] = document.root.members;
  const indent = first ? indentationAt(document.text, first.start) : null;
  return indent || DEFAULT_INDENT;
}

// ─────────────────────────────────────────────────────────────────────────────
// Deletion
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Deletes key paths while keeping every other byte of the document. Objects
 * left empty by a deletion are removed as well, up to the first ancestor
 * that still holds something. Array elements are never pruned, so indices of
 * the remaining elements do not shift.
 */
export function deleteKeys(text: string, keys: readonly string[]): string {
  const batch = new Set(keys);
  const effective = [...batch].filter((key) => !hasAncestorIn(key, batch));

  let current = text;
  for (const key of effective) {
    current = deleteOne(current, key);
  }
  return current;
}

export function deleteKey(text: string, key: string): string {
  return deleteKeys(text, [key]);
}

function hasAncestorIn(key: string, batch: ReadonlySet<string>): boolean {
  const segments = key.split('.');
  for (let length = 1; length < segments.length; length += 1) {
    if (batch.has(segments.slice(0, length).join('.'))) {
      return true;
    }
  }
  return false;
}

/** Removes every duplicate of the key, last first, until a lookup finds none. */
function deleteOne(text: string, key: string): string {
  let steps = findKeyPath(parseOrConflict(text).root, key);
  if (!steps) {
    throw new EditConflictError(`Key "${key}" not found`, key);
  }

  let current = text;
  while (steps) {
    current = removeStep(current, steps);
    steps = findKeyPath(parseOrConflict(current).root, key);
  }
  return current;
}

function removeStep(text: string, steps: readonly JsonPathStep[]): string {
  let index = steps.length - 1;
  while (index > 0 && isOnlyObjectMember(steps[index]) && 'member' in steps[index - 1]) {
    index -= 1;
  }

  const magic = new MagicString(text);
  const [from, to] = removalRange(steps[index]);
  magic.remove(from, to);
  return magic.toString();
}

function isOnlyObjectMember(step: JsonPathStep): boolean {
  return 'member' in step && step.container.members.length === 1;
}

function removalRange(step: JsonPathStep): [number, number] {
  const items: readonly JsonRange[] = 'member' in step ? step.container.members : step.container.elements;
  const item = 'member' in step ? step.member : step.element;
  const position = items.indexOf(item);

  if (items.length === 1) {
    return [step.container.start + 1, step.container.end - 1];
  }
  if (position < items.length - 1) {
    return [item.start, items[position + 1].start];
  }
  return [items[position - 1].end, item.end];
}

// ─────────────────────────────────────────────────────────────────────────────
// Insertion
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Adds a key path, creating intermediate objects, at the end of the deepest
 * object that already exists. New lines copy the indentation around them.
 */
export function insertKey(text: string, keyPath: string, value: JsonLeafValue): string {
  const segments = keyPath.split('.');
  if (segments.some((segment) => segment === '')) {
    throw new EditConflictError(`Invalid key path "${keyPath}"`, keyPath);
  }

  const document = parseOrConflict(text);
  if (findKeyPath(document.root, keyPath)) {
    throw new EditConflictError(`Key "${keyPath}" already exists`, keyPath);
  }

  let container: JsonObjectNode = document.root;
  let depth = 0;
  while (depth < segments.length) {
    const member = container.members.filter((entry) => entry.key === segments[depth]).pop();
    if (!member) {
      break;
    }
    if (member.value.kind !== 'object' || depth === segments.length - 1) {
      const leaf = segments.slice(0, depth + 1).join('.');
      throw new EditConflictError(`Key "${keyPath}" collides with the value at "${leaf}"`, keyPath);
    }
    container = member.value;
    depth += 1;
  }

  const remaining = segments.slice(depth);
  const magic = new MagicString(text);
  const eol = detectEol(text);
  const unit = detectIndentUnit(document);
  const last = container.members[container.members.length - 1];
  const multiline = text.slice(container.start, container.end).includes('\n');

  if (last && !multiline) {
    magic.appendLeft(last.end, `, ${renderCompact(remaining, value)}`);
  } else if (last) {
    const indent = indentationAt(text, last.start) ?? unit.repeat(depth + 1);
    magic.appendLeft(last.end, `,${eol}${indent}${renderMember(remaining, value, indent, unit, eol)}`);
  } else {
    const closing = leadingWhitespace(lineAt(text, container.start));
    const indent = closing + unit;
    const body = `${eol}${indent}${renderMember(remaining, value, indent, unit, eol)}${eol}${closing}`;
    if (container.end - container.start > 2) {
      magic.overwrite(container.start + 1, container.end - 1, body);
    } else {
      magic.appendLeft(container.start + 1, body);
    }
  }

  return magic.toString();
}

function lineAt(text: string, offset: number): string {
  const lineStart = text.lastIndexOf('\n', offset - 1) + 1;
  return text.slice(lineStart, offset);
}

function renderMember(
  segments: readonly string[],
  value: JsonLeafValue,
  indent: string,
  unit: string,
  eol: string
): string {
  const [head, ...rest] = segments;
  if (!rest.length) {
    return `${JSON.stringify(head)}: ${JSON.stringify(value)}`;
  }
  const inner = indent + unit;
  return `${JSON.stringify(head)}: {${eol}${inner}${renderMember(rest, value, inner, unit, eol)}${eol}${indent}}`;
}

function renderCompact(segments: readonly string[], value: JsonLeafValue): string {
  const [head, ...rest] = segments;
  return rest.length ? `${JSON.stringify(head)}: {${renderCompact(rest, value)}}` : `${JSON.stringify(head)}: ${JSON.stringify(value)}`;
}
