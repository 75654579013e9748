import { ts } from 'ts-morph';

/**
 * Editable view of a JSON document. Every node keeps the offsets of its source
 * text so edits can touch the smallest byte range and leave the rest alone.
 */

export interface JsonRange {
  /** Offset of the first character. */
  readonly start: number;
  /** Offset just past the last character. */
  readonly end: number;
}

export interface JsonObjectNode extends JsonRange {
  readonly kind: 'object';
  readonly members: readonly JsonMember[];
}

export interface JsonArrayNode extends JsonRange {
  readonly kind: 'array';
  readonly elements: readonly JsonValueNode[];
}

export interface JsonScalarNode extends JsonRange {
  readonly kind: 'string' | 'number' | 'boolean' | 'null';
  /** Decoded value for strings, source text for everything else. */
  readonly value: string;
}

export type JsonValueNode = JsonObjectNode | JsonArrayNode | JsonScalarNode;

/** A `"key": value` pair. `start` is the key token, `end` the end of the value. */
export interface JsonMember extends JsonRange {
  readonly key: string;
  readonly value: JsonValueNode;
}

export interface JsonDocument {
  readonly text: string;
  readonly root: JsonObjectNode;
}

export type JsonParseResult =
  | { readonly ok: true; readonly document: JsonDocument }
  | { readonly ok: false; readonly message: string; readonly offset: number };

const POSITION_PATTERN = /at position (\d+)/;

function isPlainObject(value: unknown): boolean {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validates with `JSON.parse` (strict JSON, no comments or trailing commas),
 * then builds the positional tree from the compiler's JSON parser.
 */
export function parseJsonDocument(text: string): JsonParseResult {
  const bom = text.startsWith('\uFEFF') ? 1 : 0;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text.slice(bom));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const match = POSITION_PATTERN.exec(message);
    const offset = match ? Math.min(text.length, Number(match[1]) + bom) : 0;
    return { ok: false, message, offset };
  }

  if (!isPlainObject(parsed)) {
    return { ok: false, message: 'Locale file must contain a JSON object at the top level', offset: 0 };
  }

  const sourceFile = ts.parseJsonText('locale.json', text);
  const statement = sourceFile.statements[0];
  if (!statement || !ts.isObjectLiteralExpression(statement.expression)) {
    return { ok: false, message: 'Locale file must contain a JSON object at the top level', offset: 0 };
  }

  return { ok: true, document: { text, root: convertObject(statement.expression, sourceFile) } };
}

function convertObject(node: ts.ObjectLiteralExpression, sourceFile: ts.JsonSourceFile): JsonObjectNode {
  const members: JsonMember[] = [];
  for (const property of node.properties) {
    if (!ts.isPropertyAssignment(property)) {
      continue;
    }
    const key = ts.isStringLiteral(property.name) ? property.name.text : property.name.getText(sourceFile);
    members.push({
      key,
      start: property.getStart(sourceFile),
      end: property.end,
      value: convertValue(property.initializer, sourceFile),
    });
  }
  return { kind: 'object', start: node.getStart(sourceFile), end: node.end, members };
}

function convertValue(node: ts.Expression, sourceFile: ts.JsonSourceFile): JsonValueNode {
  const start = node.getStart(sourceFile);
  const end = node.end;

  switch (node.kind) {
    case ts.SyntaxKind.ObjectLiteralExpression:
      if (ts.isObjectLiteralExpression(node)) {
        return convertObject(node, sourceFile);
      }
      break;
    case ts.SyntaxKind.ArrayLiteralExpression:
      if (ts.isArrayLiteralExpression(node)) {
        return {
          kind: 'array',
          start,
          end,
          elements: node.elements.map((element) => convertValue(element, sourceFile)),
        };
      }
      break;
    case ts.SyntaxKind.StringLiteral:
      if (ts.isStringLiteral(node)) {
        return { kind: 'string', start, end, value: node.text };
      }
      break;
    case ts.SyntaxKind.NumericLiteral:
    case ts.SyntaxKind.PrefixUnaryExpression:
      return { kind: 'number', start, end, value: node.getText(sourceFile) };
    case ts.SyntaxKind.TrueKeyword:
    case ts.SyntaxKind.FalseKeyword:
      return { kind: 'boolean', start, end, value: node.getText(sourceFile) };
    default:
      break;
  }

  return { kind: 'null', start, end, value: node.getText(sourceFile) };
}

// ─────────────────────────────────────────────────────────────────────────────
// Lookup
// ─────────────────────────────────────────────────────────────────────────────

/** One step from a container to a child: a member of an object or an element of an array. */
export type JsonPathStep =
  | { readonly container: JsonObjectNode; readonly member: JsonMember }
  | { readonly container: JsonArrayNode; readonly index: number; readonly element: JsonValueNode };

/**
 * Finds the chain of nodes a flattened key path resolves to. Flattened paths
 * are ambiguous (`{"a":{"b":1}}` and `{"a.b":1}` both give `a.b`), so every
 * split of the remaining path is tried, longest member name first.
 */
export function findKeyPath(root: JsonObjectNode, keyPath: string): JsonPathStep[] | null {
  return findInObject(root, keyPath);
}

function findInObject(node: JsonObjectNode, rest: string): JsonPathStep[] | null {
  const candidates = node.members
    .filter((member) => member.key === rest || rest.startsWith(`${member.key}.`))
    .sort((a, b) => b.key.length - a.key.length);

  for (const member of candidates) {
    // duplicate keys: only the last occurrence is effective
    if (lastMemberNamed(node, member.key) !== member) {
      continue;
    }
    const step: JsonPathStep = { container: node, member };
    if (member.key === rest) {
      return [step];
    }
    const tail = findInValue(member.value, rest.slice(member.key.length + 1));
    if (tail) {
      return [step, ...tail];
    }
  }
  return null;
}

function findInValue(node: JsonValueNode, rest: string): JsonPathStep[] | null {
  if (node.kind === 'object') {
    return findInObject(node, rest);
  }
  if (node.kind !== 'array') {
    return null;
  }
  const [head] = rest.split('.', 1);
  if (!/^\d+$/.test(head)) {
    return null;
  }
  const index = Number(head);
  const element = node.elements[index];
  if (!element) {
    return null;
  }
  const step: JsonPathStep = { container: node, index, element };
  if (head === rest) {
    return [step];
  }
  const tail = findInValue(element, rest.slice(head.length + 1));
  return tail ? [step, ...tail] : null;
}

function lastMemberNamed(node: JsonObjectNode, key: string): JsonMember | undefined {
  for (let index = node.members.length - 1; index >= 0; index -= 1) {
    if (node.members[index].key === key) {
      return node.members[index];
    }
  }
  return undefined;
}
