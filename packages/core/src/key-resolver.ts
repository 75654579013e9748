import { Node, SyntaxKind, ts, type CallExpression, type SourceFile } from 'ts-morph';
import type { CommentStyle, Span } from './findings.js';
import type { CommentToken } from './directives.js';
import { DEFAULT_TRANSLATION_HOOKS } from './config/defaults.js';
import { isTranslatableText } from './text-filters.js';

/** `t.rich("key")`, `t.raw("key")` and friends. */
const TRANSLATOR_METHODS = new Set(['rich', 'markup', 'raw', 'has']);

/** Children of these elements are not rendered as text. */
const RAW_TEXT_ELEMENTS = new Set(['style', 'script']);

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export type TemplateSegment =
  | { readonly type: 'literal'; readonly value: string }
  | { readonly type: 'placeholder'; readonly expression: string };

export type KeyExpression =
  | { readonly kind: 'static'; readonly value: string }
  | { readonly kind: 'template'; readonly segments: readonly TemplateSegment[]; readonly pattern: string }
  | { readonly kind: 'opaque'; readonly text: string };

export interface TranslatorBinding {
  readonly name: string;
  /** `''` when bound without a namespace, `null` when the namespace is not a literal. */
  readonly namespace: string | null;
  readonly span: Span;
}

export interface TranslationCall {
  readonly span: Span;
  readonly namespace: string | null;
  readonly key: KeyExpression;
  /** First line of the key argument's source text. */
  readonly argumentText: string;
  /** First line of the whole call's source text. */
  readonly callText: string;
  readonly commentStyle: CommentStyle;
}

export interface HardcodedCandidate {
  /** Trimmed text. */
  readonly text: string;
  readonly span: Span;
  readonly commentStyle: CommentStyle;
}

export interface ResolverOptions {
  readonly checkedAttributes: ReadonlySet<string>;
  readonly ignoreTexts: ReadonlySet<string>;
  readonly translationHooks?: readonly string[];
}

export interface ResolverOutput {
  readonly calls: readonly TranslationCall[];
  readonly candidates: readonly HardcodedCandidate[];
  /** Every comment in the file, in source order. */
  readonly comments: readonly CommentToken[];
}

export function effectiveKey(namespace: string | null, key: string): string {
  return namespace ? `${namespace}.${key}` : key;
}

/**
 * Walks one parsed file in source order: classifies translation calls against
 * the translator bindings in scope, gathers hardcoded-text candidates and
 * collects comment tokens for the directive pass.
 */
export function resolveKeys(sourceFile: SourceFile, options: ResolverOptions): ResolverOutput {
  return new KeyResolver(sourceFile, options).run();
}

// ─────────────────────────────────────────────────────────────────────────────
// Resolver
// ─────────────────────────────────────────────────────────────────────────────

class KeyResolver {
  private readonly text: string;
  private readonly hooks: ReadonlySet<string>;
  /** `null` marks a name that shadows an outer translator. */
  private readonly scopes: Array<Map<string, TranslatorBinding | null>> = [];
  private readonly calls: TranslationCall[] = [];
  private readonly candidates: HardcodedCandidate[] = [];
  private readonly comments = new Map<number, CommentToken>();
  private rawTextDepth = 0;

  constructor(
    private readonly sourceFile: SourceFile,
    private readonly options: ResolverOptions
  ) {
    this.text = sourceFile.getFullText();
    this.hooks = new Set(options.translationHooks ?? DEFAULT_TRANSLATION_HOOKS);
  }

  run(): ResolverOutput {
    this.withScope(() => {
      this.collectComments(this.sourceFile);
      this.visitChildren(this.sourceFile);
    });
    this.addCommentRanges(ts.getLeadingCommentRanges(this.text, this.sourceFile.compilerNode.endOfFileToken.pos));

    return {
      calls: this.calls,
      candidates: this.candidates,
      comments: [...this.comments.values()].sort((a, b) => a.pos - b.pos),
    };
  }

  private visitChildren(node: Node): void {
    node.forEachChild((child) => {
      this.visit(child);
    });
  }

  private visit(node: Node): void {
    this.collectComments(node);

    switch (node.getKind()) {
      case SyntaxKind.Block:
      case SyntaxKind.ModuleBlock:
      case SyntaxKind.CaseBlock:
      case SyntaxKind.FunctionDeclaration:
      case SyntaxKind.FunctionExpression:
      case SyntaxKind.ArrowFunction:
      case SyntaxKind.MethodDeclaration:
      case SyntaxKind.Constructor:
      case SyntaxKind.GetAccessor:
      case SyntaxKind.SetAccessor:
      case SyntaxKind.ForStatement:
      case SyntaxKind.ForOfStatement:
      case SyntaxKind.ForInStatement:
      case SyntaxKind.CatchClause:
        this.withScope(() => this.visitChildren(node));
        return;
      case SyntaxKind.Parameter:
        if (Node.isParameterDeclaration(node)) {
          this.shadow(node.getNameNode());
        }
        break;
      case SyntaxKind.VariableDeclaration:
        if (Node.isVariableDeclaration(node)) {
          this.declareVariable(node.getNameNode(), node.getInitializer());
        }
        break;
      case SyntaxKind.CallExpression:
        if (Node.isCallExpression(node)) {
          this.recordTranslationCall(node);
        }
        break;
      case SyntaxKind.JsxElement:
        if (Node.isJsxElement(node) && RAW_TEXT_ELEMENTS.has(node.getOpeningElement().getTagNameNode().getText())) {
          this.rawTextDepth += 1;
          this.visitChildren(node);
          this.rawTextDepth -= 1;
          return;
        }
        break;
      case SyntaxKind.JsxText:
        if (Node.isJsxText(node)) {
          const start = node.getPos();
          this.recordCandidate(this.text.slice(start, node.getEnd()), start);
        }
        return;
      case SyntaxKind.JsxAttribute:
        if (Node.isJsxAttribute(node)) {
          this.inspectAttribute(node.getNameNode().getText(), node.getInitializer());
        }
        break;
      case SyntaxKind.JsxExpression:
        if (Node.isJsxExpression(node) && isJsxChild(node)) {
          const expression = node.getExpression();
          if (expression) {
            this.inspectRenderedExpression(expression);
          }
        }
        break;
      default:
        break;
    }

    this.visitChildren(node);
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Scopes
  // ───────────────────────────────────────────────────────────────────────────

  private withScope(action: () => void): void {
    this.scopes.push(new Map());
    try {
      action();
    } finally {
      this.scopes.pop();
    }
  }

  private currentScope(): Map<string, TranslatorBinding | null> {
    const scope = this.scopes[this.scopes.length - 1];
    if (!scope) {
      throw new Error('Key resolver scope stack is empty');
    }
    return scope;
  }

  private lookup(name: string): TranslatorBinding | undefined {
    for (let index = this.scopes.length - 1; index >= 0; index -= 1) {
      const scope = this.scopes[index];
      if (scope.has(name)) {
        return scope.get(name) ?? undefined;
      }
    }
    return undefined;
  }

  private shadow(nameNode: Node): void {
    if (Node.isIdentifier(nameNode)) {
      this.currentScope().set(nameNode.getText(), null);
      return;
    }
    if (Node.isObjectBindingPattern(nameNode)) {
      nameNode.getElements().forEach((element) => this.shadow(element.getNameNode()));
      return;
    }
    if (Node.isArrayBindingPattern(nameNode)) {
      for (const element of nameNode.getElements()) {
        if (Node.isBindingElement(element)) {
          this.shadow(element.getNameNode());
        }
      }
    }
  }

  private declareVariable(nameNode: Node, initializer: Node | undefined): void {
    const namespace = initializer ? this.hookNamespace(initializer) : undefined;
    if (namespace === undefined || !Node.isIdentifier(nameNode)) {
      this.shadow(nameNode);
      return;
    }
    const name = nameNode.getText();
    this.currentScope().set(name, { name, namespace, span: this.spanOf(nameNode.getStart(), nameNode.getEnd()) });
  }

  /**
   * Namespace bound by `useTranslations(ns)` / `await getTranslations(ns)`,
   * `undefined` when the initializer is not a translation hook.
   */
  private hookNamespace(initializer: Node): string | null | undefined {
    let expression = initializer;
    while (Node.isAwaitExpression(expression) || Node.isParenthesizedExpression(expression)) {
      expression = expression.getExpression();
    }
    if (!Node.isCallExpression(expression)) {
      return undefined;
    }
    const callee = expression.getExpression();
    if (!Node.isIdentifier(callee) || !this.hooks.has(callee.getText())) {
      return undefined;
    }

    const [argument] = expression.getArguments();
    if (!argument) {
      return '';
    }
    if (Node.isStringLiteral(argument) || Node.isNoSubstitutionTemplateLiteral(argument)) {
      return argument.getLiteralValue();
    }
    if (Node.isObjectLiteralExpression(argument)) {
      // getTranslations({ locale, namespace: 'Auth' })
      const property = argument.getProperty('namespace');
      if (!property) {
        return '';
      }
      if (Node.isPropertyAssignment(property)) {
        const value = property.getInitializer();
        if (value && (Node.isStringLiteral(value) || Node.isNoSubstitutionTemplateLiteral(value))) {
          return value.getLiteralValue();
        }
      }
    }
    return null;
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Translation Calls
  // ───────────────────────────────────────────────────────────────────────────

  private recordTranslationCall(call: CallExpression): void {
    const callee = call.getExpression();
    let binding: TranslatorBinding | undefined;
    if (Node.isIdentifier(callee)) {
      binding = this.lookup(callee.getText());
    } else if (Node.isPropertyAccessExpression(callee)) {
      const target = callee.getExpression();
      if (Node.isIdentifier(target) && TRANSLATOR_METHODS.has(callee.getName())) {
        binding = this.lookup(target.getText());
      }
    }
    if (!binding) {
      return;
    }

    const [argument] = call.getArguments();
    const start = call.getStart();
    this.calls.push({
      span: this.spanOf(start, call.getEnd()),
      namespace: binding.namespace,
      key: classifyKey(argument),
      argumentText: (argument?.getText() ?? '').split('\n', 1)[0],
      callText: call.getText().split('\n', 1)[0],
      commentStyle: this.commentStyleAt(start),
    });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Hardcoded Text
  // ───────────────────────────────────────────────────────────────────────────

  private inspectAttribute(name: string, initializer: Node | undefined): void {
    if (!initializer || !this.options.checkedAttributes.has(name)) {
      return;
    }
    if (Node.isStringLiteral(initializer)) {
      this.recordCandidate(initializer.getLiteralValue(), initializer.getStart() + 1);
      return;
    }
    if (Node.isJsxExpression(initializer)) {
      const expression = initializer.getExpression();
      if (expression) {
        this.inspectRenderedExpression(expression);
      }
    }
  }

  /**
   * Text an expression renders directly: literals, template segments, both
   * branches of a conditional and the fallback side of `&&`, `||` and `??`.
   */
  private inspectRenderedExpression(expression: Node): void {
    if (Node.isStringLiteral(expression) || Node.isNoSubstitutionTemplateLiteral(expression)) {
      this.recordCandidate(expression.getLiteralValue(), expression.getStart() + 1);
      return;
    }
    if (Node.isTemplateExpression(expression)) {
      const head = expression.getHead();
      this.recordCandidate(head.getLiteralText(), head.getStart() + 1);
      for (const span of expression.getTemplateSpans()) {
        const literal = span.getLiteral();
        this.recordCandidate(literal.getLiteralText(), literal.getStart() + 1);
      }
      return;
    }
    if (Node.isParenthesizedExpression(expression)) {
      this.inspectRenderedExpression(expression.getExpression());
      return;
    }
    if (Node.isConditionalExpression(expression)) {
      this.inspectRenderedExpression(expression.getWhenTrue());
      this.inspectRenderedExpression(expression.getWhenFalse());
      return;
    }
    if (Node.isBinaryExpression(expression)) {
      const operator = expression.getOperatorToken().getKind();
      if (
        operator === SyntaxKind.AmpersandAmpersandToken ||
        operator === SyntaxKind.BarBarToken ||
        operator === SyntaxKind.QuestionQuestionToken
      ) {
        this.inspectRenderedExpression(expression.getRight());
      }
    }
  }

  private recordCandidate(raw: string, startOffset: number): void {
    if (this.rawTextDepth > 0) {
      return;
    }
    const text = raw.trim();
    if (!text || !isTranslatableText(text, this.options.ignoreTexts)) {
      return;
    }
    const start = startOffset + (raw.length - raw.trimStart().length);
    this.candidates.push({
      text,
      span: this.spanOf(start, start + text.length),
      commentStyle: this.commentStyleAt(start),
    });
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Comments
  // ───────────────────────────────────────────────────────────────────────────

  /**
   * Comment trivia around a node. JSX text looks like trivia to the scanner,
   * so text nodes and the trailing side of JSX children are never scanned.
   */
  private collectComments(node: Node): void {
    if (Node.isJsxText(node)) {
      return;
    }
    this.addCommentsAt(node.getPos());
    if (!isJsxChild(node) && !Node.isSourceFile(node)) {
      this.addCommentsAt(node.getEnd());
    }
    if (Node.isJsxExpression(node) && !node.getExpression()) {
      // {/* comment */}
      this.addCommentsAt(node.getStart() + 1);
    }
  }

  private addCommentsAt(pos: number): void {
    this.addCommentRanges(ts.getTrailingCommentRanges(this.text, pos));
    this.addCommentRanges(ts.getLeadingCommentRanges(this.text, pos));
  }

  private addCommentRanges(ranges: readonly ts.CommentRange[] | undefined): void {
    for (const range of ranges ?? []) {
      if (this.comments.has(range.pos)) {
        continue;
      }
      const span = this.spanOf(range.pos, range.end);
      this.comments.set(range.pos, {
        text: this.text.slice(range.pos, range.end),
        pos: range.pos,
        end: range.end,
        line: span.start.line,
        endLine: span.end.line,
        span,
      });
    }
  }

  // ───────────────────────────────────────────────────────────────────────────
  // Positions
  // ───────────────────────────────────────────────────────────────────────────

  private spanOf(start: number, end: number): Span {
    return {
      start: this.sourceFile.getLineAndColumnAtPos(start),
      end: this.sourceFile.getLineAndColumnAtPos(end),
    };
  }

  /**
   * Comment syntax valid on the line above `offset`: JSX when the line begins
   * with a child of a JSX element, plain line comments otherwise.
   */
  private commentStyleAt(offset: number): CommentStyle {
    let lineStart = offset;
    while (lineStart > 0 && this.text[lineStart - 1] !== '\n') {
      lineStart -= 1;
    }
    let first = lineStart;
    while (this.text[first] === ' ' || this.text[first] === '\t') {
      first += 1;
    }

    let node = this.sourceFile.getDescendantAtPos(first);
    if (!node) {
      return 'js';
    }
    let parent = node.getParent();
    while (parent && !Node.isSourceFile(parent) && !Node.isJsxText(node) && parent.getStart() === first) {
      node = parent;
      parent = node.getParent();
    }
    return isJsxChild(node) ? 'jsx' : 'js';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

function isJsxChild(node: Node): boolean {
  const parent = node.getParent();
  return parent !== undefined && (Node.isJsxElement(parent) || Node.isJsxFragment(parent));
}

function classifyKey(argument: Node | undefined): KeyExpression {
  if (argument && (Node.isStringLiteral(argument) || Node.isNoSubstitutionTemplateLiteral(argument))) {
    return { kind: 'static', value: argument.getLiteralValue() };
  }
  if (argument && Node.isTemplateExpression(argument)) {
    const segments: TemplateSegment[] = [{ type: 'literal', value: argument.getHead().getLiteralText() }];
    let pattern = argument.getHead().getLiteralText();
    for (const span of argument.getTemplateSpans()) {
      const literal = span.getLiteral().getLiteralText();
      segments.push({ type: 'placeholder', expression: span.getExpression().getText() });
      segments.push({ type: 'literal', value: literal });
      pattern += `*${literal}`;
    }
    return { kind: 'template', segments, pattern };
  }
  return { kind: 'opaque', text: argument?.getText() ?? '' };
}
