/**
 * @fileoverview Structural features of a single function
 *
 * Features are measured on the syntax tree for TypeScript entities and
 * approximated on the token stream for JavaScript entities. The provenance
 * rules only ever see the resulting {@link FunctionFeatures} record.
 */

import { Node, SyntaxKind } from 'ts-morph';
import { stringTokenValue, type LexicalToken } from '../ingest/lexical_scanner.js';
import type { AstSliceFunction, LexicalSliceFunction, SliceFunction } from './function_slice.js';

// ============================================================================
// TYPES
// ============================================================================

export interface FunctionFeatures {
  /** Top-level body statements (estimated on the lexical path). */
  statementCount: number;
  /** Guard clauses among the first six top-level statements. */
  guardClauseCount: number;
  /** Every assigned name, lower-cased, in source order. */
  assignedNames: string[];
  /** `if` statements anywhere in the function. */
  conditionalCount: number;
  /** Lower-cased string literals mentioning error, invalid or fail. */
  errorMessages: string[];
  /** Last statement returns a bare identifier; its lower-cased name. */
  returnedIdentifier: string | null;
  hasLoopOrTry: boolean;
}

const GUARD_WINDOW = 6;
const ERROR_WORDS_RE = /error|invalid|fail/;

// ============================================================================
// AST FEATURES
// ============================================================================

function bodyStatements(fn: AstSliceFunction): Node[] {
  return Node.isBlock(fn.body) ? fn.body.getStatements() : [fn.body];
}

function isExitStatement(node: Node | undefined): boolean {
  return node !== undefined && (Node.isReturnStatement(node) || Node.isThrowStatement(node));
}

/**
 * `if (...) return ...;`, `if (...) { throw ...; }` and so on. Only the
 * then-branch is inspected; an `else` does not disqualify the guard.
 */
export function isGuardClause(statement: Node): boolean {
  if (!Node.isIfStatement(statement)) return false;
  const then = statement.getThenStatement();
  if (Node.isBlock(then)) {
    const inner = then.getStatements();
    return inner.length === 1 && isExitStatement(inner[0]);
  }
  return isExitStatement(then);
}

const LOOP_OR_TRY_KINDS: ReadonlySet<SyntaxKind> = new Set([
  SyntaxKind.ForStatement,
  SyntaxKind.ForInStatement,
  SyntaxKind.ForOfStatement,
  SyntaxKind.WhileStatement,
  SyntaxKind.DoStatement,
  SyntaxKind.TryStatement,
]);

const STRING_KINDS: ReadonlySet<SyntaxKind> = new Set([
  SyntaxKind.StringLiteral,
  SyntaxKind.NoSubstitutionTemplateLiteral,
  SyntaxKind.TemplateHead,
  SyntaxKind.TemplateMiddle,
  SyntaxKind.TemplateTail,
]);

function isAssignmentOperator(kind: SyntaxKind): boolean {
  return kind >= SyntaxKind.FirstAssignment && kind <= SyntaxKind.LastAssignment;
}

function collectBindingNames(name: Node, into: string[]): void {
  if (Node.isIdentifier(name)) {
    into.push(name.getText().toLowerCase());
    return;
  }
  if (Node.isObjectBindingPattern(name) || Node.isArrayBindingPattern(name)) {
    for (const element of name.getElements()) {
      if (Node.isBindingElement(element)) collectBindingNames(element.getNameNode(), into);
    }
  }
}

function astFeatures(fn: AstSliceFunction): FunctionFeatures {
  const statements = bodyStatements(fn);
  const assignedNames: string[] = [];
  const errorMessages: string[] = [];
  let conditionalCount = 0;
  let hasLoopOrTry = false;

  const inspect = (node: Node): void => {
    const kind = node.getKind();
    if (kind === SyntaxKind.IfStatement) conditionalCount++;
    if (LOOP_OR_TRY_KINDS.has(kind)) hasLoopOrTry = true;

    if (Node.isVariableDeclaration(node)) {
      collectBindingNames(node.getNameNode(), assignedNames);
    } else if (Node.isBinaryExpression(node) && isAssignmentOperator(node.getOperatorToken().getKind())) {
      const target = node.getLeft();
      if (Node.isIdentifier(target)) assignedNames.push(target.getText().toLowerCase());
    } else if (STRING_KINDS.has(kind) && Node.isLiteralLike(node)) {
      const text = node.getLiteralText().toLowerCase();
      if (ERROR_WORDS_RE.test(text)) errorMessages.push(text);
    }
  };
  inspect(fn.body);
  fn.body.forEachDescendant(inspect);

  let returnedIdentifier: string | null = null;
  const last = Node.isBlock(fn.body) ? statements[statements.length - 1] : undefined;
  if (last && Node.isReturnStatement(last)) {
    const expression = last.getExpression();
    if (expression && Node.isIdentifier(expression)) returnedIdentifier = expression.getText().toLowerCase();
  }

  return {
    statementCount: statements.length,
    guardClauseCount: statements.slice(0, GUARD_WINDOW).filter(isGuardClause).length,
    assignedNames,
    conditionalCount,
    errorMessages,
    returnedIdentifier,
    hasLoopOrTry,
  };
}

// ============================================================================
// LEXICAL FEATURES
// ============================================================================

const CONTROL_KEYWORDS: ReadonlySet<string> = new Set(['if', 'for', 'while', 'do', 'switch', 'try']);
const DECLARATION_KEYWORDS: ReadonlySet<string> = new Set(['const', 'let', 'var']);
/** The `if` of an `else if` belongs to the preceding guard's else-branch and is not matched. */
const GUARD_RE = /(?<!\belse )\bif \([^{};]*?\) (?:\{ (?:return|throw)\b[^{};]*; \}|(?:return|throw)\b[^{};]*;)/g;

/**
 * Statement estimate for a token stream: semicolons outside any brace or
 * parenthesis, plus control keywords at the same depth (`else if` counts
 * once, under its `else`-less `if`). Semicolons and keywords nested in a
 * block are not counted, so the estimate tracks the AST path's count of
 * top-level body statements rather than every occurrence in the body.
 */
export function estimateStatementCount(tokens: readonly LexicalToken[]): number {
  let depth = 0;
  let count = 0;
  tokens.forEach((token, index) => {
    if (token.kind === 'punct') {
      if (token.text === '{' || token.text === '(') depth++;
      else if (token.text === '}' || token.text === ')') depth = Math.max(depth - 1, 0);
      else if (token.text === ';' && depth === 0) count++;
      return;
    }
    if (depth !== 0 || token.kind !== 'keyword' || !CONTROL_KEYWORDS.has(token.text)) return;
    if (token.text === 'if' && tokens[index - 1]?.text === 'else') return;
    count++;
  });
  return count;
}

/** Token text with strings collapsed, used by the guard-clause pattern. */
function guardText(tokens: readonly LexicalToken[]): string {
  return tokens.map((token) => (token.kind === 'string' ? '<str>' : token.text)).join(' ');
}

function lexicalFeatures(fn: LexicalSliceFunction): FunctionFeatures {
  const tokens = fn.body;
  const assignedNames: string[] = [];
  const errorMessages: string[] = [];
  let conditionalCount = 0;
  let hasLoopOrTry = false;

  tokens.forEach((token, index) => {
    if (token.kind === 'keyword') {
      if (token.text === 'if') conditionalCount++;
      if (token.text === 'for' || token.text === 'while') hasLoopOrTry = true;
      const next = tokens[index + 1];
      if (DECLARATION_KEYWORDS.has(token.text) && next?.kind === 'identifier') {
        assignedNames.push(next.text.toLowerCase());
      }
    } else if (token.kind === 'string') {
      const text = stringTokenValue(token).toLowerCase();
      if (ERROR_WORDS_RE.test(text)) errorMessages.push(text);
    }
  });

  let end = tokens.length;
  if (tokens[end - 1]?.text === ';') end--;
  const returned = tokens[end - 1];
  const returnedIdentifier =
    end >= 2 && tokens[end - 2].text === 'return' && returned.kind === 'identifier'
      ? returned.text.toLowerCase()
      : null;

  return {
    statementCount: estimateStatementCount(tokens),
    guardClauseCount: guardText(tokens).match(GUARD_RE)?.length ?? 0,
    assignedNames,
    conditionalCount,
    errorMessages,
    returnedIdentifier,
    hasLoopOrTry,
  };
}

// ============================================================================
// PUBLIC API
// ============================================================================

export function extractFeatures(fn: SliceFunction): FunctionFeatures {
  return fn.kind === 'ast' ? astFeatures(fn) : lexicalFeatures(fn);
}

/** Body statement count used by the duplication gate. */
export function countBodyStatements(fn: SliceFunction): number {
  if (fn.kind === 'lexical') return estimateStatementCount(fn.body);
  return Node.isBlock(fn.body) ? fn.body.getStatements().length : 1;
}
