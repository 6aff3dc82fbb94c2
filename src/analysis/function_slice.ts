/**
 * @fileoverview Re-parse an entity's source slice and locate its function
 *
 * Both the duplication detector and the provenance scorer work on the
 * function re-parsed from the entity's slice on its own extraction path.
 * A slice starts on the entity's first line, so an earlier definition that
 * shares that line (minified code, a nested function opened on its parent's
 * first line) also appears in it. The definition named like the entity is
 * taken; failing that, the first top-level function. A slice yielding no
 * function is left out of both analyses.
 */

import * as path from 'node:path';
import { Node, SyntaxKind, type ParameterDeclaration, type SourceFile } from 'ts-morph';
import type { CodeEntity } from '../types.js';
import { TsSourceParser, definitionName, isFunctionValue } from '../ingest/ts_extractor.js';
import { findLexicalFunctions } from '../ingest/lexical_extractor.js';
import { tokenizeLexical, type LexicalToken } from '../ingest/lexical_scanner.js';

// ============================================================================
// TYPES
// ============================================================================

export interface AstSliceFunction {
  readonly kind: 'ast';
  readonly parameters: readonly ParameterDeclaration[];
  /** A block, or the expression of a concise arrow body. */
  readonly body: Node;
}

export interface LexicalSliceFunction {
  readonly kind: 'lexical';
  readonly parameters: readonly LexicalToken[];
  readonly body: readonly LexicalToken[];
}

export type SliceFunction = AstSliceFunction | LexicalSliceFunction;

type SliceWrapper = (source: string) => string;
type SliceFinder = (sourceFile: SourceFile) => AstSliceFunction | null;

/**
 * Ways to make a slice parse on its own: as-is for declarations and
 * variable statements, inside a class for members, inside an object
 * literal for object methods and property assignments.
 */
const SLICE_WRAPPERS: readonly { wrap: SliceWrapper; find: SliceFinder }[] = [
  { wrap: (source) => source, find: firstModuleFunction },
  { wrap: (source) => `class __Slice {\n${source}\n}`, find: firstClassMemberFunction },
  { wrap: (source) => `({\n${source}\n});`, find: firstObjectLiteralFunction },
];

// ============================================================================
// AST LOOKUP
// ============================================================================

function toSliceFunction(node: Node | undefined): AstSliceFunction | null {
  if (!node) return null;
  if (
    Node.isFunctionDeclaration(node) ||
    Node.isMethodDeclaration(node) ||
    Node.isConstructorDeclaration(node) ||
    Node.isGetAccessorDeclaration(node) ||
    Node.isSetAccessorDeclaration(node) ||
    Node.isFunctionExpression(node)
  ) {
    const body = node.getBody();
    return body ? { kind: 'ast', parameters: node.getParameters(), body } : null;
  }
  if (Node.isArrowFunction(node)) {
    return { kind: 'ast', parameters: node.getParameters(), body: node.getBody() };
  }
  return null;
}

function firstModuleFunction(sourceFile: SourceFile): AstSliceFunction | null {
  for (const statement of sourceFile.getStatements()) {
    switch (statement.getKind()) {
      case SyntaxKind.FunctionDeclaration: {
        const found = toSliceFunction(statement);
        if (found) return found;
        break;
      }
      case SyntaxKind.VariableStatement:
        if (Node.isVariableStatement(statement)) {
          for (const declaration of statement.getDeclarations()) {
            const initializer = declaration.getInitializer();
            if (isFunctionValue(initializer)) return toSliceFunction(initializer);
          }
        }
        break;
      case SyntaxKind.ExpressionStatement:
        if (Node.isExpressionStatement(statement)) {
          const expression = statement.getExpression();
          if (
            Node.isBinaryExpression(expression) &&
            expression.getOperatorToken().getKind() === SyntaxKind.EqualsToken &&
            isFunctionValue(expression.getRight())
          ) {
            return toSliceFunction(expression.getRight());
          }
        }
        break;
      default:
        break;
    }
  }
  return null;
}

function firstClassMemberFunction(sourceFile: SourceFile): AstSliceFunction | null {
  const wrapper = sourceFile.getClasses()[0];
  if (!wrapper) return null;
  for (const member of wrapper.getMembers()) {
    if (Node.isPropertyDeclaration(member)) {
      const initializer = member.getInitializer();
      if (isFunctionValue(initializer)) return toSliceFunction(initializer);
      continue;
    }
    const found = toSliceFunction(member);
    if (found) return found;
  }
  return null;
}

function firstObjectLiteralFunction(sourceFile: SourceFile): AstSliceFunction | null {
  const statement = sourceFile.getStatements()[0];
  if (!statement || !Node.isExpressionStatement(statement)) return null;
  let expression = statement.getExpression();
  while (Node.isParenthesizedExpression(expression)) {
    expression = expression.getExpression();
  }
  if (!Node.isObjectLiteralExpression(expression)) return null;

  for (const property of expression.getProperties()) {
    if (Node.isPropertyAssignment(property)) {
      const initializer = property.getInitializer();
      if (isFunctionValue(initializer)) return toSliceFunction(initializer);
      continue;
    }
    const found = toSliceFunction(property);
    if (found) return found;
  }
  return null;
}

/** The function node behind a named definition. */
function definedFunction(node: Node): Node | undefined {
  if (Node.isVariableDeclaration(node) || Node.isPropertyDeclaration(node) || Node.isPropertyAssignment(node)) {
    return node.getInitializer();
  }
  return node;
}

/** First definition named `name`, in document order. */
function functionNamed(sourceFile: SourceFile, name: string): AstSliceFunction | null {
  for (const node of sourceFile.getDescendants()) {
    if (definitionName(node) !== name) continue;
    const found = toSliceFunction(definedFunction(node));
    if (found) return found;
  }
  return null;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Run `inspect` on the entity's function within its slice. Returns null
 * when no candidate parse yields a function. AST nodes handed to `inspect`
 * are only valid during the call.
 */
export function inspectEntityFunction<T>(
  entity: CodeEntity,
  parser: TsSourceParser,
  inspect: (fn: SliceFunction) => T,
): T | null {
  if (entity.extraction === 'lexical') {
    const candidates = findLexicalFunctions(entity.source);
    const chosen = candidates.find((candidate) => candidate.name === entity.functionName) ?? candidates[0];
    if (!chosen) return null;
    return inspect({
      kind: 'lexical',
      parameters: tokenizeLexical(chosen.parameters),
      body: tokenizeLexical(chosen.body),
    });
  }

  const fileName = `__slice__/${entity.entityId}${path.posix.extname(entity.filePath)}`;
  for (const { wrap, find } of SLICE_WRAPPERS) {
    const outcome = parser.parse(fileName, wrap(entity.source), (sourceFile) => {
      const fn = functionNamed(sourceFile, entity.functionName) ?? find(sourceFile);
      return fn ? { value: inspect(fn) } : null;
    });
    if (outcome) return outcome.value;
  }
  return null;
}
