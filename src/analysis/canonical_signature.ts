/**
 * @fileoverview Syntax-invariant function signatures
 *
 * Two functions that differ only in parameter names, local names, property
 * names or literal contents serialize to the same token sequence.
 *
 * AST path: each node becomes its SyntaxKind name with explicit nesting,
 * `Kind ( child child )`. Identifiers become `arg` (parameter bindings),
 * `attr` (property and member names) or `var` (everything else). String
 * and template text become `STR`, numeric and bigint literals `NUM`;
 * `true`, `false`, `null` and regular expressions keep their text.
 *
 * Lexical path: literal-aware tokens, with `<str>`, `<num>` and `<id>`
 * placeholders and keywords and punctuation kept verbatim.
 */

import { Node, SyntaxKind, ts } from 'ts-morph';
import type { LexicalToken } from '../ingest/lexical_scanner.js';
import type { SliceFunction } from './function_slice.js';

// ============================================================================
// AST SERIALIZATION
// ============================================================================

type IdentifierRole = 'arg' | 'attr' | 'var';

function isParameterBinding(identifier: Node): boolean {
  let current: Node = identifier;
  let parent = current.getParent();
  while (parent) {
    if (Node.isParameterDeclaration(parent)) return parent.getNameNode() === current;
    if (Node.isBindingElement(parent)) {
      if (parent.getNameNode() !== current) return false;
    } else if (!Node.isObjectBindingPattern(parent) && !Node.isArrayBindingPattern(parent)) {
      return false;
    }
    current = parent;
    parent = current.getParent();
  }
  return false;
}

function identifierRole(identifier: Node): IdentifierRole {
  const parent = identifier.getParent();
  if (!parent) return 'var';
  if (isParameterBinding(identifier)) return 'arg';

  switch (parent.getKind()) {
    case SyntaxKind.PropertyAccessExpression:
      return Node.isPropertyAccessExpression(parent) && parent.getNameNode() === identifier ? 'attr' : 'var';
    case SyntaxKind.PropertyAssignment:
    case SyntaxKind.PropertyDeclaration:
    case SyntaxKind.PropertySignature:
    case SyntaxKind.MethodDeclaration:
    case SyntaxKind.MethodSignature:
    case SyntaxKind.GetAccessor:
    case SyntaxKind.SetAccessor:
    case SyntaxKind.EnumMember:
      return Node.hasName(parent) && parent.getNameNode() === identifier ? 'attr' : 'var';
    case SyntaxKind.BindingElement:
      return Node.isBindingElement(parent) && parent.getPropertyNameNode() === identifier ? 'attr' : 'var';
    case SyntaxKind.QualifiedName:
      return Node.isQualifiedName(parent) && parent.getRight() === identifier ? 'attr' : 'var';
    default:
      return 'var';
  }
}

function operatorText(operator: ts.SyntaxKind): string {
  return ts.tokenToString(operator) ?? String(operator);
}

function serializeNode(node: Node, out: string[]): void {
  switch (node.getKind()) {
    case SyntaxKind.Identifier:
      out.push(identifierRole(node));
      return;
    case SyntaxKind.PrivateIdentifier:
      out.push('attr');
      return;
    case SyntaxKind.StringLiteral:
    case SyntaxKind.NoSubstitutionTemplateLiteral:
    case SyntaxKind.TemplateHead:
    case SyntaxKind.TemplateMiddle:
    case SyntaxKind.TemplateTail:
    case SyntaxKind.JsxText:
      out.push('STR');
      return;
    case SyntaxKind.NumericLiteral:
    case SyntaxKind.BigIntLiteral:
      out.push('NUM');
      return;
    case SyntaxKind.TrueKeyword:
    case SyntaxKind.FalseKeyword:
    case SyntaxKind.NullKeyword:
    case SyntaxKind.RegularExpressionLiteral:
      out.push(node.getText());
      return;
    default:
      break;
  }

  const children: Node[] = [];
  node.forEachChild((child) => {
    children.push(child);
  });

  out.push(node.getKindName());
  if (Node.isPrefixUnaryExpression(node) || Node.isPostfixUnaryExpression(node)) {
    out.push('(', operatorText(node.getOperatorToken()));
    for (const child of children) serializeNode(child, out);
    out.push(')');
    return;
  }
  if (children.length === 0) return;
  out.push('(');
  for (const child of children) serializeNode(child, out);
  out.push(')');
}

// ============================================================================
// LEXICAL SERIALIZATION
// ============================================================================

export function canonicalLexicalToken(token: LexicalToken): string {
  switch (token.kind) {
    case 'string':
      return '<str>';
    case 'number':
      return '<num>';
    case 'identifier':
      return '<id>';
    default:
      return token.text;
  }
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Canonical token sequence for a function: parameters first, then body.
 * The function's own name never takes part.
 */
export function canonicalTokens(fn: SliceFunction): string[] {
  if (fn.kind === 'lexical') {
    return [...fn.parameters, ...fn.body].map(canonicalLexicalToken);
  }
  const out: string[] = [];
  for (const parameter of fn.parameters) serializeNode(parameter, out);
  serializeNode(fn.body, out);
  return out;
}

export function canonicalSignature(fn: SliceFunction): string {
  return canonicalTokens(fn).join(' ');
}
