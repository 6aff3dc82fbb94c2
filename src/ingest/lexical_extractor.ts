/**
 * @fileoverview Best-effort function extraction for JavaScript files
 *
 * Four ordered patterns recognise the common function-defining idioms:
 *
 *   1. `[export [default]] [async] function [*] name (`
 *   2. `[export] [const|let|var] name = [async] function [*] [name] (`
 *   3. `[export] [const|let|var] name = [async] ( ... ) => {`
 *   4. `[export] [const|let|var] name = [async] param => {`
 *
 * Each candidate is then closed with the literal-aware brace matcher. This is
 * a heuristic, not a parser: class methods, object-literal methods and
 * functions passed as arguments are not recognised.
 */

import type { DefinitionSite, SourceExtractor } from './types.js';
import { findMatchingBrace, maskLiterals, skipTrivia } from './lexical_scanner.js';

// ============================================================================
// TYPES
// ============================================================================

export interface LexicalFunction {
  name: string;
  /** Offset where the matched definition starts. */
  start: number;
  /** Offset of the body's opening brace. */
  bodyOpen: number;
  /** Offset of the body's closing brace. */
  bodyClose: number;
  /** Parameter list text, without the surrounding parentheses. */
  parameters: string;
  /** Body text, without the surrounding braces. */
  body: string;
}

type PatternKind = 'function' | 'arrow' | 'bare-arrow';

interface DefinitionPattern {
  kind: PatternKind;
  regex: RegExp;
}

// ============================================================================
// PATTERNS
// ============================================================================

const IDENT = '[A-Za-z_$][\\w$]*';
const NOT_AFTER_IDENT = '(?<![\\w$.])';
const ASSIGNED = `${NOT_AFTER_IDENT}(?:export\\s+)?(?:(?:const|let|var)\\s+)?(${IDENT})\\s*=\\s*`;

/** Order matters: on a shared start offset the earlier pattern wins. */
const DEFINITION_PATTERNS: readonly DefinitionPattern[] = [
  {
    kind: 'function',
    regex: new RegExp(
      `${NOT_AFTER_IDENT}(?:export\\s+(?:default\\s+)?)?(?:async\\s+)?function\\b\\s*\\*?\\s*(${IDENT})\\s*\\(`,
      'g',
    ),
  },
  {
    kind: 'function',
    regex: new RegExp(`${ASSIGNED}(?:async\\s+)?function\\b\\s*\\*?\\s*(?:${IDENT}\\s*)?\\(`, 'g'),
  },
  {
    kind: 'arrow',
    regex: new RegExp(`${ASSIGNED}(?:async\\s*)?\\(`, 'g'),
  },
  {
    kind: 'bare-arrow',
    regex: new RegExp(`${ASSIGNED}(?:async\\s+)?(${IDENT})\\s*=>\\s*\\{`, 'g'),
  },
];

// ============================================================================
// EXTRACTION
// ============================================================================

/**
 * Find every recognisable function in `text`, ordered by start offset.
 * Candidates whose parameter list or body never closes are dropped.
 */
export function findLexicalFunctions(text: string): LexicalFunction[] {
  const mask = maskLiterals(text);
  const byStart = new Map<number, LexicalFunction>();

  for (const pattern of DEFINITION_PATTERNS) {
    for (const match of text.matchAll(pattern.regex)) {
      const start = match.index ?? 0;
      if (mask[start] === 1 || byStart.has(start)) continue;
      const candidate = resolveCandidate(text, pattern.kind, match, start);
      if (candidate) byStart.set(start, candidate);
    }
  }

  // `const f = function g() {}` matches twice; the binding that starts first keeps the body.
  const seenBodies = new Set<number>();
  const found: LexicalFunction[] = [];
  for (const candidate of [...byStart.values()].sort((a, b) => a.start - b.start)) {
    if (seenBodies.has(candidate.bodyOpen)) continue;
    seenBodies.add(candidate.bodyOpen);
    found.push(candidate);
  }
  return found;
}

function resolveCandidate(
  text: string,
  kind: PatternKind,
  match: RegExpMatchArray,
  start: number,
): LexicalFunction | null {
  const name = match[1];
  const matchEnd = start + match[0].length;
  let parameters: string;
  let bodyOpen: number;

  if (kind === 'bare-arrow') {
    parameters = match[2] ?? '';
    bodyOpen = matchEnd - 1;
  } else {
    const parenOpen = matchEnd - 1;
    const parenClose = findMatchingBrace(text, parenOpen, '(', ')');
    if (parenClose < 0) return null;
    parameters = text.slice(parenOpen + 1, parenClose);

    let cursor = skipTrivia(text, parenClose + 1);
    if (kind === 'arrow') {
      if (!text.startsWith('=>', cursor)) return null;
      cursor = skipTrivia(text, cursor + 2);
    }
    if (text[cursor] !== '{') return null;
    bodyOpen = cursor;
  }

  const bodyClose = findMatchingBrace(text, bodyOpen);
  if (bodyClose < 0) return null;

  return {
    name,
    start,
    bodyOpen,
    bodyClose,
    parameters,
    body: text.slice(bodyOpen + 1, bodyClose),
  };
}

// ============================================================================
// LINE MAPPING
// ============================================================================

export function computeLineStarts(text: string): number[] {
  const starts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') starts.push(i + 1);
  }
  return starts;
}

/** 1-based line containing `offset`. */
export function lineAtOffset(lineStarts: readonly number[], offset: number): number {
  let low = 0;
  let high = lineStarts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if (lineStarts[mid] <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low + 1;
}

// ============================================================================
// EXTRACTOR
// ============================================================================

export class LexicalExtractor implements SourceExtractor {
  readonly path = 'lexical';
  readonly extensions = ['.js', '.jsx', '.mjs', '.cjs'] as const;

  extract(_filePath: string, content: string): DefinitionSite[] {
    const lineStarts = computeLineStarts(content);
    return findLexicalFunctions(content)
      .map((fn) => ({
        name: fn.name,
        enclosingTypes: [],
        startLine: lineAtOffset(lineStarts, fn.start),
        endLine: lineAtOffset(lineStarts, fn.bodyClose),
      }))
      .sort((a, b) => a.startLine - b.startLine);
  }
}
