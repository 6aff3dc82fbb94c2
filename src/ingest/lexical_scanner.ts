/**
 * @fileoverview Literal-aware scanning primitives for JavaScript source
 *
 * No grammar is built here. The helpers only know enough about JavaScript
 * to keep string, template and comment contents from being mistaken for
 * code: brace matching, literal masking and a flat tokenizer. Regular
 * expression literals are not recognised, so a `{` or a quote inside a
 * regex can still throw the scanner off.
 */

// ============================================================================
// TYPES
// ============================================================================

export type LexicalTokenKind = 'identifier' | 'keyword' | 'number' | 'string' | 'punct';

export interface LexicalToken {
  kind: LexicalTokenKind;
  text: string;
  offset: number;
}

export const JS_KEYWORDS: ReadonlySet<string> = new Set([
  'async', 'await', 'break', 'case', 'catch', 'class', 'const', 'continue',
  'debugger', 'default', 'delete', 'do', 'else', 'export', 'extends', 'false',
  'finally', 'for', 'function', 'if', 'import', 'in', 'instanceof', 'let',
  'new', 'null', 'of', 'return', 'static', 'super', 'switch', 'this', 'throw',
  'true', 'try', 'typeof', 'undefined', 'var', 'void', 'while', 'with', 'yield',
]);

// ============================================================================
// LITERAL AND COMMENT SKIPPING
// ============================================================================

/**
 * Skip a single- or double-quoted string starting at `start`.
 * Returns the index just past the closing quote, or the index of the
 * terminating newline for an unterminated string.
 */
export function skipQuoted(text: string, start: number): number {
  const quote = text[start];
  let i = start + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === quote) return i + 1;
    if (ch === '\n') return i;
    i++;
  }
  return text.length;
}

/**
 * Skip a template literal starting at the opening backtick, descending into
 * `${ ... }` substitutions with the same brace matcher used for bodies.
 */
export function skipTemplate(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === '`') return i + 1;
    if (ch === '$' && text[i + 1] === '{') {
      const close = findMatchingBrace(text, i + 1);
      if (close < 0) return text.length;
      i = close + 1;
      continue;
    }
    i++;
  }
  return text.length;
}

/**
 * If a string, template or comment starts at `index`, return the index just
 * past it; otherwise -1.
 */
export function skipLiteralOrComment(text: string, index: number): number {
  const ch = text[index];
  if (ch === '"' || ch === "'") return skipQuoted(text, index);
  if (ch === '`') return skipTemplate(text, index);
  if (ch === '/') {
    const next = text[index + 1];
    if (next === '/') {
      const newline = text.indexOf('\n', index + 2);
      return newline < 0 ? text.length : newline;
    }
    if (next === '*') {
      const close = text.indexOf('*/', index + 2);
      return close < 0 ? text.length : close + 2;
    }
  }
  return -1;
}

/** Skip whitespace and comments. */
export function skipTrivia(text: string, index: number): number {
  let i = index;
  while (i < text.length) {
    if (/\s/.test(text[i])) {
      i++;
      continue;
    }
    if (text[i] === '/' && (text[i + 1] === '/' || text[i + 1] === '*')) {
      i = skipLiteralOrComment(text, i);
      continue;
    }
    break;
  }
  return i;
}

/**
 * Find the bracket that closes the one at `openIndex`, tracking nesting depth
 * and ignoring anything inside strings, templates and comments.
 * Returns -1 when the input ends first.
 */
export function findMatchingBrace(text: string, openIndex: number, open = '{', close = '}'): number {
  let depth = 0;
  let i = openIndex;
  while (i < text.length) {
    const skipped = skipLiteralOrComment(text, i);
    if (skipped >= 0) {
      i = skipped;
      continue;
    }
    const ch = text[i];
    if (ch === open) {
      depth++;
    } else if (ch === close) {
      depth--;
      if (depth === 0) return i;
    }
    i++;
  }
  return -1;
}

/**
 * Mark every offset that lies inside a string, template or comment.
 */
export function maskLiterals(text: string): Uint8Array {
  const mask = new Uint8Array(text.length);
  let i = 0;
  while (i < text.length) {
    const skipped = skipLiteralOrComment(text, i);
    if (skipped >= 0) {
      mask.fill(1, i, skipped);
      i = skipped;
      continue;
    }
    i++;
  }
  return mask;
}

// ============================================================================
// TOKENIZER
// ============================================================================

const IDENTIFIER_RE = /[\p{L}_$][\p{L}\p{N}_$]*/uy;
const NUMBER_RE = /(?:\d[\w.]*|\.\d[\w]*)/y;
const PUNCT_RE = /(?:>>>=|\.\.\.|===|!==|\*\*=|<<=|>>=|>>>|&&=|\|\|=|\?\?=|=>|==|!=|<=|>=|&&|\|\||\?\?|\?\.|\+\+|--|\+=|-=|\*=|\/=|%=|&=|\|=|\^=|\*\*|<<|>>|[^\s\w$])/uy;

function matchAt(re: RegExp, text: string, index: number): string | null {
  re.lastIndex = index;
  const match = re.exec(text);
  return match ? match[0] : null;
}

/**
 * Split source into a flat token stream. Comments are dropped; each string
 * or template literal (substitutions included) becomes one `string` token.
 */
export function tokenizeLexical(text: string): LexicalToken[] {
  const tokens: LexicalToken[] = [];
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (/\s/.test(ch)) {
      i++;
      continue;
    }
    const skipped = skipLiteralOrComment(text, i);
    if (skipped >= 0) {
      if (ch !== '/') {
        tokens.push({ kind: 'string', text: text.slice(i, skipped), offset: i });
      }
      i = skipped;
      continue;
    }

    const number = matchAt(NUMBER_RE, text, i);
    if (number) {
      tokens.push({ kind: 'number', text: number, offset: i });
      i += number.length;
      continue;
    }

    const identifier = matchAt(IDENTIFIER_RE, text, i);
    if (identifier) {
      tokens.push({
        kind: JS_KEYWORDS.has(identifier) ? 'keyword' : 'identifier',
        text: identifier,
        offset: i,
      });
      i += identifier.length;
      continue;
    }

    const punct = matchAt(PUNCT_RE, text, i) ?? ch;
    tokens.push({ kind: 'punct', text: punct, offset: i });
    i += punct.length;
  }
  return tokens;
}

/** Inner text of a string token, without its delimiters. */
export function stringTokenValue(token: LexicalToken): string {
  return token.text.length >= 2 ? token.text.slice(1, -1) : '';
}
