/**
 * Tests for canonical function signatures
 */

import { describe, it, expect } from 'vitest';
import { TsSourceParser } from '../../ingest/ts_extractor.js';
import { canonicalSignature, canonicalTokens } from '../canonical_signature.js';
import { inspectEntityFunction } from '../function_slice.js';
import { entityFromSource } from './test_entities.js';

const parser = new TsSourceParser();

function signatureOf(source: string, filePath?: string): string | null {
  return inspectEntityFunction(entityFromSource(source, { filePath }), parser, canonicalSignature);
}

function tokensOf(source: string, filePath?: string): string[] | null {
  return inspectEntityFunction(entityFromSource(source, { filePath }), parser, canonicalTokens);
}

describe('canonicalSignature', () => {
  describe('AST path', () => {
    it('should serialize kinds with explicit nesting and identifier roles', () => {
      expect(tokensOf('function f(x) {\n  return x;\n}')).toEqual([
        'Parameter', '(', 'arg', ')',
        'Block', '(', 'ReturnStatement', '(', 'var', ')', ')',
      ]);
    });

    it('should ignore parameter, local and property names and literal contents', () => {
      const a = signatureOf('function a(user) {\n  const name = user.name;\n  return "hi " + name + 1;\n}');
      const b = signatureOf('function b(account) {\n  const label = account.title;\n  return "bye " + label + 2;\n}');
      expect(a).not.toBeNull();
      expect(a).toBe(b);
    });

    it('should give declarations and bound arrows with the same body one signature', () => {
      expect(signatureOf('const f = (x) => {\n  return x;\n};')).toBe(signatureOf('function g(y) {\n  return y;\n}'));
    });

    it('should keep operators', () => {
      expect(signatureOf('function f(a, b) {\n  return a + b;\n}')).not.toBe(
        signatureOf('function f(a, b) {\n  return a - b;\n}'),
      );
    });

    it('should keep boolean literals verbatim', () => {
      const signature = signatureOf('function f() {\n  return true;\n}');
      expect(signature).toContain('true');
      expect(signature).not.toBe(signatureOf('function f() {\n  return false;\n}'));
    });

    it('should treat destructured parameters as arguments and their keys as attributes', () => {
      expect(signatureOf('function f({ b: c }) {\n  return c;\n}')).toContain('BindingElement ( attr arg )');
    });

    it('should include prefix operators', () => {
      expect(signatureOf('function f(a) {\n  return !a;\n}')).toContain('PrefixUnaryExpression ( ! var )');
    });

    it('should read class members through the class wrapper', () => {
      const member = signatureOf('  run(x: number) {\n    return x;\n  }');
      expect(member).toBe(signatureOf('function run(y: number) {\n  return y;\n}'));
    });
  });

  describe('lexical path', () => {
    it('should replace identifiers and literals with placeholders', () => {
      expect(tokensOf('function a(x) {\n  return x + "s" + 1;\n}', 'lib/a.js')).toEqual([
        '<id>', 'return', '<id>', '+', '<str>', '+', '<num>', ';',
      ]);
    });

    it('should not depend on names or literal contents', () => {
      expect(signatureOf('function a(x) {\n  return x.y + "one";\n}', 'lib/a.js')).toBe(
        signatureOf('const b = (z) => {\n  return z.w + "two";\n};', 'lib/b.js'),
      );
    });
  });
});
