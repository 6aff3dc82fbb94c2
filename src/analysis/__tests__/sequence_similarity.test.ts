/**
 * Tests for token-sequence similarity
 */

import { describe, it, expect } from 'vitest';
import { buildHistogram, histogramRatioBound, lcsRatio, lengthRatioBound } from '../sequence_similarity.js';

describe('sequence similarity', () => {
  describe('lcsRatio', () => {
    it('should return 1 for identical sequences', () => {
      expect(lcsRatio(['a', 'b', 'c'], ['a', 'b', 'c'])).toBe(1);
    });

    it('should compute twice the common subsequence over the total length', () => {
      expect(lcsRatio(['a', 'b', 'c'], ['a', 'c'])).toBe(0.8);
      expect(lcsRatio(['b', 'a'], ['a', 'b'])).toBe(0.5);
    });

    it('should be symmetric', () => {
      const x = ['if', '(', 'var', ')', 'return', 'var'];
      const y = ['return', 'var', 'if', '(', ')'];
      expect(lcsRatio(x, y)).toBe(lcsRatio(y, x));
    });

    it('should return 0 when either side is empty', () => {
      expect(lcsRatio([], ['a'])).toBe(0);
      expect(lcsRatio(['a'], [])).toBe(0);
    });
  });

  describe('bounds', () => {
    it('should bound by lengths', () => {
      expect(lengthRatioBound(3, 5)).toBe(0.75);
      expect(lengthRatioBound(0, 5)).toBe(0);
    });

    it('should bound by shared token counts regardless of order', () => {
      const a = ['b', 'a'];
      const b = ['a', 'b'];
      const bound = histogramRatioBound(buildHistogram(a), a.length, buildHistogram(b), b.length);
      expect(bound).toBe(1);
      expect(bound).toBeGreaterThanOrEqual(lcsRatio(a, b));
    });

    it('should count repeated tokens once per shared occurrence', () => {
      const histogram = buildHistogram(['x', 'x', 'y']);
      expect(histogram.get('x')).toBe(2);
      expect(histogramRatioBound(histogram, 3, buildHistogram(['x', 'y', 'y']), 3)).toBeCloseTo(2 / 3, 10);
    });
  });
});
