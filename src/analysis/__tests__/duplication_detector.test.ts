/**
 * Tests for near-duplicate detection
 */

import { describe, it, expect } from 'vitest';
import { TsSourceParser } from '../../ingest/ts_extractor.js';
import { detectDuplicationPairs } from '../duplication_detector.js';
import { entityFromSource } from './test_entities.js';
import {
  JS_HELPER,
  JS_VALIDATE_PAYLOAD,
  JS_VALIDATE_REQUEST,
  TS_LEGACY_HELPER,
  TS_VALIDATE_PAYLOAD,
  TS_VALIDATE_REQUEST,
} from './fixture_sources.js';

const parser = new TsSourceParser();

const FOUR_CALLS = 'function a(x) {\n  x();\n  x();\n  x();\n  x();\n}';
const THREE_CALLS_AND_RETURN = 'function b(x) {\n  x();\n  x();\n  x();\n  return 1;\n}';

describe('detectDuplicationPairs', () => {
  it('should pair renamed TypeScript validators with full similarity', () => {
    const request = entityFromSource(TS_VALIDATE_REQUEST);
    const payload = entityFromSource(TS_VALIDATE_PAYLOAD);
    const helper = entityFromSource(TS_LEGACY_HELPER);
    expect(detectDuplicationPairs([request, payload, helper], { parser })).toEqual([
      { entityA: request.entityId, entityB: payload.entityId, similarity: 1, confidence: 'high' },
    ]);
  });

  it('should pair a JavaScript declaration with a renamed arrow function', () => {
    const payload = entityFromSource(JS_VALIDATE_PAYLOAD, { filePath: 'lib/orders.js' });
    const request = entityFromSource(JS_VALIDATE_REQUEST, { filePath: 'lib/orders.js' });
    expect(detectDuplicationPairs([payload, request], { parser })).toEqual([
      { entityA: payload.entityId, entityB: request.entityId, similarity: 1, confidence: 'high' },
    ]);
  });

  it('should leave out functions below the body-size gate', () => {
    const first = entityFromSource(TS_LEGACY_HELPER);
    const second = entityFromSource(TS_LEGACY_HELPER);
    expect(detectDuplicationPairs([first, second], { parser })).toEqual([]);
    expect(detectDuplicationPairs([first, second], { parser, minBodyStatements: 2 })).toEqual([
      { entityA: first.entityId, entityB: second.entityId, similarity: 1, confidence: 'high' },
    ]);
  });

  it('should leave out short signatures when a minimum length is set', () => {
    const request = entityFromSource(TS_VALIDATE_REQUEST);
    const payload = entityFromSource(TS_VALIDATE_PAYLOAD);
    expect(detectDuplicationPairs([request, payload], { parser, minSignatureChars: 100_000 })).toEqual([]);
  });

  it('should report medium overlap only when enabled', () => {
    const a = entityFromSource(FOUR_CALLS, { filePath: 'lib/a.js' });
    const b = entityFromSource(THREE_CALLS_AND_RETURN, { filePath: 'lib/b.js' });
    expect(detectDuplicationPairs([a, b], { parser })).toEqual([]);
    expect(detectDuplicationPairs([a, b], { parser, includeMedium: true })).toEqual([
      { entityA: a.entityId, entityB: b.entityId, similarity: 0.848, confidence: 'medium' },
    ]);
  });

  it('should sort pairs by similarity, highest first', () => {
    const a = entityFromSource(FOUR_CALLS, { filePath: 'lib/a.js' });
    const b = entityFromSource(THREE_CALLS_AND_RETURN, { filePath: 'lib/b.js' });
    const request = entityFromSource(TS_VALIDATE_REQUEST);
    const payload = entityFromSource(TS_VALIDATE_PAYLOAD);
    const pairs = detectDuplicationPairs([a, b, request, payload], { parser, includeMedium: true });
    expect(pairs.map((pair) => [pair.entityA, pair.confidence])).toEqual([
      [request.entityId, 'high'],
      [a.entityId, 'medium'],
    ]);
  });

  it('should never report more pairs as the threshold rises', () => {
    const entities = [
      entityFromSource(FOUR_CALLS, { filePath: 'lib/a.js' }),
      entityFromSource(THREE_CALLS_AND_RETURN, { filePath: 'lib/b.js' }),
      entityFromSource(TS_VALIDATE_REQUEST),
      entityFromSource(TS_VALIDATE_PAYLOAD),
    ];
    const counts = [0.75, 0.8, 0.85, 0.9, 1].map(
      (threshold) =>
        detectDuplicationPairs(entities, {
          parser,
          includeMedium: true,
          highThreshold: threshold,
          mediumThreshold: threshold,
        }).length,
    );
    expect(counts).toEqual([2, 2, 1, 1, 1]);
    counts.slice(1).forEach((count, index) => {
      expect(count).toBeLessThanOrEqual(counts[index]);
    });
  });

  it('should never pair an entity with itself', () => {
    const request = entityFromSource(TS_VALIDATE_REQUEST);
    expect(detectDuplicationPairs([request, request], { parser })).toEqual([]);
  });

  it('should skip entities whose slice has no function', () => {
    const constant = entityFromSource('const limit = 3;');
    const helper = entityFromSource(JS_HELPER, { filePath: 'lib/h.js' });
    expect(detectDuplicationPairs([constant, helper], { parser, minBodyStatements: 0 })).toEqual([]);
  });
});
