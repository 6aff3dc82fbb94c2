/**
 * Tests for provenance scoring
 */

import { describe, it, expect } from 'vitest';
import type { GitEvidence } from '../../types.js';
import { TsSourceParser } from '../../ingest/ts_extractor.js';
import type { FunctionFeatures } from '../function_features.js';
import { confidenceFor, detectAiSignals, scoreFeatures } from '../provenance_scorer.js';
import { genericNameRatio, hasRepetitiveErrorMessages } from '../provenance_rules.js';
import { entityFromSource } from './test_entities.js';
import { JS_VALIDATE_REQUEST, TS_LEGACY_HELPER, TS_VALIDATE_REQUEST } from './fixture_sources.js';

const parser = new TsSourceParser();

const VALIDATOR_LABELS = [
  'uniform guard clauses',
  'generic variable naming',
  'repetitive error messaging',
  'generic return pipeline',
];

function evidence(entityId: string, overrides: Partial<GitEvidence> = {}): GitEvidence {
  return {
    entityId,
    available: true,
    blameCommitCount: 1,
    blameAuthorCount: 1,
    lineCommitConcentration: 1,
    lastCommitAgeDays: 3,
    fileCommitCount: 1,
    fileAuthorCount: 1,
    ...overrides,
  };
}

const NO_FEATURES: FunctionFeatures = {
  statementCount: 1,
  guardClauseCount: 0,
  assignedNames: [],
  conditionalCount: 0,
  errorMessages: [],
  returnedIdentifier: null,
  hasLoopOrTry: false,
};

describe('detectAiSignals', () => {
  it('should score a guard-heavy validator as a medium-confidence signal', () => {
    const entity = entityFromSource(TS_VALIDATE_REQUEST);
    expect(detectAiSignals([entity], { parser })).toEqual([
      { entityId: entity.entityId, aiProbability: 0.75, confidence: 'medium', signals: VALIDATOR_LABELS },
    ]);
  });

  it('should give the lexical path the same score', () => {
    const [signal] = detectAiSignals([entityFromSource(JS_VALIDATE_REQUEST, { filePath: 'lib/orders.js' })], { parser });
    expect(signal.aiProbability).toBe(0.75);
    expect(signal.signals).toEqual(VALIDATOR_LABELS);
  });

  it('should raise the score with concentrated recent git history', () => {
    const entity = entityFromSource(TS_VALIDATE_REQUEST);
    const gitEvidence = new Map([[entity.entityId, evidence(entity.entityId)]]);
    expect(detectAiSignals([entity], { parser, gitEvidence })).toEqual([
      {
        entityId: entity.entityId,
        aiProbability: 0.95,
        confidence: 'high',
        signals: [
          ...VALIDATOR_LABELS,
          'single-source commit concentration',
          'recent introduction window',
          'low-author diversity file',
        ],
      },
    ]);
  });

  it('should ignore evidence that is not available', () => {
    const entity = entityFromSource(TS_VALIDATE_REQUEST);
    const gitEvidence = new Map([[entity.entityId, evidence(entity.entityId, { available: false })]]);
    expect(detectAiSignals([entity], { parser, gitEvidence })[0].aiProbability).toBe(0.75);
  });

  it('should drop entities below the threshold', () => {
    const entity = entityFromSource(TS_VALIDATE_REQUEST);
    expect(detectAiSignals([entity], { parser, threshold: 0.8 })).toEqual([]);
    expect(detectAiSignals([entityFromSource(TS_LEGACY_HELPER)], { parser })).toEqual([]);
  });

  it('should report zero-score functions when the threshold is zero', () => {
    const entity = entityFromSource(TS_LEGACY_HELPER);
    expect(detectAiSignals([entity], { parser, threshold: 0 })).toEqual([
      { entityId: entity.entityId, aiProbability: 0, confidence: 'medium', signals: [] },
    ]);
  });

  it('should skip slices without a function', () => {
    expect(detectAiSignals([entityFromSource('const limit = 3;')], { parser, threshold: 0 })).toEqual([]);
  });
});

describe('structural rules on real bodies', () => {
  const paths = ['src/rules.ts', 'lib/rules.js'];

  function signalsFor(body: readonly string[], filePath: string): readonly string[] {
    const source = ['function rule(options) {', ...body.map((line) => `  ${line}`), '}'].join('\n');
    const [signal] = detectAiSignals([entityFromSource(source, { filePath })], { parser, threshold: 0 });
    return signal.signals;
  }

  const TWO_BRANCHES = [
    'let total = 0;',
    'if (options.a) { total = 1; }',
    'if (options.b) { total = total * 2; }',
  ];

  const SETTINGS = [
    'const host = options.host;',
    'const port = options.port;',
    'const user = options.user;',
    'const token = options.token;',
    'const region = options.region;',
    'const timeout = options.timeout;',
    'const retries = options.retries;',
    'const level = options.level;',
    'const prefix = options.prefix;',
    'const mode = options.mode;',
  ];

  for (const filePath of paths) {
    describe(filePath.endsWith('.js') ? 'lexical path' : 'AST path', () => {
      it('should fire the uniform guard rule when a guard has an else', () => {
        const body = ['if (options.a) { return 1; } else { return 0; }', 'if (options.b) { return 2; }', 'if (options.c) { return 3; }'];
        expect(signalsFor(body, filePath)).toEqual(['uniform guard clauses']);
      });

      it('should fire branch density at two conditionals in five statements', () => {
        expect(signalsFor([...TWO_BRANCHES, 'total = total + 1;', 'return total;'], filePath)).toEqual([
          'high defensive branch density',
        ]);
      });

      it('should not fire branch density at two conditionals in six statements', () => {
        expect(signalsFor([...TWO_BRANCHES, 'total = total + 1;', 'total = total - 1;', 'return total;'], filePath)).toEqual([]);
      });

      it('should not fire branch density below four statements', () => {
        expect(signalsFor(TWO_BRANCHES, filePath)).toEqual([]);
      });

      it('should fire the boilerplate rule at twelve straight-line statements', () => {
        expect(signalsFor([...SETTINGS, 'const scope = options.scope;', 'return mode;'], filePath)).toEqual([
          'long boilerplate flow',
        ]);
      });

      it('should not fire the boilerplate rule at eleven statements', () => {
        expect(signalsFor([...SETTINGS, 'return mode;'], filePath)).toEqual([]);
      });

      it('should not fire the boilerplate rule when the body loops', () => {
        const body = [...SETTINGS, 'while (options.next) { options = options.next; }', 'return mode;'];
        expect(signalsFor(body, filePath)).toEqual([]);
      });
    });
  }
});

describe('scoreFeatures', () => {
  it('should fire branch density from a ratio of 0.4', () => {
    const atBoundary = { ...NO_FEATURES, statementCount: 100, conditionalCount: 40 };
    expect(scoreFeatures(atBoundary).signals).toEqual(['high defensive branch density']);
    expect(scoreFeatures({ ...atBoundary, conditionalCount: 39 }).signals).toEqual([]);
  });

  it('should clamp the score below 1', () => {
    const features: FunctionFeatures = {
      statementCount: 12,
      guardClauseCount: 3,
      assignedNames: ['data'],
      conditionalCount: 6,
      errorMessages: ['error', 'error'],
      returnedIdentifier: 'data',
      hasLoopOrTry: false,
    };
    const { score, signals } = scoreFeatures(features, evidence('e1'));
    expect(score).toBe(0.99);
    expect(signals).toHaveLength(9);
  });

  it('should clamp the score at zero', () => {
    const stale = evidence('e1', { blameCommitCount: 7, blameAuthorCount: 4, lastCommitAgeDays: 400, lineCommitConcentration: 0.2, fileAuthorCount: 5, fileCommitCount: 30 });
    expect(scoreFeatures(NO_FEATURES, stale)).toEqual({
      score: 0,
      signals: ['repeated revision history', 'multi-author ownership', 'long-lived stable code'],
    });
  });

  it('should treat missing evidence fields as not matching', () => {
    const partial = evidence('e1', {
      blameCommitCount: null,
      blameAuthorCount: null,
      lineCommitConcentration: null,
      lastCommitAgeDays: null,
    });
    expect(scoreFeatures(NO_FEATURES, partial).signals).toEqual(['low-author diversity file']);
  });
});

describe('rule helpers', () => {
  it('should compute the generic name ratio', () => {
    expect(genericNameRatio({ ...NO_FEATURES, assignedNames: ['data', 'total'] })).toBe(0.5);
    expect(genericNameRatio(NO_FEATURES)).toBe(0);
  });

  it('should detect repeated error messages', () => {
    expect(hasRepetitiveErrorMessages(['a', 'a', 'b'])).toBe(true);
    expect(hasRepetitiveErrorMessages(['a', 'b', 'c'])).toBe(false);
    expect(hasRepetitiveErrorMessages(['a'])).toBe(false);
  });

  it('should map scores to confidence tiers', () => {
    expect(confidenceFor(0.8)).toBe('high');
    expect(confidenceFor(0.79)).toBe('medium');
  });
});
