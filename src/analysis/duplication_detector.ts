/**
 * @fileoverview Near-duplicate detection over canonical signatures
 *
 * Every retained pair is compared; this is quadratic in the number of
 * functions that pass the body-size gate. A length bound and a token
 * histogram bound skip pairs that cannot reach the lowest enabled
 * threshold before the LCS pass.
 */

import type { CodeEntity, ConfidenceTier, DuplicationPair } from '../types.js';
import { TsSourceParser } from '../ingest/ts_extractor.js';
import { canonicalTokens } from './canonical_signature.js';
import { countBodyStatements } from './function_features.js';
import { inspectEntityFunction } from './function_slice.js';
import {
  buildHistogram,
  histogramRatioBound,
  lcsRatio,
  lengthRatioBound,
  type TokenHistogram,
} from './sequence_similarity.js';
import { logDebug } from '../telemetry/logger.js';

// ============================================================================
// TYPES
// ============================================================================

export interface DuplicationOptions {
  highThreshold?: number;
  mediumThreshold?: number;
  includeMedium?: boolean;
  minBodyStatements?: number;
  /** Signatures shorter than this (in characters) are left out; 0 disables the gate. */
  minSignatureChars?: number;
  parser?: TsSourceParser;
}

export const DUPLICATION_DEFAULTS = {
  highThreshold: 0.9,
  mediumThreshold: 0.75,
  includeMedium: false,
  minBodyStatements: 3,
  minSignatureChars: 0,
} as const;

interface SignatureRecord {
  entityId: string;
  tokens: string[];
  histogram: TokenHistogram;
}

// ============================================================================
// SIGNATURES
// ============================================================================

interface Canonicalized {
  statements: number;
  tokens: string[];
}

function buildSignatures(
  entities: readonly CodeEntity[],
  minBodyStatements: number,
  minSignatureChars: number,
  parser: TsSourceParser,
): SignatureRecord[] {
  const records: SignatureRecord[] = [];
  for (const entity of entities) {
    const canonical = inspectEntityFunction<Canonicalized>(entity, parser, (fn) => {
      const statements = countBodyStatements(fn);
      return { statements, tokens: statements >= minBodyStatements ? canonicalTokens(fn) : [] };
    });
    if (!canonical) {
      logDebug('[duplication] No function in slice', { entityId: entity.entityId, qualifiedName: entity.qualifiedName });
      continue;
    }
    if (canonical.statements < minBodyStatements) continue;
    if (minSignatureChars > 0 && canonical.tokens.join(' ').length < minSignatureChars) continue;
    records.push({
      entityId: entity.entityId,
      tokens: canonical.tokens,
      histogram: buildHistogram(canonical.tokens),
    });
  }
  return records;
}

// ============================================================================
// DETECTION
// ============================================================================

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * All pairs at or above the enabled thresholds, sorted by similarity
 * descending. Ties keep discovery order (scan order of the first member,
 * then of the second).
 */
export function detectDuplicationPairs(
  entities: readonly CodeEntity[],
  options: DuplicationOptions = {},
): DuplicationPair[] {
  const highThreshold = options.highThreshold ?? DUPLICATION_DEFAULTS.highThreshold;
  const mediumThreshold = options.mediumThreshold ?? DUPLICATION_DEFAULTS.mediumThreshold;
  const includeMedium = options.includeMedium ?? DUPLICATION_DEFAULTS.includeMedium;
  const minBodyStatements = options.minBodyStatements ?? DUPLICATION_DEFAULTS.minBodyStatements;
  const minSignatureChars = options.minSignatureChars ?? DUPLICATION_DEFAULTS.minSignatureChars;
  const lowestThreshold = includeMedium ? Math.min(highThreshold, mediumThreshold) : highThreshold;

  const records = buildSignatures(entities, minBodyStatements, minSignatureChars, options.parser ?? new TsSourceParser());
  const pairs: DuplicationPair[] = [];

  for (let i = 0; i < records.length; i++) {
    const a = records[i];
    for (let j = i + 1; j < records.length; j++) {
      const b = records[j];
      if (a.entityId === b.entityId) continue;
      if (lengthRatioBound(a.tokens.length, b.tokens.length) < lowestThreshold) continue;
      if (histogramRatioBound(a.histogram, a.tokens.length, b.histogram, b.tokens.length) < lowestThreshold) continue;

      const ratio = lcsRatio(a.tokens, b.tokens);
      let confidence: ConfidenceTier | null = null;
      if (ratio >= highThreshold) {
        confidence = 'high';
      } else if (includeMedium && ratio >= mediumThreshold) {
        confidence = 'medium';
      }
      if (!confidence) continue;

      pairs.push({
        entityA: a.entityId,
        entityB: b.entityId,
        similarity: roundTo(ratio, 3),
        confidence,
      });
    }
  }

  // Array.prototype.sort is stable.
  return pairs.sort((x, y) => y.similarity - x.similarity);
}
