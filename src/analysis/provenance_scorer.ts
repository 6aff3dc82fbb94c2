/**
 * @fileoverview Heuristic machine-authorship scoring
 *
 * The score is a heuristic, not a proof of authorship: a fixed, additive
 * rule table over structural features, optionally shifted by git evidence,
 * clamped to [0, 0.99] and rounded to two decimals.
 */

import type { CodeEntity, ConfidenceTier, GitEvidence, ProvenanceSignal } from '../types.js';
import { TsSourceParser } from '../ingest/ts_extractor.js';
import { extractFeatures, type FunctionFeatures } from './function_features.js';
import { inspectEntityFunction } from './function_slice.js';
import { GIT_ADJUSTMENTS, STRUCTURAL_RULES } from './provenance_rules.js';
import { logDebug } from '../telemetry/logger.js';

export const DEFAULT_PROVENANCE_THRESHOLD = 0.65;
export const HIGH_CONFIDENCE_SCORE = 0.8;
export const MAX_AI_PROBABILITY = 0.99;

export interface ProvenanceOptions {
  threshold?: number;
  gitEvidence?: ReadonlyMap<string, GitEvidence>;
  parser?: TsSourceParser;
}

export interface ScoreBreakdown {
  score: number;
  signals: string[];
}

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Apply the structural rules and, when evidence is present and available,
 * the git adjustments.
 */
export function scoreFeatures(features: FunctionFeatures, evidence?: GitEvidence): ScoreBreakdown {
  let raw = 0;
  const signals: string[] = [];

  for (const rule of STRUCTURAL_RULES) {
    if (!rule.applies(features)) continue;
    raw += rule.weight;
    signals.push(rule.label);
  }

  if (evidence?.available) {
    for (const adjustment of GIT_ADJUSTMENTS) {
      if (!adjustment.applies(evidence)) continue;
      raw += adjustment.weight;
      signals.push(adjustment.label);
    }
  }

  const score = Math.min(Math.max(roundTo(raw, 2), 0), MAX_AI_PROBABILITY);
  return { score, signals };
}

export function confidenceFor(score: number): ConfidenceTier {
  return score >= HIGH_CONFIDENCE_SCORE ? 'high' : 'medium';
}

/**
 * One signal per entity scoring at or above the threshold, in entity order.
 * Entities whose slice yields no function are not scored.
 */
export function detectAiSignals(entities: readonly CodeEntity[], options: ProvenanceOptions = {}): ProvenanceSignal[] {
  const threshold = options.threshold ?? DEFAULT_PROVENANCE_THRESHOLD;
  const parser = options.parser ?? new TsSourceParser();
  const signals: ProvenanceSignal[] = [];

  for (const entity of entities) {
    const features = inspectEntityFunction(entity, parser, extractFeatures);
    if (!features) {
      logDebug('[provenance] No function in slice', { entityId: entity.entityId, qualifiedName: entity.qualifiedName });
      continue;
    }

    const { score, signals: labels } = scoreFeatures(features, options.gitEvidence?.get(entity.entityId));
    if (score < threshold) continue;

    signals.push({
      entityId: entity.entityId,
      aiProbability: score,
      confidence: confidenceFor(score),
      signals: labels,
    });
  }

  return signals;
}
