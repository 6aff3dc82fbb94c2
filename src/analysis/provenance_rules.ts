/**
 * @fileoverview Provenance scoring rule tables
 *
 * Rules are evaluated in table order and are purely additive; the labels of
 * the rules that fire become the signal's explanation, structural rules
 * first, git adjustments after.
 */

import type { GitEvidence } from '../types.js';
import type { FunctionFeatures } from './function_features.js';

export const GENERIC_VARIABLE_NAMES: ReadonlySet<string> = new Set([
  'data',
  'input',
  'output',
  'result',
  'value',
  'item',
  'obj',
  'response',
  'request',
  'temp',
  'payload',
]);

export interface ScoringRule<T> {
  readonly label: string;
  readonly weight: number;
  readonly applies: (subject: T) => boolean;
}

// ============================================================================
// STRUCTURAL RULES
// ============================================================================

export function genericNameRatio(features: FunctionFeatures): number {
  if (features.assignedNames.length === 0) return 0;
  const generic = features.assignedNames.filter((name) => GENERIC_VARIABLE_NAMES.has(name)).length;
  return generic / features.assignedNames.length;
}

export function hasRepetitiveErrorMessages(messages: readonly string[]): boolean {
  if (messages.length < 2) return false;
  return new Set(messages).size <= Math.floor(messages.length / 2) + 1;
}

export const STRUCTURAL_RULES: readonly ScoringRule<FunctionFeatures>[] = [
  {
    label: 'uniform guard clauses',
    weight: 0.25,
    applies: (f) => f.guardClauseCount >= 3,
  },
  {
    label: 'generic variable naming',
    weight: 0.2,
    applies: (f) => genericNameRatio(f) >= 0.6,
  },
  {
    label: 'high defensive branch density',
    weight: 0.2,
    applies: (f) => f.statementCount >= 4 && f.conditionalCount / Math.max(f.statementCount, 1) >= 0.4,
  },
  {
    label: 'repetitive error messaging',
    weight: 0.15,
    applies: (f) => hasRepetitiveErrorMessages(f.errorMessages),
  },
  {
    label: 'generic return pipeline',
    weight: 0.15,
    applies: (f) => f.returnedIdentifier !== null && GENERIC_VARIABLE_NAMES.has(f.returnedIdentifier),
  },
  {
    label: 'long boilerplate flow',
    weight: 0.1,
    applies: (f) => f.statementCount >= 12 && !f.hasLoopOrTry,
  },
];

// ============================================================================
// GIT ADJUSTMENTS
// ============================================================================

function atMost(value: number | null, limit: number): boolean {
  return value !== null && value <= limit;
}

function atLeast(value: number | null, limit: number): boolean {
  return value !== null && value >= limit;
}

/** Applied only to evidence that is available. */
export const GIT_ADJUSTMENTS: readonly ScoringRule<GitEvidence>[] = [
  {
    label: 'single-source commit concentration',
    weight: 0.1,
    applies: (e) => atLeast(e.lineCommitConcentration, 0.85) && atMost(e.blameCommitCount, 2),
  },
  {
    label: 'recent introduction window',
    weight: 0.05,
    applies: (e) => atMost(e.lastCommitAgeDays, 45) && atMost(e.blameCommitCount, 3),
  },
  {
    label: 'low-author diversity file',
    weight: 0.05,
    applies: (e) => atMost(e.fileAuthorCount, 1) && atMost(e.fileCommitCount, 3),
  },
  {
    label: 'repeated revision history',
    weight: -0.1,
    applies: (e) => atLeast(e.blameCommitCount, 6),
  },
  {
    label: 'multi-author ownership',
    weight: -0.1,
    applies: (e) => atLeast(e.blameAuthorCount, 3),
  },
  {
    label: 'long-lived stable code',
    weight: -0.05,
    applies: (e) => atLeast(e.lastCommitAgeDays, 365),
  },
];
