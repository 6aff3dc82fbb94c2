/**
 * @fileoverview Correlate provenance, duplication and runtime evidence into findings
 *
 * Findings are review prompts for a human, never instructions to delete.
 */

import type {
  AnalysisSummary,
  CodeEntity,
  DuplicationPair,
  Finding,
  GitEvidence,
  ProvenanceSignal,
  RuntimeEvidence,
} from '../types.js';

export interface CorrelationInput {
  entities: readonly CodeEntity[];
  aiSignals: readonly ProvenanceSignal[];
  duplicationPairs: readonly DuplicationPair[];
  runtimeEvidence: ReadonlyMap<string, RuntimeEvidence>;
  gitEvidence: ReadonlyMap<string, GitEvidence>;
  timeWindowDays: number;
  costPerInvocation: number;
}

export interface CorrelationResult {
  findings: Finding[];
  summary: AnalysisSummary;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Annualised cost of running both halves of a duplicate pair: the smaller
 * invocation count, scaled from the observation window to a year.
 */
export function estimateAnnualCost(
  invocationsA: number,
  invocationsB: number,
  costPerInvocation: number,
  timeWindowDays: number,
): number {
  return round2((Math.min(invocationsA, invocationsB) * costPerInvocation * 365) / Math.max(timeWindowDays, 1));
}

export function correlateFindings(input: CorrelationInput): CorrelationResult {
  const signalsById = new Map(input.aiSignals.map((signal) => [signal.entityId, signal]));
  const duplicateMembers = new Set(input.duplicationPairs.flatMap((pair) => [pair.entityA, pair.entityB]));
  const findings: Finding[] = [];

  let runtimeZeroInvocations = 0;
  let runtimeUnknown = 0;
  let probableAiZeroInvocations = 0;
  let annualizedCostTotal = 0;

  // ==========================================================================
  // PER ENTITY
  // ==========================================================================

  for (const entity of input.entities) {
    const invocations = input.runtimeEvidence.get(entity.entityId)?.invocationCount ?? null;
    const signal = signalsById.get(entity.entityId);

    if (invocations === 0) {
      runtimeZeroInvocations++;
      if (signal) {
        probableAiZeroInvocations++;
        findings.push({
          findingType: 'runtime_unused_review',
          severity: 'low',
          title: 'Probable AI-generated function with zero runtime usage',
          entityIds: [entity.entityId],
          evidence: [`ai_probability=${signal.aiProbability}`, 'runtime_invocations=0', `confidence=${signal.confidence}`],
          estimatedAnnualCost: null,
        });
      }
    }

    if (invocations === null) runtimeUnknown++;

    if (signal?.confidence === 'high' && invocations === 0 && duplicateMembers.has(entity.entityId)) {
      findings.push({
        findingType: 'delete_candidate_review',
        severity: 'low',
        title: 'High-confidence delete candidate (human review required)',
        entityIds: [entity.entityId],
        evidence: [`ai_probability=${signal.aiProbability}`, 'runtime_invocations=0', 'high_semantic_overlap=true'],
        estimatedAnnualCost: null,
      });
    }
  }

  // ==========================================================================
  // PER PAIR
  // ==========================================================================

  for (const pair of input.duplicationPairs) {
    const invocationsA = input.runtimeEvidence.get(pair.entityA)?.invocationCount ?? null;
    const invocationsB = input.runtimeEvidence.get(pair.entityB)?.invocationCount ?? null;
    if (invocationsA === null || invocationsB === null || invocationsA <= 0 || invocationsB <= 0) continue;

    let estimatedAnnualCost: number | null = null;
    if (input.costPerInvocation > 0) {
      estimatedAnnualCost = estimateAnnualCost(invocationsA, invocationsB, input.costPerInvocation, input.timeWindowDays);
      annualizedCostTotal += estimatedAnnualCost;
    }

    findings.push({
      findingType: 'consolidation_candidate_review',
      severity: 'medium',
      title: 'High-overlap active duplicate logic (human review required)',
      entityIds: [pair.entityA, pair.entityB],
      evidence: [`semantic_overlap=${pair.similarity}`, `invocations_a=${invocationsA}`, `invocations_b=${invocationsB}`],
      estimatedAnnualCost,
    });
  }

  let gitEvidenceAvailable = 0;
  for (const evidence of input.gitEvidence.values()) {
    if (evidence.available) gitEvidenceAvailable++;
  }

  return {
    findings,
    summary: {
      functionsScanned: input.entities.length,
      probableAiFunctions: input.aiSignals.length,
      highConfidenceAiFunctions: input.aiSignals.filter((signal) => signal.confidence === 'high').length,
      highConfidenceDuplicationPairs: input.duplicationPairs.filter((pair) => pair.confidence === 'high').length,
      mediumConfidenceDuplicationPairs: input.duplicationPairs.filter((pair) => pair.confidence === 'medium').length,
      runtimeZeroInvocations,
      runtimeUnknown,
      probableAiZeroInvocations,
      gitEvidenceAvailable,
      estimatedAnnualizedAvoidableRuntimeCost: round2(annualizedCostTotal),
    },
  };
}
