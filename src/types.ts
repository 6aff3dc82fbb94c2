/**
 * @fileoverview Core types for provenance-audit
 *
 * Every record here is created during a single analysis run and never
 * mutated afterwards. Downstream collaborators (findings, reports, history)
 * treat them as opaque values keyed by entity id.
 */

// ============================================================================
// ENTITY TYPES
// ============================================================================

/** Which extraction path produced an entity. */
export type ExtractionPath = 'ast' | 'lexical';

export interface CodeEntity {
  /** First 12 hex chars of sha1(`${filePath}:${qualifiedName}:${startLine}`). */
  readonly entityId: string;
  /** Repository-relative, always `/`-separated. */
  readonly filePath: string;
  readonly functionName: string;
  readonly qualifiedName: string;
  /** 1-based. */
  readonly startLine: number;
  /** Inclusive. */
  readonly endLine: number;
  /** Exact text of lines [startLine, endLine] joined with `\n`. */
  readonly source: string;
  readonly extraction: ExtractionPath;
}

// ============================================================================
// SIGNAL TYPES
// ============================================================================

export type ConfidenceTier = 'high' | 'medium';

export interface DuplicationPair {
  readonly entityA: string;
  readonly entityB: string;
  readonly similarity: number;
  readonly confidence: ConfidenceTier;
}

export interface ProvenanceSignal {
  readonly entityId: string;
  readonly aiProbability: number;
  readonly confidence: ConfidenceTier;
  readonly signals: readonly string[];
}

export interface GitEvidence {
  readonly entityId: string;
  readonly available: boolean;
  readonly blameCommitCount: number | null;
  readonly blameAuthorCount: number | null;
  readonly lineCommitConcentration: number | null;
  readonly lastCommitAgeDays: number | null;
  readonly fileCommitCount: number | null;
  readonly fileAuthorCount: number | null;
}

// ============================================================================
// RUNTIME + FINDING TYPES
// ============================================================================

export type RuntimeEvidenceSource = 'runtime-file' | 'runtime-unmapped' | 'runtime-unavailable';

export interface RuntimeEvidence {
  readonly entityId: string;
  readonly invocationCount: number | null;
  readonly lastInvokedAt: string | null;
  readonly source: RuntimeEvidenceSource;
}

export type FindingType =
  | 'runtime_unused_review'
  | 'delete_candidate_review'
  | 'consolidation_candidate_review';

export type FindingSeverity = 'low' | 'medium';

export interface Finding {
  readonly findingType: FindingType;
  readonly severity: FindingSeverity;
  readonly title: string;
  readonly entityIds: readonly string[];
  readonly evidence: readonly string[];
  readonly estimatedAnnualCost: number | null;
}

export interface AnalysisSummary {
  functionsScanned: number;
  probableAiFunctions: number;
  highConfidenceAiFunctions: number;
  highConfidenceDuplicationPairs: number;
  mediumConfidenceDuplicationPairs: number;
  runtimeZeroInvocations: number;
  runtimeUnknown: number;
  probableAiZeroInvocations: number;
  gitEvidenceAvailable: number;
  estimatedAnnualizedAvoidableRuntimeCost: number;
}

export type SummaryMetric = keyof AnalysisSummary;

// ============================================================================
// RESULT TYPES
// ============================================================================

/** Output of the core analysis (scanner, detector, scorer, git evidence). */
export interface CoreAnalysis {
  entities: CodeEntity[];
  aiSignals: ProvenanceSignal[];
  duplicationPairs: DuplicationPair[];
  gitEvidence: Map<string, GitEvidence>;
}

export interface AnalysisResult extends CoreAnalysis {
  runtimeEvidence: Map<string, RuntimeEvidence>;
  findings: Finding[];
  summary: AnalysisSummary;
}
