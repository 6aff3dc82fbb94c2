/**
 * @fileoverview provenance-audit - read-only diagnostic for AI code waste signals
 *
 * Scans a repository's TypeScript and JavaScript functions, finds canonical
 * duplicates, scores heuristic AI provenance with git-blame adjustments, and
 * correlates the result with optional runtime invocation counts.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { analyze } from 'provenance-audit';
 *
 * const { entities, duplicationPairs, aiSignals } = analyze('/path/to/repo', {
 *   duplication: { highThreshold: 0.9 },
 *   provenanceThreshold: 0.65,
 * });
 * ```
 *
 * ## Full diagnostic
 *
 * ```typescript
 * import { resolveAnalysisConfig, analyzeRepository, buildMarkdownReport } from 'provenance-audit';
 *
 * const config = resolveAnalysisConfig({ overrides: { repoPath: '/path/to/repo' } });
 * const result = analyzeRepository(config);
 * const markdown = buildMarkdownReport(result, { ...config, historyContext: null });
 * ```
 *
 * Findings are review prompts; nothing here modifies the scanned repository.
 *
 * @packageDocumentation
 */

// ============================================================================
// TYPES
// ============================================================================

export type {
  ExtractionPath,
  CodeEntity,
  ConfidenceTier,
  DuplicationPair,
  ProvenanceSignal,
  GitEvidence,
  RuntimeEvidenceSource,
  RuntimeEvidence,
  FindingType,
  FindingSeverity,
  Finding,
  AnalysisSummary,
  SummaryMetric,
  CoreAnalysis,
  AnalysisResult,
} from './types.js';

// ============================================================================
// ENTRY POINTS
// ============================================================================

export {
  analyze,
  analyzeRepository,
  resolveAnalyzeOptions,
  type AnalyzeOptions,
  type AnalyzeRepositoryOptions,
  type ResolvedAnalyzeOptions,
} from './api/analyze.js';

// ============================================================================
// COMPONENTS
// ============================================================================

export { scanRepository, computeEntityId, type ScanOptions } from './ingest/repository_scanner.js';
export { TsSourceParser, TypeScriptExtractor } from './ingest/ts_extractor.js';
export { LexicalExtractor, findLexicalFunctions } from './ingest/lexical_extractor.js';
export { listSourceFiles } from './ingest/file_walker.js';
export {
  collectGitEvidence,
  GitCli,
  type VersionControl,
  type FileCommit,
  type LineAttribution,
} from './ingest/git_evidence.js';
export { canonicalSignature, canonicalTokens } from './analysis/canonical_signature.js';
export { detectDuplicationPairs, DUPLICATION_DEFAULTS, type DuplicationOptions } from './analysis/duplication_detector.js';
export {
  detectAiSignals,
  scoreFeatures,
  DEFAULT_PROVENANCE_THRESHOLD,
  type ProvenanceOptions,
} from './analysis/provenance_scorer.js';
export { extractFeatures, type FunctionFeatures } from './analysis/function_features.js';
export { correlateFindings, estimateAnnualCost } from './analysis/findings.js';
export {
  loadRuntimeIndex,
  parseRuntimeIndex,
  mapRuntimeEvidence,
  type RuntimeIndex,
  type RuntimeRecord,
} from './runtime/runtime_evidence.js';

// ============================================================================
// CONFIG, HISTORY, REPORTS
// ============================================================================

export {
  resolveAnalysisConfig,
  validateAnalysisConfig,
  resolveOutputPath,
  DEFAULT_ANALYSIS_CONFIG,
  type AnalysisConfig,
  type AnalysisConfigOverrides,
  type ReportFormat,
} from './config/analysis_config.js';
export { recordRun, countRuns, type HistoryContext, type RunTrend } from './storage/history_store.js';
export { buildMarkdownReport, type ReportContext } from './reports/markdown_report.js';
export { buildJsonReport, renderJsonReport, type JsonReport } from './reports/json_report.js';

// ============================================================================
// ERRORS + LOGGING
// ============================================================================

export {
  ProvenanceAuditError,
  ConfigurationError,
  HistoryStoreError,
  isProvenanceAuditError,
  isConfigurationError,
} from './core/errors.js';
export { setVerboseLogging } from './telemetry/logger.js';

// ============================================================================
// VERSION
// ============================================================================

export const PROVENANCE_AUDIT_VERSION = {
  major: 0,
  minor: 3,
  patch: 0,
  string: '0.3.0',
} as const;
