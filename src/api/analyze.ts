/**
 * @fileoverview Analysis entry points
 *
 * `analyze` is the synchronous core: scanner, duplication detector,
 * provenance scorer and git evidence over one repository root.
 * `analyzeRepository` wraps it with runtime evidence and findings
 * correlation for a resolved {@link AnalysisConfig}.
 */

import { statSync } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { AnalysisResult, CoreAnalysis, GitEvidence } from '../types.js';
import type { AnalysisConfig } from '../config/analysis_config.js';
import { scanRepository } from '../ingest/repository_scanner.js';
import { TsSourceParser } from '../ingest/ts_extractor.js';
import { collectGitEvidence, type VersionControl } from '../ingest/git_evidence.js';
import { detectDuplicationPairs, DUPLICATION_DEFAULTS } from '../analysis/duplication_detector.js';
import { detectAiSignals, DEFAULT_PROVENANCE_THRESHOLD } from '../analysis/provenance_scorer.js';
import { correlateFindings } from '../analysis/findings.js';
import { loadRuntimeIndex, mapRuntimeEvidence } from '../runtime/runtime_evidence.js';
import { ConfigurationError } from '../utils/errors.js';
import { logDebug, logInfo } from '../telemetry/logger.js';

// ============================================================================
// OPTIONS
// ============================================================================

export interface AnalyzeOptions {
  includeTests?: boolean;
  duplication?: {
    highThreshold?: number;
    mediumThreshold?: number;
    includeMedium?: boolean;
    minSignatureChars?: number;
  };
  minBodyStatements?: number;
  provenanceThreshold?: number;
  gitEvidenceEnabled?: boolean;
  /** Replaces the git CLI; used by tests and embedders. */
  versionControl?: VersionControl;
  /** Reference time for commit age. */
  now?: Date;
}

const threshold = z.number().finite().min(0).max(1);

const AnalyzeOptionsSchema = z
  .object({
    includeTests: z.boolean().default(false),
    duplication: z
      .object({
        highThreshold: threshold.default(DUPLICATION_DEFAULTS.highThreshold),
        mediumThreshold: threshold.default(DUPLICATION_DEFAULTS.mediumThreshold),
        includeMedium: z.boolean().default(DUPLICATION_DEFAULTS.includeMedium),
        minSignatureChars: z.number().int().nonnegative().default(DUPLICATION_DEFAULTS.minSignatureChars),
      })
      .default({}),
    minBodyStatements: z.number().int().nonnegative().default(DUPLICATION_DEFAULTS.minBodyStatements),
    provenanceThreshold: threshold.default(DEFAULT_PROVENANCE_THRESHOLD),
    gitEvidenceEnabled: z.boolean().default(true),
  })
  .superRefine((options, ctx) => {
    if (options.duplication.mediumThreshold > options.duplication.highThreshold) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['duplication', 'mediumThreshold'],
        message: 'must not exceed highThreshold',
      });
    }
  });

export type ResolvedAnalyzeOptions = z.infer<typeof AnalyzeOptionsSchema>;

/**
 * Validate thresholds and the root before any scanning starts.
 */
export function resolveAnalyzeOptions(root: string, options: AnalyzeOptions): ResolvedAnalyzeOptions {
  const parsed = AnalyzeOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ConfigurationError(
      'Invalid analysis options',
      parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  assertDirectory(root);
  return parsed.data;
}

function assertDirectory(root: string): void {
  const stats = statSync(root, { throwIfNoEntry: false });
  if (!stats) {
    throw new ConfigurationError(`Repository root does not exist: ${root}`);
  }
  if (!stats.isDirectory()) {
    throw new ConfigurationError(`Repository root is not a directory: ${root}`);
  }
}

// ============================================================================
// CORE
// ============================================================================

/**
 * Scan `root` and run the duplication detector and provenance scorer over
 * the entities. Deterministic for a fixed repository state and `now`.
 */
export function analyze(root: string, options: AnalyzeOptions = {}): CoreAnalysis {
  const resolved = resolveAnalyzeOptions(root, options);
  const resolvedRoot = path.resolve(root);
  const parser = new TsSourceParser();

  const entities = scanRepository(resolvedRoot, { includeTests: resolved.includeTests, parser });
  logDebug('[analyze] Scan complete', { root: resolvedRoot, entities: entities.length });

  const gitEvidence: Map<string, GitEvidence> = resolved.gitEvidenceEnabled
    ? collectGitEvidence(resolvedRoot, entities, { versionControl: options.versionControl, now: options.now })
    : new Map();

  const aiSignals = detectAiSignals(entities, {
    threshold: resolved.provenanceThreshold,
    gitEvidence,
    parser,
  });

  const duplicationPairs = detectDuplicationPairs(entities, {
    highThreshold: resolved.duplication.highThreshold,
    mediumThreshold: resolved.duplication.mediumThreshold,
    includeMedium: resolved.duplication.includeMedium,
    minSignatureChars: resolved.duplication.minSignatureChars,
    minBodyStatements: resolved.minBodyStatements,
    parser,
  });

  return { entities, aiSignals, duplicationPairs, gitEvidence };
}

// ============================================================================
// FULL ENGINE
// ============================================================================

export interface AnalyzeRepositoryOptions {
  versionControl?: VersionControl;
  now?: Date;
}

/**
 * Core analysis plus runtime evidence, findings and summary.
 * The runtime file is read before scanning so a bad path fails fast.
 */
export function analyzeRepository(config: AnalysisConfig, options: AnalyzeRepositoryOptions = {}): AnalysisResult {
  const runtimeIndex = loadRuntimeIndex(config.runtimePath);

  const core = analyze(config.repoPath, {
    includeTests: config.includeTests,
    duplication: {
      highThreshold: config.dupThreshold,
      mediumThreshold: config.dupMediumThreshold,
      includeMedium: config.includeMediumDuplicates,
      minSignatureChars: config.minDupSignatureChars,
    },
    minBodyStatements: config.minDupBodyStatements,
    provenanceThreshold: config.aiThreshold,
    gitEvidenceEnabled: config.gitEvidence,
    versionControl: options.versionControl,
    now: options.now,
  });

  const runtimeEvidence = mapRuntimeEvidence(core.entities, runtimeIndex);
  const { findings, summary } = correlateFindings({
    ...core,
    runtimeEvidence,
    timeWindowDays: config.timeWindowDays,
    costPerInvocation: config.costPerInvocation,
  });

  logInfo('[analyze] Analysis complete', {
    functionsScanned: summary.functionsScanned,
    probableAiFunctions: summary.probableAiFunctions,
    duplicationPairs: core.duplicationPairs.length,
    findings: findings.length,
  });

  return { ...core, runtimeEvidence, findings, summary };
}
