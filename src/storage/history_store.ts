/**
 * @fileoverview SQLite run history and trend deltas
 *
 * One row per analysis run plus per-type finding counts. Runs are grouped
 * by repository key (resolved path, lower-cased) so the trend always
 * compares against the previous run of the same repository.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { AnalysisSummary, Finding, FindingType } from '../types.js';
import type { AnalysisConfig } from '../config/analysis_config.js';
import { HistoryStoreError, getErrorMessage, type HistoryOperation } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export const TREND_METRICS = [
  'functionsScanned',
  'probableAiFunctions',
  'highConfidenceDuplicationPairs',
  'runtimeZeroInvocations',
  'probableAiZeroInvocations',
  'estimatedAnnualizedAvoidableRuntimeCost',
] as const;

export type TrendMetric = (typeof TREND_METRICS)[number];

/** Integer deltas for counts, a 2-decimal delta for cost. */
export type RunTrend = Record<TrendMetric, number>;

export type HistoryConfig = Pick<
  AnalysisConfig,
  'aiThreshold' | 'dupThreshold' | 'minDupBodyStatements' | 'minDupSignatureChars' | 'includeTests' | 'gitEvidence'
>;

export interface RecordRunInput {
  dbPath: string;
  repoPath: string;
  summary: AnalysisSummary;
  findings: readonly Finding[];
  config: HistoryConfig;
  /** Defaults to the current time. */
  scannedAt?: Date;
}

export interface HistoryContext {
  runId: number;
  scannedAt: string;
  previousRunId: number | null;
  previousScannedAt: string | null;
  trend: RunTrend | null;
}

type MetricColumn =
  | 'functions_scanned'
  | 'probable_ai_functions'
  | 'high_confidence_duplication_pairs'
  | 'runtime_zero_invocations'
  | 'probable_ai_zero_invocations'
  | 'estimated_annualized_avoidable_runtime_cost';

const COLUMN_BY_METRIC: Record<TrendMetric, MetricColumn> = {
  functionsScanned: 'functions_scanned',
  probableAiFunctions: 'probable_ai_functions',
  highConfidenceDuplicationPairs: 'high_confidence_duplication_pairs',
  runtimeZeroInvocations: 'runtime_zero_invocations',
  probableAiZeroInvocations: 'probable_ai_zero_invocations',
  estimatedAnnualizedAvoidableRuntimeCost: 'estimated_annualized_avoidable_runtime_cost',
};

const PreviousRunRowSchema = z.object({
  id: z.number().int(),
  scanned_at: z.string(),
  functions_scanned: z.number(),
  probable_ai_functions: z.number(),
  high_confidence_duplication_pairs: z.number(),
  runtime_zero_invocations: z.number(),
  probable_ai_zero_invocations: z.number(),
  estimated_annualized_avoidable_runtime_cost: z.number(),
});

type PreviousRunRow = z.infer<typeof PreviousRunRowSchema>;

const TableInfoRowSchema = z.object({ name: z.string() });

// ============================================================================
// SCHEMA
// ============================================================================

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS runs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    repo_key TEXT NOT NULL,
    repo_path TEXT NOT NULL,
    scanned_at TEXT NOT NULL,
    functions_scanned INTEGER NOT NULL,
    probable_ai_functions INTEGER NOT NULL,
    high_confidence_duplication_pairs INTEGER NOT NULL,
    runtime_zero_invocations INTEGER NOT NULL,
    probable_ai_zero_invocations INTEGER NOT NULL,
    estimated_annualized_avoidable_runtime_cost REAL NOT NULL,
    ai_threshold REAL NOT NULL,
    dup_threshold REAL NOT NULL,
    min_dup_body_statements INTEGER NOT NULL
  );

  CREATE TABLE IF NOT EXISTS finding_counts (
    run_id INTEGER NOT NULL,
    finding_type TEXT NOT NULL,
    finding_count INTEGER NOT NULL,
    PRIMARY KEY (run_id, finding_type),
    FOREIGN KEY (run_id) REFERENCES runs(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_runs_repo_key_id ON runs(repo_key, id);
`;

/** Columns added after the first schema version; applied to older databases in place. */
const ADDITIVE_COLUMNS: ReadonlyArray<{ table: string; column: string; definition: string }> = [
  { table: 'runs', column: 'min_dup_signature_chars', definition: 'INTEGER NOT NULL DEFAULT 0' },
  { table: 'runs', column: 'include_tests', definition: 'INTEGER NOT NULL DEFAULT 0' },
  { table: 'runs', column: 'git_evidence_enabled', definition: 'INTEGER NOT NULL DEFAULT 1' },
];

function ensureColumn(db: Database.Database, table: string, column: string, definition: string): void {
  const columns = db
    .prepare(`PRAGMA table_info(${table})`)
    .all()
    .map((row) => TableInfoRowSchema.parse(row).name);
  if (columns.includes(column)) return;
  db.prepare(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`).run();
}

function initializeSchema(db: Database.Database): void {
  db.exec(SCHEMA_SQL);
  for (const { table, column, definition } of ADDITIVE_COLUMNS) {
    ensureColumn(db, table, column, definition);
  }
}

// ============================================================================
// HELPERS
// ============================================================================

export function repoKey(repoPath: string): string {
  return path.resolve(repoPath).toLowerCase();
}

/** `YYYY-MM-DD HH:MM:SSZ` in UTC. */
export function formatScannedAt(date: Date): string {
  return `${date.toISOString().slice(0, 19).replace('T', ' ')}Z`;
}

export function computeTrend(summary: AnalysisSummary, previous: PreviousRunRow): RunTrend {
  const delta = (metric: TrendMetric): number => summary[metric] - previous[COLUMN_BY_METRIC[metric]];
  return {
    functionsScanned: Math.trunc(delta('functionsScanned')),
    probableAiFunctions: Math.trunc(delta('probableAiFunctions')),
    highConfidenceDuplicationPairs: Math.trunc(delta('highConfidenceDuplicationPairs')),
    runtimeZeroInvocations: Math.trunc(delta('runtimeZeroInvocations')),
    probableAiZeroInvocations: Math.trunc(delta('probableAiZeroInvocations')),
    estimatedAnnualizedAvoidableRuntimeCost:
      Math.round(delta('estimatedAnnualizedAvoidableRuntimeCost') * 100) / 100,
  };
}

function countFindings(findings: readonly Finding[]): Map<FindingType, number> {
  const counts = new Map<FindingType, number>();
  for (const finding of findings) {
    counts.set(finding.findingType, (counts.get(finding.findingType) ?? 0) + 1);
  }
  return counts;
}

// ============================================================================
// RECORDING
// ============================================================================

function openDatabase(dbPath: string): Database.Database {
  try {
    mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
    const db = new Database(dbPath);
    db.pragma('foreign_keys = ON');
    return db;
  } catch (error) {
    throw new HistoryStoreError('open', getErrorMessage(error), dbPath);
  }
}

function withStage<T>(stage: HistoryOperation, dbPath: string, run: () => T): T {
  try {
    return run();
  } catch (error) {
    if (error instanceof HistoryStoreError) throw error;
    throw new HistoryStoreError(stage, getErrorMessage(error), dbPath);
  }
}

/**
 * Insert the run and its finding counts in one transaction and return the
 * trend against the previous run of the same repository.
 */
export function recordRun(input: RecordRunInput): HistoryContext {
  const key = repoKey(input.repoPath);
  const scannedAt = formatScannedAt(input.scannedAt ?? new Date());
  const db = openDatabase(input.dbPath);

  try {
    withStage('migrate', input.dbPath, () => initializeSchema(db));

    const insertRun = db.prepare(`
      INSERT INTO runs (
        repo_key, repo_path, scanned_at,
        functions_scanned, probable_ai_functions, high_confidence_duplication_pairs,
        runtime_zero_invocations, probable_ai_zero_invocations,
        estimated_annualized_avoidable_runtime_cost,
        ai_threshold, dup_threshold, min_dup_body_statements,
        min_dup_signature_chars, include_tests, git_evidence_enabled
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    const insertCount = db.prepare(
      'INSERT INTO finding_counts (run_id, finding_type, finding_count) VALUES (?, ?, ?)',
    );
    const selectPrevious = db.prepare(`
      SELECT id, scanned_at, functions_scanned, probable_ai_functions,
             high_confidence_duplication_pairs, runtime_zero_invocations,
             probable_ai_zero_invocations, estimated_annualized_avoidable_runtime_cost
      FROM runs
      WHERE repo_key = ? AND id < ?
      ORDER BY id DESC
      LIMIT 1
    `);

    const record = db.transaction((): { runId: number; previous: PreviousRunRow | null } => {
      const { summary, config } = input;
      const info = insertRun.run(
        key,
        path.resolve(input.repoPath),
        scannedAt,
        summary.functionsScanned,
        summary.probableAiFunctions,
        summary.highConfidenceDuplicationPairs,
        summary.runtimeZeroInvocations,
        summary.probableAiZeroInvocations,
        summary.estimatedAnnualizedAvoidableRuntimeCost,
        config.aiThreshold,
        config.dupThreshold,
        config.minDupBodyStatements,
        config.minDupSignatureChars,
        config.includeTests ? 1 : 0,
        config.gitEvidence ? 1 : 0,
      );
      const runId = Number(info.lastInsertRowid);

      for (const [findingType, count] of countFindings(input.findings)) {
        insertCount.run(runId, findingType, count);
      }

      const row = selectPrevious.get(key, runId);
      return { runId, previous: row === undefined ? null : PreviousRunRowSchema.parse(row) };
    });

    const { runId, previous } = withStage('write', input.dbPath, () => record());

    return {
      runId,
      scannedAt,
      previousRunId: previous?.id ?? null,
      previousScannedAt: previous?.scanned_at ?? null,
      trend: previous ? computeTrend(input.summary, previous) : null,
    };
  } finally {
    db.close();
  }
}

/**
 * Number of runs recorded for a repository.
 */
export function countRuns(dbPath: string, repoPath: string): number {
  const db = openDatabase(dbPath);
  try {
    return withStage('read', dbPath, () => {
      initializeSchema(db);
      const row = db.prepare('SELECT COUNT(*) AS total FROM runs WHERE repo_key = ?').get(repoKey(repoPath));
      return z.object({ total: z.number() }).parse(row).total;
    });
  } finally {
    db.close();
  }
}
