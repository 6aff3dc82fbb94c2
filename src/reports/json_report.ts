/**
 * @fileoverview JSON diagnostic report
 *
 * Machine-readable counterpart of the Markdown report. Entities are listed
 * without their source text; evidence maps are flattened to arrays in
 * entity scan order.
 */

import * as path from 'node:path';
import type {
  AnalysisSummary,
  CodeEntity,
  DuplicationPair,
  Finding,
  GitEvidence,
  ProvenanceSignal,
  RuntimeEvidence,
  AnalysisResult,
} from '../types.js';
import type { HistoryContext, RunTrend } from '../storage/history_store.js';
import { formatScannedAt } from '../storage/history_store.js';
import type { ReportContext } from './markdown_report.js';

export interface JsonReportMeta {
  repository: string;
  generatedAt: string;
  timeWindowDays: number;
  currency: string;
  runId: number | null;
  previousRunId: number | null;
  previousScannedAt: string | null;
}

export type EntitySummary = Omit<CodeEntity, 'source'>;

export interface JsonReport {
  meta: JsonReportMeta;
  summary: AnalysisSummary;
  trend: RunTrend | null;
  entities: EntitySummary[];
  aiSignals: readonly ProvenanceSignal[];
  duplicationPairs: readonly DuplicationPair[];
  gitEvidence: GitEvidence[];
  runtimeEvidence: RuntimeEvidence[];
  findings: readonly Finding[];
}

function withoutSource({ source: _source, ...rest }: CodeEntity): EntitySummary {
  return rest;
}

function inScanOrder<T>(entities: readonly CodeEntity[], evidence: ReadonlyMap<string, T>): T[] {
  const ordered: T[] = [];
  for (const entity of entities) {
    const item = evidence.get(entity.entityId);
    if (item !== undefined) ordered.push(item);
  }
  return ordered;
}

export function buildJsonReport(result: AnalysisResult, context: ReportContext): JsonReport {
  const history: HistoryContext | null = context.historyContext ?? null;
  return {
    meta: {
      repository: path.resolve(context.repoPath),
      generatedAt: formatScannedAt(context.generatedAt ?? new Date()),
      timeWindowDays: context.timeWindowDays,
      currency: context.currency,
      runId: history?.runId ?? null,
      previousRunId: history?.previousRunId ?? null,
      previousScannedAt: history?.previousScannedAt ?? null,
    },
    summary: result.summary,
    trend: history?.trend ?? null,
    entities: result.entities.map(withoutSource),
    aiSignals: result.aiSignals,
    duplicationPairs: result.duplicationPairs,
    gitEvidence: inScanOrder(result.entities, result.gitEvidence),
    runtimeEvidence: inScanOrder(result.entities, result.runtimeEvidence),
    findings: result.findings,
  };
}

export function renderJsonReport(report: JsonReport): string {
  return `${JSON.stringify(report, null, 2)}\n`;
}
