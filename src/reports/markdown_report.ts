/**
 * @fileoverview Markdown diagnostic report
 */

import * as path from 'node:path';
import type { AnalysisResult, CodeEntity } from '../types.js';
import type { HistoryContext } from '../storage/history_store.js';
import { formatScannedAt } from '../storage/history_store.js';

export interface ReportContext {
  repoPath: string;
  timeWindowDays: number;
  currency: string;
  historyContext?: HistoryContext | null;
  /** Defaults to the current time. */
  generatedAt?: Date;
}

export const MAX_EVIDENCE_SNAPSHOTS = 20;

// ============================================================================
// FORMATTING
// ============================================================================

function formatAmount(value: number): string {
  return value.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
}

export function formatCurrency(value: number, currency: string): string {
  return `${currency} ${formatAmount(value)}`;
}

function signed(value: number): string {
  return value < 0 ? String(value) : `+${value}`;
}

function signedCurrency(value: number, currency: string): string {
  return `${currency} ${value < 0 ? '-' : '+'}${formatAmount(Math.abs(value))}`;
}

export function entityReference(entityById: ReadonlyMap<string, CodeEntity>, entityId: string): string {
  const entity = entityById.get(entityId);
  return entity ? `${entity.filePath}:${entity.startLine}` : entityId;
}

// ============================================================================
// SECTIONS
// ============================================================================

function trendSection(history: HistoryContext | null | undefined, currency: string): string[] {
  if (!history?.trend || !history.previousScannedAt) return [];
  const { trend } = history;
  return [
    '## Trend vs Previous Run',
    `- Previous run: \`${history.previousScannedAt}\``,
    `- Functions scanned delta: **${signed(trend.functionsScanned)}**`,
    `- Probable AI functions delta: **${signed(trend.probableAiFunctions)}**`,
    `- High-confidence duplicate pairs delta: **${signed(trend.highConfidenceDuplicationPairs)}**`,
    `- Runtime zero-invocation delta: **${signed(trend.runtimeZeroInvocations)}**`,
    `- Estimated annualized avoidable runtime cost delta: **${signedCurrency(
      trend.estimatedAnnualizedAvoidableRuntimeCost,
      currency,
    )}**`,
    '',
  ];
}

function evidenceSection(result: AnalysisResult, currency: string): string[] {
  const lines = ['## Evidence Snapshots'];
  if (result.findings.length === 0) {
    lines.push('- No high-confidence findings met report thresholds.');
    return lines;
  }

  const entityById = new Map(result.entities.map((entity) => [entity.entityId, entity]));
  result.findings.slice(0, MAX_EVIDENCE_SNAPSHOTS).forEach((finding, index) => {
    lines.push(`${index + 1}. **${finding.title}**`);
    lines.push(`   - Type: \`${finding.findingType}\``);
    lines.push(`   - Severity: \`${finding.severity}\``);
    if (finding.entityIds.length > 0) {
      const refs = finding.entityIds.map((id) => `\`${entityReference(entityById, id)}\``).join(', ');
      lines.push(`   - Entities: ${refs}`);
    }
    if (finding.evidence.length > 0) {
      lines.push(`   - Evidence: ${finding.evidence.join('; ')}`);
    }
    if (finding.estimatedAnnualCost !== null) {
      lines.push(`   - Estimated annual cost: ${formatCurrency(finding.estimatedAnnualCost, currency)}`);
    }
  });
  return lines;
}

// ============================================================================
// REPORT
// ============================================================================

export function buildMarkdownReport(result: AnalysisResult, context: ReportContext): string {
  const { summary } = result;
  const generatedAt = formatScannedAt(context.generatedAt ?? new Date());
  const cost = summary.estimatedAnnualizedAvoidableRuntimeCost;
  const costText = cost > 0
    ? formatCurrency(cost, context.currency)
    : 'Not calculated (set --cost-per-invocation to enable)';

  const taxonomy = [
    `| Structural duplication | ${summary.highConfidenceDuplicationPairs} | Consolidation may reduce repeated execution and maintenance. |`,
  ];
  if (summary.mediumConfidenceDuplicationPairs > 0) {
    taxonomy.push(
      `| Partial duplication | ${summary.mediumConfidenceDuplicationPairs} | Medium overlap; review before treating as duplicate. |`,
    );
  }
  taxonomy.push(
    `| Runtime unused paths | ${summary.runtimeZeroInvocations} | Unused paths carry maintenance burden without runtime value. |`,
    `| Probable AI + runtime unused | ${summary.probableAiZeroInvocations} | Candidate area for delete/consolidate review. |`,
    `| Runtime ambiguity | ${summary.runtimeUnknown} | No decision without mapped runtime evidence. |`,
  );

  const lines = [
    '# Software Intelligence Waste Diagnostic',
    '',
    '## Scope',
    `- Repository: \`${path.resolve(context.repoPath)}\``,
    `- Generated at: \`${generatedAt}\``,
    `- Runtime window: \`${context.timeWindowDays}\` days`,
    '',
    '## Executive Truth Summary',
    `- Functions scanned: **${summary.functionsScanned}**`,
    `- Probable AI-generated functions: **${summary.probableAiFunctions}**`,
    `- High-confidence duplicate pairs: **${summary.highConfidenceDuplicationPairs}**`,
    `- Probable AI functions with zero runtime invocations: **${summary.probableAiZeroInvocations}**`,
    `- Git provenance coverage: **${summary.gitEvidenceAvailable}**`,
    `- Estimated annualized avoidable runtime cost: **${costText}**`,
    '',
    ...trendSection(context.historyContext, context.currency),
    '## Waste Taxonomy Mapping',
    '| Category | Instances | Economic signal |',
    '| --- | ---: | --- |',
    ...taxonomy,
    '',
    ...evidenceSection(result, context.currency),
    '',
    '## Method Constraints',
    '- Diagnostic only: no code mutation, no auto-refactor.',
    '- AI provenance is heuristic probability, not authorship proof.',
    '- Runtime mapping is best-effort; ambiguous mappings stay unresolved.',
  ];

  return `${lines.join('\n')}\n`;
}
