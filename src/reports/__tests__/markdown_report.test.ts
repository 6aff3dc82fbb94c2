/**
 * Tests for the Markdown diagnostic report
 */

import { describe, it, expect } from 'vitest';
import type { Finding } from '../../types.js';
import { buildMarkdownReport, formatCurrency } from '../markdown_report.js';
import {
  CONSOLIDATION,
  GENERATED_AT,
  ORDERS_ENTITY,
  SECOND_RUN,
  analysisResult,
  summary,
} from './report_fixtures.js';

const CONTEXT = { repoPath: '/srv/shop', timeWindowDays: 90, currency: 'USD', generatedAt: GENERATED_AT };

describe('buildMarkdownReport', () => {
  it('should render every section of a first-run report', () => {
    expect(buildMarkdownReport(analysisResult(), CONTEXT)).toBe(
      [
        '# Software Intelligence Waste Diagnostic',
        '',
        '## Scope',
        '- Repository: `/srv/shop`',
        '- Generated at: `2026-03-01 09:15:00Z`',
        '- Runtime window: `90` days',
        '',
        '## Executive Truth Summary',
        '- Functions scanned: **2**',
        '- Probable AI-generated functions: **2**',
        '- High-confidence duplicate pairs: **1**',
        '- Probable AI functions with zero runtime invocations: **0**',
        '- Git provenance coverage: **0**',
        '- Estimated annualized avoidable runtime cost: **USD 0.16**',
        '',
        '## Waste Taxonomy Mapping',
        '| Category | Instances | Economic signal |',
        '| --- | ---: | --- |',
        '| Structural duplication | 1 | Consolidation may reduce repeated execution and maintenance. |',
        '| Runtime unused paths | 0 | Unused paths carry maintenance burden without runtime value. |',
        '| Probable AI + runtime unused | 0 | Candidate area for delete/consolidate review. |',
        '| Runtime ambiguity | 0 | No decision without mapped runtime evidence. |',
        '',
        '## Evidence Snapshots',
        '1. **High-overlap active duplicate logic (human review required)**',
        '   - Type: `consolidation_candidate_review`',
        '   - Severity: `medium`',
        '   - Entities: `src/orders.ts:11`, `src/orders.ts:29`',
        '   - Evidence: semantic_overlap=1; invocations_a=40; invocations_b=1200',
        '   - Estimated annual cost: USD 0.16',
        '',
        '## Method Constraints',
        '- Diagnostic only: no code mutation, no auto-refactor.',
        '- AI provenance is heuristic probability, not authorship proof.',
        '- Runtime mapping is best-effort; ambiguous mappings stay unresolved.',
        '',
      ].join('\n'),
    );
  });

  it('should explain an uncalculated cost and an empty evidence list', () => {
    const report = buildMarkdownReport(
      analysisResult({ findings: [], summary: summary({ estimatedAnnualizedAvoidableRuntimeCost: 0 }) }),
      CONTEXT,
    );
    expect(report).toContain(
      '- Estimated annualized avoidable runtime cost: **Not calculated (set --cost-per-invocation to enable)**\n',
    );
    expect(report).toContain('## Evidence Snapshots\n- No high-confidence findings met report thresholds.\n\n## Method Constraints');
  });

  it('should add the trend section after a previous run', () => {
    const report = buildMarkdownReport(analysisResult(), { ...CONTEXT, historyContext: SECOND_RUN });
    expect(report).toContain(
      [
        '## Trend vs Previous Run',
        '- Previous run: `2026-02-20 08:00:00Z`',
        '- Functions scanned delta: **+2**',
        '- Probable AI functions delta: **-1**',
        '- High-confidence duplicate pairs delta: **+0**',
        '- Runtime zero-invocation delta: **+0**',
        '- Estimated annualized avoidable runtime cost delta: **USD -0.50**',
        '',
        '## Waste Taxonomy Mapping',
      ].join('\n'),
    );
  });

  it('should sign a rising cost delta like the count deltas', () => {
    const rising = {
      ...SECOND_RUN,
      trend: {
        functionsScanned: 0,
        probableAiFunctions: 0,
        highConfidenceDuplicationPairs: 0,
        runtimeZeroInvocations: 0,
        probableAiZeroInvocations: 0,
        estimatedAnnualizedAvoidableRuntimeCost: 1234.5,
      },
    };
    const report = buildMarkdownReport(analysisResult(), { ...CONTEXT, historyContext: rising });
    expect(report).toContain('- Estimated annualized avoidable runtime cost delta: **USD +1,234.50**\n');
  });

  it('should leave the trend out for a first recorded run', () => {
    const firstRun = { ...SECOND_RUN, runId: 1, previousRunId: null, previousScannedAt: null, trend: null };
    expect(buildMarkdownReport(analysisResult(), { ...CONTEXT, historyContext: firstRun })).not.toContain('## Trend');
  });

  it('should list partial duplication only when there is some', () => {
    const report = buildMarkdownReport(analysisResult({ summary: summary({ mediumConfidenceDuplicationPairs: 3 }) }), CONTEXT);
    expect(report).toContain(
      '| Structural duplication | 1 | Consolidation may reduce repeated execution and maintenance. |\n' +
        '| Partial duplication | 3 | Medium overlap; review before treating as duplicate. |\n',
    );
  });

  it('should cap the evidence snapshots at twenty', () => {
    const findings: Finding[] = Array.from({ length: 25 }, () => ({ ...CONSOLIDATION, estimatedAnnualCost: null }));
    const report = buildMarkdownReport(analysisResult({ findings }), CONTEXT);
    expect(report).toContain('\n20. **High-overlap');
    expect(report).not.toContain('\n21. **');
  });

  it('should fall back to the entity id for unknown entities', () => {
    const finding: Finding = { ...CONSOLIDATION, entityIds: [ORDERS_ENTITY.entityId, 'ffffffffffff'] };
    const report = buildMarkdownReport(analysisResult({ findings: [finding] }), CONTEXT);
    expect(report).toContain('   - Entities: `src/orders.ts:11`, `ffffffffffff`\n');
  });
});

describe('formatCurrency', () => {
  it('should use two decimals and thousands separators', () => {
    expect(formatCurrency(1234.5, 'EUR')).toBe('EUR 1,234.50');
    expect(formatCurrency(0, 'USD')).toBe('USD 0.00');
  });
});
