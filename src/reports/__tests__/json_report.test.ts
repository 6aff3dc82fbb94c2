/**
 * Tests for the JSON diagnostic report
 */

import { describe, it, expect } from 'vitest';
import { buildJsonReport, renderJsonReport } from '../json_report.js';
import { GENERATED_AT, ORDERS_ENTITY, PAYLOAD_ENTITY, SECOND_RUN, analysisResult } from './report_fixtures.js';

const CONTEXT = { repoPath: '/srv/shop', timeWindowDays: 30, currency: 'EUR', generatedAt: GENERATED_AT };

describe('buildJsonReport', () => {
  it('should describe the run without history', () => {
    const report = buildJsonReport(analysisResult(), CONTEXT);
    expect(report.meta).toEqual({
      repository: '/srv/shop',
      generatedAt: '2026-03-01 09:15:00Z',
      timeWindowDays: 30,
      currency: 'EUR',
      runId: null,
      previousRunId: null,
      previousScannedAt: null,
    });
    expect(report.trend).toBeNull();
  });

  it('should list entities without their source text', () => {
    const [first] = buildJsonReport(analysisResult(), CONTEXT).entities;
    expect(first).toEqual({
      entityId: ORDERS_ENTITY.entityId,
      filePath: 'src/orders.ts',
      functionName: 'validateOrderRequest',
      qualifiedName: 'src.orders.validateOrderRequest',
      startLine: 11,
      endLine: 27,
      extraction: 'ast',
    });
  });

  it('should flatten evidence maps in entity scan order', () => {
    const report = buildJsonReport(analysisResult(), CONTEXT);
    expect(report.runtimeEvidence.map((evidence) => evidence.entityId)).toEqual([
      ORDERS_ENTITY.entityId,
      PAYLOAD_ENTITY.entityId,
    ]);
    expect(report.gitEvidence).toEqual([]);
  });

  it('should carry history identifiers and the trend', () => {
    const report = buildJsonReport(analysisResult(), { ...CONTEXT, historyContext: SECOND_RUN });
    expect(report.meta.runId).toBe(2);
    expect(report.meta.previousRunId).toBe(1);
    expect(report.meta.previousScannedAt).toBe('2026-02-20 08:00:00Z');
    expect(report.trend).toEqual(SECOND_RUN.trend);
  });
});

describe('renderJsonReport', () => {
  it('should pretty-print with a trailing newline and parse back', () => {
    const text = renderJsonReport(buildJsonReport(analysisResult(), CONTEXT));
    expect(text.endsWith('}\n')).toBe(true);
    expect(text.split('\n')[1]).toBe('  "meta": {');
    expect(JSON.parse(text).summary.estimatedAnnualizedAvoidableRuntimeCost).toBe(0.16);
  });
});
