/**
 * @fileoverview Analyze Command
 *
 * Scans a repository, correlates runtime evidence, optionally records the
 * run in the history database, and writes a Markdown or JSON report.
 *
 * Usage:
 *   provenance-audit analyze [--repo <path>] [--runtime <file>] [--format markdown|json]
 *
 * @packageDocumentation
 */

import { parseArgs } from 'node:util';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { analyzeRepository } from '../../api/analyze.js';
import {
  resolveAnalysisConfig,
  resolveOutputPath,
  type AnalysisConfig,
  type AnalysisConfigOverrides,
} from '../../config/analysis_config.js';
import { recordRun, type HistoryContext } from '../../storage/history_store.js';
import { buildMarkdownReport } from '../../reports/markdown_report.js';
import { buildJsonReport, renderJsonReport } from '../../reports/json_report.js';
import type { VersionControl } from '../../ingest/git_evidence.js';
import type { AnalysisResult } from '../../types.js';
import { setVerboseLogging, logDebug } from '../../telemetry/logger.js';
import { getErrorMessage } from '../../utils/errors.js';
import { createError } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

export interface AnalyzeCommandOptions {
  args: string[];
  env?: NodeJS.ProcessEnv;
  /** Summary line sink; defaults to stdout. */
  print?: (line: string) => void;
  versionControl?: VersionControl;
  now?: Date;
}

export interface AnalyzeCommandResult {
  reportPath: string;
  result: AnalysisResult;
  history: HistoryContext | null;
}

const ANALYZE_OPTIONS = {
  repo: { type: 'string' },
  runtime: { type: 'string' },
  'time-window-days': { type: 'string' },
  'cost-per-invocation': { type: 'string' },
  'ai-threshold': { type: 'string' },
  'dup-threshold': { type: 'string' },
  'dup-medium-threshold': { type: 'string' },
  'include-medium-duplicates': { type: 'boolean' },
  'min-dup-body-statements': { type: 'string' },
  'min-dup-signature-chars': { type: 'string' },
  'include-tests': { type: 'boolean' },
  'no-git-evidence': { type: 'boolean' },
  currency: { type: 'string' },
  format: { type: 'string' },
  output: { type: 'string' },
  'history-db': { type: 'string' },
  config: { type: 'string' },
  verbose: { type: 'boolean' },
} as const;

// ============================================================================
// Argument parsing
// ============================================================================

function parseAnalyzeArgs(args: string[]) {
  try {
    return parseArgs({ args, options: ANALYZE_OPTIONS, allowPositionals: false, strict: true }).values;
  } catch (error) {
    throw createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
}

function numberFlag(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value.trim());
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw createError('INVALID_ARGUMENT', `--${flag} expects a number, got "${value}"`, { flag, value });
  }
  return parsed;
}

/**
 * Flags that were actually given; anything absent falls through to the
 * environment, config file and defaults.
 */
export function overridesFromArgs(args: string[]): { overrides: AnalysisConfigOverrides; configPath?: string; verbose: boolean } {
  const values = parseAnalyzeArgs(args);

  let format: AnalysisConfigOverrides['format'];
  if (values.format !== undefined) {
    if (values.format !== 'markdown' && values.format !== 'json') {
      throw createError('INVALID_ARGUMENT', `--format must be markdown or json, got "${values.format}"`);
    }
    format = values.format;
  }

  const overrides: AnalysisConfigOverrides = {
    repoPath: values.repo,
    runtimePath: values.runtime,
    timeWindowDays: numberFlag('time-window-days', values['time-window-days']),
    costPerInvocation: numberFlag('cost-per-invocation', values['cost-per-invocation']),
    aiThreshold: numberFlag('ai-threshold', values['ai-threshold']),
    dupThreshold: numberFlag('dup-threshold', values['dup-threshold']),
    dupMediumThreshold: numberFlag('dup-medium-threshold', values['dup-medium-threshold']),
    includeMediumDuplicates: values['include-medium-duplicates'] ? true : undefined,
    minDupBodyStatements: numberFlag('min-dup-body-statements', values['min-dup-body-statements']),
    minDupSignatureChars: numberFlag('min-dup-signature-chars', values['min-dup-signature-chars']),
    includeTests: values['include-tests'] ? true : undefined,
    gitEvidence: values['no-git-evidence'] ? false : undefined,
    currency: values.currency,
    format,
    outputPath: values.output,
    historyDbPath: values['history-db'],
  };

  return { overrides, configPath: values.config, verbose: values.verbose ?? false };
}

// ============================================================================
// Report output
// ============================================================================

function renderReport(
  result: AnalysisResult,
  config: AnalysisConfig,
  history: HistoryContext | null,
  now: Date | undefined,
): string {
  const context = {
    repoPath: config.repoPath,
    timeWindowDays: config.timeWindowDays,
    currency: config.currency,
    historyContext: history,
    generatedAt: now,
  };
  return config.format === 'json'
    ? renderJsonReport(buildJsonReport(result, context))
    : buildMarkdownReport(result, context);
}

function writeReport(reportPath: string, content: string): void {
  try {
    fs.mkdirSync(path.dirname(reportPath), { recursive: true });
    fs.writeFileSync(reportPath, content, 'utf8');
  } catch (error) {
    throw createError('REPORT_WRITE_FAILED', `Cannot write report to ${reportPath}: ${getErrorMessage(error)}`);
  }
}

// ============================================================================
// Command
// ============================================================================

export async function analyzeCommand(options: AnalyzeCommandOptions): Promise<AnalyzeCommandResult> {
  const print = options.print ?? ((line: string) => console.log(line));
  const { overrides, configPath, verbose } = overridesFromArgs(options.args);
  if (verbose) setVerboseLogging(true);

  const config = resolveAnalysisConfig({ overrides, configPath, env: options.env });
  logDebug('[cli] Resolved configuration', { ...config });

  const result = analyzeRepository(config, { versionControl: options.versionControl, now: options.now });

  const history = config.historyDbPath
    ? recordRun({
        dbPath: config.historyDbPath,
        repoPath: config.repoPath,
        summary: result.summary,
        findings: result.findings,
        config,
        scannedAt: options.now,
      })
    : null;

  const reportPath = path.resolve(resolveOutputPath(config));
  writeReport(reportPath, renderReport(result, config, history, options.now));

  const { summary } = result;
  print(`Functions scanned: ${summary.functionsScanned}`);
  print(`Probable AI functions: ${summary.probableAiFunctions}`);
  print(`High-confidence duplicate pairs: ${summary.highConfidenceDuplicationPairs}`);
  print(`Probable AI + zero invocations: ${summary.probableAiZeroInvocations}`);
  if (history) {
    print(`History run: ${history.runId}`);
  }
  print(`Report written: ${reportPath}`);

  return { reportPath, result, history };
}
