/**
 * @fileoverview CLI error handling with helpful suggestions
 */

import { isProvenanceAuditError, ConfigurationError, HistoryStoreError } from '../utils/errors.js';

export class CliError extends Error {
  constructor(
    message: string,
    public readonly code: CliErrorCode,
    public readonly suggestion?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'CliError';
  }
}

export type CliErrorCode =
  | 'INVALID_ARGUMENT'
  | 'CONFIGURATION_ERROR'
  | 'STORAGE_ERROR'
  | 'REPORT_WRITE_FAILED'
  | 'ANALYSIS_FAILED';

export const ERROR_SUGGESTIONS: Record<CliErrorCode, string> = {
  INVALID_ARGUMENT: 'Run `provenance-audit help <command>` for usage information.',
  CONFIGURATION_ERROR: 'Check the flags, PROVENANCE_AUDIT_* variables and config file listed above.',
  STORAGE_ERROR: 'Check that the --history-db path is writable, or omit it to skip run history.',
  REPORT_WRITE_FAILED: 'Check that the --output directory is writable.',
  ANALYSIS_FAILED: 'Re-run with --verbose for debug output.',
};

const EXIT_CODES: Record<CliErrorCode, number> = {
  INVALID_ARGUMENT: 2,
  CONFIGURATION_ERROR: 2,
  STORAGE_ERROR: 1,
  REPORT_WRITE_FAILED: 1,
  ANALYSIS_FAILED: 1,
};

export function createError(
  code: CliErrorCode,
  message: string,
  details?: Record<string, unknown>,
): CliError {
  return new CliError(message, code, ERROR_SUGGESTIONS[code], details);
}

/**
 * Map any thrown value onto a CliError so the entry point has a single
 * shape to print and a single exit code table.
 */
export function toCliError(error: unknown): CliError {
  if (error instanceof CliError) return error;
  if (error instanceof ConfigurationError) {
    return createError('CONFIGURATION_ERROR', error.message, { issues: error.issues });
  }
  if (error instanceof HistoryStoreError) {
    return createError('STORAGE_ERROR', error.message, { operation: error.operation, dbPath: error.dbPath });
  }
  if (isProvenanceAuditError(error)) {
    return createError('ANALYSIS_FAILED', error.message, { code: error.code });
  }
  if (error instanceof Error) {
    return createError('ANALYSIS_FAILED', error.message);
  }
  return createError('ANALYSIS_FAILED', String(error));
}

export function getExitCode(error: unknown): number {
  return EXIT_CODES[toCliError(error).code];
}

export function formatError(error: unknown): string {
  const cliError = toCliError(error);
  const lines = [`Error [${cliError.code}]: ${cliError.message}`];
  if (cliError.suggestion) {
    lines.push('', `Suggestion: ${cliError.suggestion}`);
  }
  return lines.join('\n');
}
