/**
 * @fileoverview provenance-audit error hierarchy
 *
 * Only caller-input problems and history-store failures surface as errors.
 * Anything that goes wrong inside a single file or entity during analysis
 * degrades to "contributes nothing" and never reaches this hierarchy.
 */

// ============================================================================
// ERROR JSON TYPE
// ============================================================================

export interface ErrorJSON {
  code: string;
  message: string;
  retryable: boolean;
  timestamp: number;
  stack?: string;
  details?: Record<string, unknown>;
}

// ============================================================================
// BASE ERROR
// ============================================================================

export abstract class ProvenanceAuditError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;
  readonly timestamp = Date.now();

  toJSON(): ErrorJSON {
    return {
      code: this.code,
      message: this.message,
      retryable: this.retryable,
      timestamp: this.timestamp,
      stack: this.stack,
    };
  }

  toString(): string {
    return `[${this.code}] ${this.message}`;
  }
}

// ============================================================================
// CONFIGURATION ERRORS
// ============================================================================

/**
 * Raised before any scanning starts: bad thresholds, a missing repository
 * root, an unreadable runtime evidence file, a malformed config file.
 */
export class ConfigurationError extends ProvenanceAuditError {
  readonly code = 'CONFIGURATION_ERROR';
  readonly retryable = false;

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        issues: this.issues,
      },
    };
  }
}

// ============================================================================
// HISTORY STORE ERRORS
// ============================================================================

export type HistoryOperation = 'open' | 'migrate' | 'write' | 'read';

export class HistoryStoreError extends ProvenanceAuditError {
  readonly code = 'HISTORY_STORE_ERROR';
  readonly retryable = false;

  constructor(
    readonly operation: HistoryOperation,
    message: string,
    readonly dbPath: string,
  ) {
    super(`History ${operation} failed for ${dbPath}: ${message}`);
    this.name = 'HistoryStoreError';
  }

  toJSON(): ErrorJSON {
    return {
      ...super.toJSON(),
      details: {
        operation: this.operation,
        dbPath: this.dbPath,
      },
    };
  }
}

// ============================================================================
// TYPE GUARDS
// ============================================================================

export function isProvenanceAuditError(error: unknown): error is ProvenanceAuditError {
  return error instanceof ProvenanceAuditError;
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
