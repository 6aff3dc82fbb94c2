/**
 * @fileoverview Error Utilities
 * Re-exports from core/errors.ts plus utility functions.
 */

export * from '../core/errors.js';

/**
 * Extract error message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}
