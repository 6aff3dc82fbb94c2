/**
 * @fileoverview Git Utilities
 * Synchronous git invocations against a repository root.
 */

import { execFileSync } from 'node:child_process';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage } from './errors.js';

const GIT_MAX_BUFFER = 100 * 1024 * 1024; // 100MB buffer for large blame output

/**
 * Run `git -C <root> <args>` and return stdout, or null when git is missing
 * or exits non-zero. No timeout is applied.
 */
export function runGit(root: string, args: readonly string[]): string | null {
  try {
    return execFileSync('git', ['-C', root, ...args], {
      encoding: 'utf8',
      maxBuffer: GIT_MAX_BUFFER,
      stdio: ['ignore', 'pipe', 'pipe'],
    });
  } catch (error) {
    logDebug('[git] Command failed', { args: args.join(' '), error: getErrorMessage(error) });
    return null;
  }
}

export function isInsideWorkTree(root: string): boolean {
  return runGit(root, ['rev-parse', '--is-inside-work-tree'])?.trim().toLowerCase() === 'true';
}
