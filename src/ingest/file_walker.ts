/**
 * @fileoverview Repository traversal and source decoding
 */

import { readFileSync } from 'node:fs';
import { globSync } from 'glob';
import { logDebug } from '../telemetry/logger.js';
import { getErrorMessage } from '../utils/errors.js';

/** Directory names never descended into. */
export const PRUNED_DIRECTORIES: ReadonlySet<string> = new Set([
  '.git',
  '.hg',
  '.svn',
  'node_modules',
  'bower_components',
  'dist',
  'build',
  'out',
  'coverage',
  '.next',
  '.turbo',
  '.cache',
  '.venv',
  'venv',
  '__pycache__',
]);

export const TEST_DIRECTORY = 'tests';

export interface WalkOptions {
  includeTests: boolean;
  extensions: readonly string[];
}

/**
 * List repository-relative, `/`-separated paths of files with a supported
 * extension, sorted by code unit. Symbolic links are skipped.
 */
export function listSourceFiles(root: string, options: WalkOptions): string[] {
  const patterns = options.extensions.map((ext) => `**/*${ext}`);
  const entries = globSync(patterns, {
    cwd: root,
    dot: true,
    nodir: true,
    follow: false,
    withFileTypes: true,
    ignore: {
      // The root itself is never pruned, whatever its name.
      childrenIgnored: (entry) =>
        entry.relativePosix() !== '' &&
        (PRUNED_DIRECTORIES.has(entry.name) || (!options.includeTests && entry.name === TEST_DIRECTORY)),
    },
  });

  return entries
    .filter((entry) => !entry.isSymbolicLink())
    .map((entry) => entry.relativePosix())
    .sort(compareCodeUnits);
}

export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Read a file as strict UTF-8 text. Unreadable files, files with a NUL byte
 * and undecodable files yield null.
 */
export function readSourceText(absolutePath: string): string | null {
  let bytes: Buffer;
  try {
    bytes = readFileSync(absolutePath);
  } catch (error) {
    logDebug('[scanner] Skipping unreadable file', { path: absolutePath, error: getErrorMessage(error) });
    return null;
  }

  if (bytes.includes(0)) {
    logDebug('[scanner] Skipping binary file', { path: absolutePath });
    return null;
  }

  try {
    return utf8.decode(bytes);
  } catch (error) {
    logDebug('[scanner] Skipping undecodable file', { path: absolutePath, error: getErrorMessage(error) });
    return null;
  }
}
