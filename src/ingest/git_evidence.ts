/**
 * @fileoverview Per-entity git evidence from history and line blame
 *
 * Parses `git blame --line-porcelain` output restricted to each entity's
 * line range, plus `git log --follow` for file-level counts. A root that is
 * not a work tree, or a git that cannot be run, yields no evidence at all;
 * that is a normal outcome, not an error.
 */

import * as path from 'node:path';
import type { CodeEntity, GitEvidence } from '../types.js';
import { isInsideWorkTree, runGit } from '../utils/git.js';
import { logDebug } from '../telemetry/logger.js';

// ============================================================================
// TYPES
// ============================================================================

export interface FileCommit {
  commit: string;
  author: string;
}

export interface LineAttribution {
  commit: string;
  author: string | null;
  /** Unix seconds; null when the porcelain record carried none. */
  authorTime: number | null;
}

/** Version-control queries the collector needs. */
export interface VersionControl {
  isWorkTree(): boolean;
  /** Commits touching the file, following renames; null if unavailable. */
  fileHistory(filePath: string): FileCommit[] | null;
  /** One record per line in [startLine, endLine]; null if unavailable. */
  lineAttribution(filePath: string, startLine: number, endLine: number): LineAttribution[] | null;
}

export interface GitEvidenceOptions {
  versionControl?: VersionControl;
  now?: Date;
}

const SECONDS_PER_DAY = 86_400;

// ============================================================================
// GIT BLAME PARSER
// ============================================================================

/**
 * Parse a single line of `git blame --line-porcelain` output.
 */
export function parseBlameLineHeader(
  line: string,
): { commitHash: string; originalLine: number; finalLine: number; groupLines?: number } | null {
  // Format: <commit-hash> <original-line> <final-line> [<num-lines>]
  const match = line.match(/^([0-9a-f]{40})\s+(\d+)\s+(\d+)(?:\s+(\d+))?$/);
  if (!match) return null;
  return {
    commitHash: match[1],
    originalLine: parseInt(match[2], 10),
    finalLine: parseInt(match[3], 10),
    groupLines: match[4] ? parseInt(match[4], 10) : undefined,
  };
}

/**
 * Parse `git blame --line-porcelain` output into one attribution per
 * source line. Each line's record is complete in line-porcelain mode, so
 * header fields reset at every commit header.
 */
export function parseBlameOutput(output: string): LineAttribution[] {
  const results: LineAttribution[] = [];
  let commit: string | null = null;
  let author: string | null = null;
  let authorTime: number | null = null;

  for (const line of output.split('\n')) {
    const header = parseBlameLineHeader(line);
    if (header) {
      commit = header.commitHash;
      author = null;
      authorTime = null;
      continue;
    }

    if (line.startsWith('author ')) {
      author = line.slice(7).trim();
    } else if (line.startsWith('author-time ')) {
      const parsed = parseInt(line.slice(12).trim(), 10);
      authorTime = Number.isNaN(parsed) ? null : parsed;
    } else if (line.startsWith('\t') && commit !== null) {
      // This is the actual code line - marks the end of its header
      results.push({ commit, author, authorTime });
    }
  }

  return results;
}

/**
 * Parse `git log --format=%H|%an` output.
 */
export function parseFileHistory(output: string): FileCommit[] {
  const commits: FileCommit[] = [];
  for (const line of output.split('\n')) {
    const separator = line.indexOf('|');
    if (separator < 0) continue;
    commits.push({ commit: line.slice(0, separator), author: line.slice(separator + 1) });
  }
  return commits;
}

// ============================================================================
// GIT CLI
// ============================================================================

export class GitCli implements VersionControl {
  constructor(private readonly root: string) {}

  isWorkTree(): boolean {
    return isInsideWorkTree(this.root);
  }

  fileHistory(filePath: string): FileCommit[] | null {
    const output = runGit(this.root, ['log', '--follow', '--format=%H|%an', '--', filePath]);
    return output === null ? null : parseFileHistory(output);
  }

  lineAttribution(filePath: string, startLine: number, endLine: number): LineAttribution[] | null {
    const output = runGit(this.root, ['blame', '--line-porcelain', '-L', `${startLine},${endLine}`, '--', filePath]);
    return output === null ? null : parseBlameOutput(output);
  }
}

// ============================================================================
// METRICS
// ============================================================================

interface FileCounts {
  commits: number;
  authors: number;
}

export function summarizeFileHistory(history: readonly FileCommit[] | null): FileCounts {
  if (!history) return { commits: 0, authors: 0 };
  const commits = new Set<string>();
  const authors = new Set<string>();
  for (const entry of history) {
    if (entry.commit) commits.add(entry.commit);
    if (entry.author) authors.add(entry.author);
  }
  return { commits: commits.size, authors: authors.size };
}

interface LineMetrics {
  commitCount: number;
  authorCount: number;
  concentration: number;
  ageDays: number;
}

/**
 * Commit/author counts, dominant-commit concentration (3 decimals) and age in
 * whole days of the newest attributed line. Null when no line is attributed.
 */
export function summarizeAttribution(lines: readonly LineAttribution[] | null, nowSeconds: number): LineMetrics | null {
  if (!lines || lines.length === 0) return null;

  const linesByCommit = new Map<string, number>();
  const authors = new Set<string>();
  let newest = 0;
  for (const line of lines) {
    linesByCommit.set(line.commit, (linesByCommit.get(line.commit) ?? 0) + 1);
    if (line.author !== null) authors.add(line.author);
    if (line.authorTime !== null && line.authorTime > newest) newest = line.authorTime;
  }

  const dominant = Math.max(...linesByCommit.values());
  const concentration = Math.round((dominant / lines.length) * 1000) / 1000;
  const ageDays = newest > 0 ? Math.max(Math.floor((nowSeconds - newest) / SECONDS_PER_DAY), 0) : 0;

  return {
    commitCount: linesByCommit.size,
    authorCount: authors.size,
    concentration,
    ageDays,
  };
}

// ============================================================================
// COLLECTOR
// ============================================================================

/**
 * Evidence for every entity, keyed by entity id. Empty when `root` is not a
 * git work tree.
 */
export function collectGitEvidence(
  root: string,
  entities: readonly CodeEntity[],
  options: GitEvidenceOptions = {},
): Map<string, GitEvidence> {
  const versionControl = options.versionControl ?? new GitCli(path.resolve(root));
  const evidence = new Map<string, GitEvidence>();
  if (!versionControl.isWorkTree()) {
    logDebug('[git] Not a work tree; skipping git evidence', { root });
    return evidence;
  }

  const nowSeconds = Math.floor((options.now ?? new Date()).getTime() / 1000);
  const byFile = new Map<string, CodeEntity[]>();
  for (const entity of entities) {
    const group = byFile.get(entity.filePath);
    if (group) {
      group.push(entity);
    } else {
      byFile.set(entity.filePath, [entity]);
    }
  }

  for (const [filePath, fileEntities] of byFile) {
    const fileCounts = summarizeFileHistory(versionControl.fileHistory(filePath));

    for (const entity of fileEntities) {
      const metrics = summarizeAttribution(
        versionControl.lineAttribution(filePath, entity.startLine, entity.endLine),
        nowSeconds,
      );
      evidence.set(entity.entityId, {
        entityId: entity.entityId,
        available: metrics !== null,
        blameCommitCount: metrics?.commitCount ?? null,
        blameAuthorCount: metrics?.authorCount ?? null,
        lineCommitConcentration: metrics?.concentration ?? null,
        lastCommitAgeDays: metrics?.ageDays ?? null,
        fileCommitCount: fileCounts.commits,
        fileAuthorCount: fileCounts.authors,
      });
    }
  }

  return evidence;
}
